import { errorMessage } from './core/errors.js';
import { CoordinatorRegistry } from './core/registry.js';
import { UpstreamClient } from './core/types.js';
import { EbayCredentials } from './providers/ebay.js';
import { logger } from './util/logger.js';

export const registerAccounts = async <C extends UpstreamClient>(
  registry: CoordinatorRegistry,
  accounts: EbayCredentials[],
  createClient: (credentials: EbayCredentials) => C
): Promise<Map<string, C>> => {
  const clients = new Map<string, C>();
  for (const credentials of accounts) {
    const client = createClient(credentials);
    try {
      await registry.addAccount(credentials.name, client);
      clients.set(credentials.name, client);
    } catch (error) {
      logger.error(`Konto ${credentials.name} konnte nicht gestartet werden`, { error: errorMessage(error) });
    }
  }
  logger.info(`${clients.size} von ${accounts.length} Konten werden überwacht`);
  return clients;
};
