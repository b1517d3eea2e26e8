import { Client, GatewayIntentBits, Interaction } from 'discord.js';
import dotenv from 'dotenv';
import { registerAccounts } from './accounts.js';
import { handleWatchCommand } from './commands/watch.js';
import { loadAccounts, loadConfig } from './config.js';
import { SnapshotBoard, combinePublishers } from './core/board.js';
import { errorMessage } from './core/errors.js';
import { CoordinatorRegistry } from './core/registry.js';
import { DiscordNotifier, MessageSink } from './discord/notifier.js';
import { EbayClient } from './providers/ebay.js';
import { JsonFileSearchStore } from './storage/search-store.js';
import { logger } from './util/logger.js';
import { createLimiter } from './util/rate.js';

dotenv.config();

const config = loadConfig();

const client = new Client({ intents: [GatewayIntentBits.Guilds] });

const sendToChannel: MessageSink = async (message) => {
  const channelId = config.discordChannelId;
  if (!channelId) {
    logger.debug('DISCORD_CHANNEL_ID nicht gesetzt, Benachrichtigung verworfen');
    return;
  }
  const channel = await client.channels.fetch(channelId);
  if (!channel?.isSendable()) {
    throw new Error(`Kanal ${channelId} ist kein Textkanal`);
  }
  await channel.send(message);
};

const board = new SnapshotBoard();
const registry = new CoordinatorRegistry({
  publisher: combinePublishers(board, new DiscordNotifier(sendToChannel)),
  searchStore: new JsonFileSearchStore(config.searchStoreDir),
  intervals: config.intervals,
  maxBackoffMs: config.maxBackoffMs
});
const clients = new Map<string, EbayClient>();
const globalLimiter = createLimiter({ id: 'ebay-global', minTime: 200, maxConcurrent: 3 });

const startAccounts = async () => {
  const accounts = await loadAccounts(config.accountsFile);
  const started = await registerAccounts(
    registry,
    accounts,
    (credentials) => new EbayClient({ credentials, globalLimiter, timeoutMs: config.requestTimeoutMs })
  );
  for (const [name, ebay] of started) {
    clients.set(name, ebay);
  }
};

client.once('ready', (readyClient) => {
  logger.info(`Bot eingeloggt als ${readyClient.user.tag}`);
  startAccounts().catch((error: unknown) => {
    logger.error('Konten konnten nicht geladen werden', { error: errorMessage(error) });
    process.exitCode = 1;
  });
});

client.on('interactionCreate', async (interaction: Interaction) => {
  if (!interaction.isChatInputCommand()) {
    return;
  }

  if (interaction.commandName === 'watch') {
    try {
      await handleWatchCommand(interaction, { registry, board, clients });
    } catch (error) {
      logger.error('Fehler beim Ausführen des Watch-Commands', { error: errorMessage(error) });
    }
  }
});

const shutdown = (signal: string) => {
  logger.info(`${signal} empfangen, beende Abrufe`);
  registry
    .shutdown()
    .then(() => client.destroy())
    .catch((error: unknown) => {
      logger.error('Fehler beim Beenden', { error: errorMessage(error) });
      process.exitCode = 1;
    });
};

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

client
  .login(config.discordToken)
  .then(() => logger.info('Login erfolgreich, Bot bereit.'))
  .catch((error: unknown) => {
    logger.error('Login fehlgeschlagen', { error: errorMessage(error) });
    process.exitCode = 1;
  });
