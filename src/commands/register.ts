import { REST, Routes } from 'discord.js';
import dotenv from 'dotenv';
import { errorMessage } from '../core/errors.js';
import { logger } from '../util/logger.js';
import { buildWatchCommand } from './definition.js';

dotenv.config();

const register = async () => {
  const token = process.env.DISCORD_TOKEN;
  const clientId = process.env.DISCORD_CLIENT_ID;
  const guildId = process.env.DISCORD_GUILD_ID;

  if (!token || !clientId) {
    throw new Error('DISCORD_TOKEN und DISCORD_CLIENT_ID müssen gesetzt sein.');
  }

  const rest = new REST({ version: '10' }).setToken(token);

  const commands = [buildWatchCommand().toJSON()];

  try {
    if (guildId) {
      logger.info('Registriere Commands für Guild');
      await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body: commands });
    } else {
      logger.info('Registriere Commands global');
      await rest.put(Routes.applicationCommands(clientId), { body: commands });
    }
    logger.info('Slash-Commands erfolgreich registriert');
  } catch (error) {
    logger.error('Fehler beim Registrieren der Slash-Commands', { error: errorMessage(error) });
    throw error;
  }
};

register().catch((error: unknown) => {
  logger.error('Command-Registration fehlgeschlagen', { error: errorMessage(error) });
  process.exitCode = 1;
});
