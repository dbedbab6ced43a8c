import { REST, Routes } from 'discord.js';
import { commandModules } from '../commands/index.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'Deploy' });

/**
 * Build the full array of slash command JSON payloads
 * @returns Array of command JSON objects
 */
export function buildCommandArray() {
  return commandModules.map((command) => command.data.toJSON());
}

/**
 * Register all slash commands with Discord via the REST API
 * @param token - Discord bot token
 * @param clientId - Discord application client ID
 * @param guildId - Guild to register in; empty string registers globally
 * @returns Number of commands registered
 */
export async function deployCommands(
  token: string,
  clientId: string,
  guildId: string,
): Promise<number> {
  const commands = buildCommandArray();
  const rest = new REST({ version: '10' }).setToken(token);
  const route = guildId
    ? Routes.applicationGuildCommands(clientId, guildId)
    : Routes.applicationCommands(clientId);

  log.info({ guildId: guildId || 'global' }, `Registering ${commands.length} commands...`);
  await rest.put(route, { body: commands });
  log.info('Command registration complete');
  return commands.length;
}
