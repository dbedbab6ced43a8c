import { MessageFlags, type ChatInputCommandInteraction } from 'discord.js';
import type { GuildCommandInteraction, ServerConfig } from '../types.js';
import type { ServerConfigStore } from '../effects/config-store.js';
import { logger } from '../effects/logger.js';

const log = logger.child({ module: 'Commands' });

/**
 * Reply privately to the invoking administrator without pinging anyone
 * @param interaction - The slash command interaction
 * @param content - Reply text
 */
export async function replyPrivately(interaction: ChatInputCommandInteraction, content: string): Promise<void> {
  await interaction.reply({
    content,
    flags: [MessageFlags.Ephemeral],
    allowedMentions: { parse: [] },
  });
}

/**
 * Apply a change to the invoking guild's config and reply with the outcome.
 * A save failure is reported back to the administrator instead of the confirmation.
 *
 * @param interaction - The slash command interaction
 * @param configStore - Config store to mutate
 * @param mutate - Field update to apply to the guild's config
 * @param successMessage - Reply when the change has been persisted
 */
export async function applyConfigUpdate(
  interaction: GuildCommandInteraction,
  configStore: ServerConfigStore,
  mutate: (draft: ServerConfig) => void,
  successMessage: string,
): Promise<void> {
  try {
    configStore.upsert(interaction.guildId, mutate);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ err: error, guildId: interaction.guildId, command: interaction.commandName }, 'Failed to save config');
    await replyPrivately(interaction, `Error saving config: ${message}`);
    return;
  }
  await replyPrivately(interaction, successMessage);
}
