import { InteractionContextType, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';
import type { CommandDeps, GuildCommandInteraction } from '../types.js';
import { replyPrivately } from './config-reply.js';

export const data = new SlashCommandBuilder()
  .setName('check_rate_limit')
  .setDescription('Check the current rate limit status')
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild);

/**
 * Execute the /check_rate_limit command
 */
export async function execute(interaction: GuildCommandInteraction, deps: CommandDeps): Promise<void> {
  const serverConfig = deps.configStore.get(interaction.guildId);

  if (!serverConfig) {
    await replyPrivately(interaction, 'No rate limit configured for this server');
    return;
  }

  const content = serverConfig.rateLimitEnabled
    ? `Rate limit is enabled with a duration of ${Math.floor(serverConfig.rateLimitDurationMs / 60_000)} minutes`
    : 'Rate limit is disabled';
  await replyPrivately(interaction, content);
}
