import { InteractionContextType, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';
import type { CommandDeps, GuildCommandInteraction } from '../types.js';
import { applyConfigUpdate } from './config-reply.js';

export const data = new SlashCommandBuilder()
  .setName('set_rate_limit')
  .setDescription('Set the rate limit for email verification')
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild)
  .addIntegerOption((opt) =>
    opt
      .setName('minutes')
      .setDescription('The number of minutes to set the rate limit to')
      .setMinValue(1)
      .setRequired(true),
  );

/**
 * Execute the /set_rate_limit command. Only the duration changes; enabling is separate.
 */
export async function execute(interaction: GuildCommandInteraction, deps: CommandDeps): Promise<void> {
  const minutes = interaction.options.getInteger('minutes', true);

  await applyConfigUpdate(
    interaction,
    deps.configStore,
    (draft) => {
      draft.rateLimitDurationMs = minutes * 60_000;
    },
    `Rate limit set to ${minutes} minutes successfully! ✅`,
  );
}
