import { InteractionContextType, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';
import type { CommandDeps, GuildCommandInteraction } from '../types.js';
import { applyConfigUpdate } from './config-reply.js';

export const data = new SlashCommandBuilder()
  .setName('enable_rate_limit')
  .setDescription('Enable rate limiting for email verification')
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild);

/**
 * Execute the /enable_rate_limit command. A guild without a duration gets the configured default.
 */
export async function execute(interaction: GuildCommandInteraction, deps: CommandDeps): Promise<void> {
  await applyConfigUpdate(
    interaction,
    deps.configStore,
    (draft) => {
      draft.rateLimitEnabled = true;
      if (draft.rateLimitDurationMs === 0) {
        draft.rateLimitDurationMs = deps.config.defaultRateLimitMinutes * 60_000;
      }
    },
    'Rate limiting enabled successfully! ✅',
  );
}
