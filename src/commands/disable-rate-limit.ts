import { InteractionContextType, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';
import type { CommandDeps, GuildCommandInteraction } from '../types.js';
import { applyConfigUpdate } from './config-reply.js';

export const data = new SlashCommandBuilder()
  .setName('disable_rate_limit')
  .setDescription('Disable rate limiting for email verification')
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild);

export async function execute(interaction: GuildCommandInteraction, deps: CommandDeps): Promise<void> {
  await applyConfigUpdate(
    interaction,
    deps.configStore,
    (draft) => {
      draft.rateLimitEnabled = false;
    },
    'Rate limiting disabled successfully! ✅',
  );
}
