import { InteractionContextType, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';
import type { CommandDeps, GuildCommandInteraction } from '../types.js';
import { applyConfigUpdate } from './config-reply.js';

export const data = new SlashCommandBuilder()
  .setName('set_unverified_role')
  .setDescription('Set the role given to members until they are verified')
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild)
  .addRoleOption((opt) =>
    opt
      .setName('role')
      .setDescription('The role to set as the unverified role')
      .setRequired(true),
  );

/**
 * Execute the /set_unverified_role command
 */
export async function execute(interaction: GuildCommandInteraction, deps: CommandDeps): Promise<void> {
  const role = interaction.options.getRole('role', true);

  await applyConfigUpdate(
    interaction,
    deps.configStore,
    (draft) => {
      draft.unverifiedRoleId = role.id;
    },
    `Unverified role set successfully! ✅ <@&${role.id}>`,
  );
}
