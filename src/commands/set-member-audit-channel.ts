import {
  ChannelType,
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
} from 'discord.js';
import type { CommandDeps, GuildCommandInteraction } from '../types.js';
import { applyConfigUpdate } from './config-reply.js';

export const data = new SlashCommandBuilder()
  .setName('set_member_audit_channel')
  .setDescription('Set the member audit channel')
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild)
  .addChannelOption((opt) =>
    opt
      .setName('channel')
      .setDescription('The channel to use for member audits')
      .addChannelTypes(ChannelType.GuildText)
      .setRequired(true),
  );

/**
 * Execute the /set_member_audit_channel command
 */
export async function execute(interaction: GuildCommandInteraction, deps: CommandDeps): Promise<void> {
  const channel = interaction.options.getChannel('channel', true);

  await applyConfigUpdate(
    interaction,
    deps.configStore,
    (draft) => {
      draft.memberAuditChannelId = channel.id;
    },
    `Member audit channel set successfully! ✅ <#${channel.id}>`,
  );
}
