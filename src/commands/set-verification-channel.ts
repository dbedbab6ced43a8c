import {
  ChannelType,
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
} from 'discord.js';
import type { CommandDeps, GuildCommandInteraction } from '../types.js';
import { applyConfigUpdate } from './config-reply.js';

export const data = new SlashCommandBuilder()
  .setName('set_verification_channel')
  .setDescription('Set the channel used for verification announcements')
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild)
  .addChannelOption((opt) =>
    opt
      .setName('channel')
      .setDescription('The channel to use for verification')
      .addChannelTypes(ChannelType.GuildText)
      .setRequired(true),
  );

/**
 * Execute the /set_verification_channel command
 */
export async function execute(interaction: GuildCommandInteraction, deps: CommandDeps): Promise<void> {
  const channel = interaction.options.getChannel('channel', true);

  await applyConfigUpdate(
    interaction,
    deps.configStore,
    (draft) => {
      draft.verificationChannelId = channel.id;
    },
    `Verification channel set successfully! ✅ <#${channel.id}>`,
  );
}
