import { InteractionContextType, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';
import type { CommandDeps, GuildCommandInteraction } from '../types.js';
import { formatPendingList } from '../modules/messages.js';
import { replyPrivately } from './config-reply.js';

export const data = new SlashCommandBuilder()
  .setName('list_pending_verifications')
  .setDescription('List verification requests still waiting for a moderator')
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild);

export async function execute(interaction: GuildCommandInteraction, deps: CommandDeps): Promise<void> {
  const entries = deps.pendingStore.listByGuild(interaction.guildId);
  await replyPrivately(interaction, formatPendingList(entries));
}
