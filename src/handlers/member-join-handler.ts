import type { GuildMember } from 'discord.js';
import type { BotConfig } from '../types.js';
import type { ServerConfigStore } from '../effects/config-store.js';
import { buildDmFallbackNotice, buildWelcomeInstructions } from '../modules/messages.js';
import { logger } from '../effects/logger.js';

const log = logger.child({ module: 'Join' });

/** Dependency injection interface for the member join handler */
export interface MemberJoinHandlerDeps {
  config: BotConfig;
  configStore: ServerConfigStore;
}

/**
 * Mention the member in the verification channel when their DMs are closed.
 * Any failure here is logged only.
 */
async function postDmFallback(member: GuildMember, channelId: string): Promise<void> {
  try {
    const channel = await member.guild.channels.fetch(channelId);
    if (!channel?.isSendable()) {
      log.warn({ guildId: member.guild.id, channelId }, 'Verification channel is missing or not sendable');
      return;
    }
    await channel.send({
      content: buildDmFallbackNotice(member.id),
      allowedMentions: { users: [member.id] },
    });
  } catch (error) {
    log.error({ err: error, guildId: member.guild.id, channelId }, 'Failed to post DM fallback notice');
  }
}

/**
 * Creates the guildMemberAdd handler: tags the new member as unverified and asks
 * for their institutional email by DM. Guilds without any config are skipped.
 *
 * @param deps - Dependencies required by the handler
 * @returns An async function that handles member join events
 */
export function createMemberJoinHandler(deps: MemberJoinHandlerDeps) {
  return async function handleMemberJoin(member: GuildMember): Promise<void> {
    if (member.user.bot) return;

    const guildId = member.guild.id;
    const serverConfig = deps.configStore.get(guildId);
    if (!serverConfig) {
      log.info({ guildId }, 'No config found for guild, skipping verification');
      return;
    }

    if (serverConfig.unverifiedRoleId) {
      try {
        await member.roles.add(serverConfig.unverifiedRoleId);
      } catch (error) {
        log.error({ err: error, guildId, userId: member.id }, 'Failed to add unverified role');
      }
    } else {
      log.info({ guildId }, 'No unverified role configured');
    }

    try {
      await member.send(buildWelcomeInstructions(deps.config.emailDomain));
      log.info({ guildId, userId: member.id }, 'Sent verification instructions');
    } catch (error) {
      log.warn({ err: error, guildId, userId: member.id }, 'Failed to DM new member');
      if (serverConfig.verificationChannelId) {
        await postDmFallback(member, serverConfig.verificationChannelId);
      }
    }
  };
}
