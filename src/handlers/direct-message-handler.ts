import type { Client, Guild, GuildMember, Message } from 'discord.js';
import type { BotConfig } from '../types.js';
import type { ServerConfigStore } from '../effects/config-store.js';
import type { RateLimitStore } from '../effects/rate-limit-store.js';
import type { PendingVerificationStore } from '../effects/pending-store.js';
import { sendAuditRequest } from '../effects/discord-sender.js';
import { isValidEmail } from '../modules/email.js';
import { retryAfterMinutes } from '../modules/rate-limiter.js';
import {
  REQUEST_SUBMITTED_REPLY,
  buildAuditRequest,
  buildInvalidEmailReply,
  buildRateLimitedReply,
} from '../modules/messages.js';
import { logger } from '../effects/logger.js';

const log = logger.child({ module: 'DM' });

/** Dependency injection interface for the direct message handler */
export interface DirectMessageHandlerDeps {
  config: BotConfig;
  configStore: ServerConfigStore;
  rateLimitStore: RateLimitStore;
  pendingStore: PendingVerificationStore;
}

/**
 * Find the first guild (in cache order) the user is a member of.
 * A user sharing several guilds with the bot is routed to whichever comes first.
 *
 * @param client - Logged-in Discord client
 * @param userId - The DM author
 * @returns The guild and member, or null if the user shares no guild with the bot
 */
export async function findMemberGuild(
  client: Client,
  userId: string,
): Promise<{ guild: Guild; member: GuildMember } | null> {
  for (const guild of client.guilds.cache.values()) {
    try {
      const member = await guild.members.fetch(userId);
      return { guild, member };
    } catch {
      // Not a member of this guild
    }
  }
  return null;
}

async function reply(message: Message, content: string): Promise<void> {
  try {
    await message.reply(content);
  } catch (error) {
    log.error({ err: error, userId: message.author.id }, 'Failed to reply to direct message');
  }
}

/**
 * Creates the messageCreate handler. Every DM from a non-bot user is an email
 * submission: it is rate limited, validated, then posted to the audit channel
 * of the user's guild with Approve / Deny buttons.
 *
 * @param deps - Dependencies required by the handler
 * @returns An async function that handles message events
 */
export function createDirectMessageHandler(deps: DirectMessageHandlerDeps) {
  return async function handleDirectMessage(message: Message): Promise<void> {
    if (message.author.bot || message.inGuild()) return;

    const userId = message.author.id;
    const resolved = await findMemberGuild(message.client, userId);
    if (!resolved) {
      log.info({ userId }, 'User is not in any guild');
      return;
    }
    const { guild, member } = resolved;
    const serverConfig = deps.configStore.get(guild.id);

    if (serverConfig?.rateLimitEnabled) {
      const result = deps.rateLimitStore.check(userId, serverConfig.rateLimitDurationMs);
      if (!result.allowed) {
        log.info({ userId, guildId: guild.id, retryAfterMs: result.retryAfterMs }, 'Verification attempt rate limited');
        await reply(message, buildRateLimitedReply(retryAfterMinutes(result.retryAfterMs)));
        return;
      }
    }

    const email = message.content.trim();
    if (!isValidEmail(email, deps.config.emailDomain)) {
      await reply(message, buildInvalidEmailReply(deps.config.emailDomain));
      return;
    }

    const auditChannelId = serverConfig?.memberAuditChannelId;
    if (!auditChannelId) {
      log.warn({ guildId: guild.id, userId }, 'No member audit channel configured');
      return;
    }

    let auditMessageId: string;
    try {
      const channel = await message.client.channels.fetch(auditChannelId);
      if (!channel?.isSendable()) {
        log.error({ guildId: guild.id, channelId: auditChannelId }, 'Member audit channel is missing or not sendable');
        return;
      }
      const sent = await sendAuditRequest(channel, buildAuditRequest(member.displayName, userId, email), userId);
      auditMessageId = sent.id;
    } catch (error) {
      log.error({ err: error, guildId: guild.id, channelId: auditChannelId }, 'Error sending message to audit channel');
      return;
    }

    const recorded = deps.pendingStore.add({
      userId,
      guildId: guild.id,
      email,
      auditChannelId,
      auditMessageId,
      requestedAt: new Date().toISOString(),
    });
    if (!recorded) {
      // The buttons still carry the user ID, so moderators can decide without the record
      log.warn({ guildId: guild.id, userId, auditMessageId }, 'Pending verification kept in memory only');
    }
    log.info({ guildId: guild.id, userId }, 'Verification request submitted');
    await reply(message, REQUEST_SUBMITTED_REPLY);
  };
}
