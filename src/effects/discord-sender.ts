import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  type Client,
  type Message,
  type SendableChannels,
} from 'discord.js';
import { buildDecisionCustomId } from '../modules/custom-id.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'Sender' });

/**
 * Build the Approve / Deny button row attached to an audit message
 *
 * @param userId - The user awaiting verification, encoded into both customIds
 * @returns An action row with the two buttons
 */
export function buildDecisionRow(userId: string): ActionRowBuilder<ButtonBuilder> {
  const approve = new ButtonBuilder()
    .setCustomId(buildDecisionCustomId('approve', userId))
    .setLabel('Approve')
    .setStyle(ButtonStyle.Success);

  const deny = new ButtonBuilder()
    .setCustomId(buildDecisionCustomId('deny', userId))
    .setLabel('Deny')
    .setStyle(ButtonStyle.Danger);

  return new ActionRowBuilder<ButtonBuilder>().addComponents(approve, deny);
}

/**
 * Post a verification request with decision buttons. Mentions in the text never ping.
 *
 * @param channel - The moderators' audit channel
 * @param content - Request text
 * @param userId - The requesting user
 * @returns The sent Discord message
 */
export async function sendAuditRequest(
  channel: SendableChannels,
  content: string,
  userId: string,
): Promise<Message> {
  return channel.send({
    content,
    components: [buildDecisionRow(userId)],
    allowedMentions: { parse: [] },
  });
}

/**
 * DM a user by ID. Failures (DMs closed, unknown user) are logged, not thrown.
 *
 * @param client - Logged-in Discord client
 * @param userId - Recipient
 * @param content - Message text
 * @returns Whether the message was delivered
 */
export async function sendDirectMessage(
  client: Client,
  userId: string,
  content: string,
): Promise<boolean> {
  try {
    await client.users.send(userId, content);
    return true;
  } catch (error) {
    log.warn({ err: error, userId }, 'Failed to send direct message');
    return false;
  }
}
