import type { BotConfig, PendingVerification } from '../types.js';

// ─── Direct messages to the member ───────────────────

/**
 * Instructions sent when a member joins
 * @param domain - Accepted email domain
 */
export function buildWelcomeInstructions(domain: string): string {
  return `Welcome! Please provide your university email for verification. For example:\`\`\`example@${domain}\`\`\``;
}

/** Posted in the verification channel when the joining member has DMs closed */
export function buildDmFallbackNotice(userId: string): string {
  return `<@${userId}> I couldn't send you a direct message. Please allow DMs from server members, then send me your university email to get verified.`;
}

/** Reply while the user is still rate limited */
export function buildRateLimitedReply(minutes: number): string {
  return `Please wait ${minutes} minute${minutes === 1 ? '' : 's'} before sending another verification request.`;
}

export function buildInvalidEmailReply(domain: string): string {
  return `Invalid email. Please provide a valid ${domain} email address.`;
}

export const REQUEST_SUBMITTED_REPLY =
  'Thanks! Your verification request has been sent to the moderators. You will get a message once it has been reviewed.';

export function buildApprovalDm(config: Pick<BotConfig, 'communityName'>): string {
  return `You have been approved to join ${config.communityName}. Welcome! 🎉`;
}

/**
 * Sent before the member is kicked on denial
 * @param config - Supplies the community name and optional re-invite link
 */
export function buildDenialDm(config: Pick<BotConfig, 'communityName' | 'emailDomain' | 'reinviteUrl'>): string {
  const lines = [
    `Oops! You need to verify your identity with a ${config.emailDomain} email address to access ${config.communityName}. This ensures only members have access and keeps the community safe and civil.`,
    '',
    config.reinviteUrl
      ? `As your email was not verified, you were removed from the server. You can rejoin and retry verification using this link: ${config.reinviteUrl}. Thank you 🙂`
      : 'As your email was not verified, you were removed from the server. You are welcome to rejoin and retry verification. Thank you 🙂',
  ];
  return lines.join('\n');
}

// ─── Audit channel ───────────────────────────────────

export function buildAuditRequest(displayName: string, userId: string, email: string): string {
  return `User ${displayName} (<@${userId}>) has requested verification with email ${email}`;
}

export function buildApprovedLine(userId: string): string {
  return `<@${userId}> has been approved! Welcome to the server! 🎉`;
}

export function buildDeniedLine(userId: string): string {
  return `<@${userId}> has been denied and removed from the server.`;
}

// ─── Moderator acknowledgements ──────────────────────

export const ACTION_COMPLETED = 'Action completed successfully';
export const DENIAL_FAILED = 'Error processing denial';
export const UNKNOWN_ACTION = '❌ Unknown action';

/** Discord rejects message content longer than this */
export const MESSAGE_MAX_LENGTH = 2000;

/**
 * One line per open request, for `/list_pending_verifications`. Lines that would push
 * the reply past the message limit are replaced by a `…and N more` line.
 * @param entries - Open requests, oldest first
 */
export function formatPendingList(entries: PendingVerification[]): string {
  if (entries.length === 0) return 'No pending verification requests';

  const lines = [`**${entries.length} pending verification request${entries.length === 1 ? '' : 's'}**`];
  let length = lines[0].length;

  for (const [index, entry] of entries.entries()) {
    const unix = Math.floor(new Date(entry.requestedAt).getTime() / 1000);
    const line = `• <@${entry.userId}>: ${entry.email} (requested <t:${unix}:R>)`;
    const left = entries.length - index - 1;
    // Keep room for the overflow line of whatever is still left after this one
    const reserve = left > 0 ? `\n…and ${left} more`.length : 0;
    if (length + 1 + line.length + reserve > MESSAGE_MAX_LENGTH) {
      lines.push(`…and ${entries.length - index} more`);
      break;
    }
    lines.push(line);
    length += 1 + line.length;
  }
  return lines.join('\n');
}
