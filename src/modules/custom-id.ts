import type { VerificationAction } from '../types.js';

/** Separator between the action and the user ID in a button customId */
export const CUSTOM_ID_SEPARATOR = '_';

const ACTIONS: readonly VerificationAction[] = ['approve', 'deny'];

/** Result of decoding a decision button identifier */
export type ParsedDecision =
  | { ok: true; action: VerificationAction; userId: string }
  | { ok: false; reason: 'malformed' | 'unknown_action'; customId: string };

/**
 * Encode a moderator decision as a button customId, e.g. `approve_12345`
 * @param action - approve or deny
 * @param userId - The user awaiting verification
 */
export function buildDecisionCustomId(action: VerificationAction, userId: string): string {
  return `${action}${CUSTOM_ID_SEPARATOR}${userId}`;
}

/**
 * Decode a button customId. It must split into exactly two non-empty parts
 * and name a known action.
 * @param customId - Identifier received with the button interaction
 */
export function parseDecisionCustomId(customId: string): ParsedDecision {
  const parts = customId.split(CUSTOM_ID_SEPARATOR);
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return { ok: false, reason: 'malformed', customId };
  }

  const [action, userId] = parts;
  const known = ACTIONS.find((a) => a === action);
  if (!known) {
    return { ok: false, reason: 'unknown_action', customId };
  }
  return { ok: true, action: known, userId };
}
