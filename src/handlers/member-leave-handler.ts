import type { GuildMember, PartialGuildMember } from 'discord.js';
import type { PendingVerificationStore } from '../effects/pending-store.js';
import { logger } from '../effects/logger.js';

const log = logger.child({ module: 'Leave' });

/** Dependency injection interface for the member leave handler */
export interface MemberLeaveHandlerDeps {
  pendingStore: PendingVerificationStore;
}

/**
 * Creates the guildMemberRemove handler. A member who leaves (or is removed)
 * before a moderator decides drops out of the pending list. Requests routed to
 * another guild are left alone.
 *
 * @param deps - Dependencies required by the handler
 * @returns An async function that handles member leave events
 */
export function createMemberLeaveHandler(deps: MemberLeaveHandlerDeps) {
  return async function handleMemberLeave(member: GuildMember | PartialGuildMember): Promise<void> {
    const pending = deps.pendingStore.get(member.id);
    if (!pending || pending.guildId !== member.guild.id) return;

    deps.pendingStore.remove(member.id);
    log.info(
      { guildId: pending.guildId, userId: member.id, auditMessageId: pending.auditMessageId },
      'Member left with a pending verification, request dropped',
    );
  };
}
