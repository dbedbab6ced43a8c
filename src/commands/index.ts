import type { CommandModule } from '../types.js';
import * as setVerificationChannel from './set-verification-channel.js';
import * as setMemberAuditChannel from './set-member-audit-channel.js';
import * as setUnverifiedRole from './set-unverified-role.js';
import * as enableRateLimit from './enable-rate-limit.js';
import * as disableRateLimit from './disable-rate-limit.js';
import * as setRateLimit from './set-rate-limit.js';
import * as checkRateLimit from './check-rate-limit.js';
import * as listPendingVerifications from './list-pending-verifications.js';

/** Every administrative slash command, in registration order */
export const commandModules: readonly CommandModule[] = [
  setVerificationChannel,
  setMemberAuditChannel,
  setUnverifiedRole,
  enableRateLimit,
  disableRateLimit,
  setRateLimit,
  checkRateLimit,
  listPendingVerifications,
];

/** Command name → module, used to dispatch incoming slash commands */
export const commandHandlers: ReadonlyMap<string, CommandModule> = new Map(
  commandModules.map((command) => [command.data.name, command]),
);
