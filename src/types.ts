import type {
  ChatInputCommandInteraction,
  RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import type { ServerConfigStore } from './effects/config-store.js';
import type { PendingVerificationStore } from './effects/pending-store.js';

/** Process-wide settings parsed from the environment */
export interface BotConfig {
  discordToken: string;
  /** Empty string means commands are registered globally */
  discordGuildId: string;
  discordClientId: string;
  dataDir: string;
  /** Institutional domain accepted for verification, e.g. `uclan.ac.uk` */
  emailDomain: string;
  defaultRateLimitMinutes: number;
  /** Invite link included in the denial DM (empty = omitted) */
  reinviteUrl: string;
  communityName: string;
  logLevel: string;
}

/** Per-guild settings, persisted in config.json */
export interface ServerConfig {
  /** Legacy announcement channel, also used when a new member has DMs closed */
  verificationChannelId?: string;
  memberAuditChannelId?: string;
  unverifiedRoleId?: string;
  rateLimitEnabled: boolean;
  rateLimitDurationMs: number;
}

/** On-disk shape of config.json */
export interface ConfigFile {
  servers: Record<string, ServerConfig>;
}

/** Moderator decision carried by an audit message button */
export type VerificationAction = 'approve' | 'deny';

/** A request waiting for a moderator, keyed by the requesting user */
export interface PendingVerification {
  userId: string;
  guildId: string;
  email: string;
  auditChannelId: string;
  auditMessageId: string;
  /** ISO 8601 */
  requestedAt: string;
}

/** A slash command interaction known to come from a guild */
export type GuildCommandInteraction = ChatInputCommandInteraction<'cached' | 'raw'>;

/** Dependencies shared by the administrative slash commands */
export interface CommandDeps {
  config: BotConfig;
  configStore: ServerConfigStore;
  pendingStore: PendingVerificationStore;
}

/** A slash command: its registration payload plus its handler */
export interface CommandModule {
  data: {
    name: string;
    toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
  };
  execute(interaction: GuildCommandInteraction, deps: CommandDeps): Promise<void>;
}
