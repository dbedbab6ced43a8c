import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { ConfigFile, ServerConfig } from '../types.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'ConfigStore' });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Build a config with every optional field unset
 * @returns A fresh default ServerConfig
 */
export function defaultServerConfig(): ServerConfig {
  return { rateLimitEnabled: false, rateLimitDurationMs: 0 };
}

/**
 * Coerce a value read from disk into a ServerConfig, dropping unknown or wrongly typed fields
 * @param raw - One entry of the `servers` object
 * @returns The normalized config
 */
export function normalizeServerConfig(raw: unknown): ServerConfig {
  const config = defaultServerConfig();
  if (!isRecord(raw)) return config;

  for (const key of ['verificationChannelId', 'memberAuditChannelId', 'unverifiedRoleId'] as const) {
    const value = raw[key];
    if (typeof value === 'string' && value !== '') config[key] = value;
  }
  if (typeof raw.rateLimitEnabled === 'boolean') {
    config.rateLimitEnabled = raw.rateLimitEnabled;
  }
  if (typeof raw.rateLimitDurationMs === 'number' && Number.isFinite(raw.rateLimitDurationMs) && raw.rateLimitDurationMs >= 0) {
    config.rateLimitDurationMs = raw.rateLimitDurationMs;
  }
  return config;
}

/**
 * Per-guild settings backed by `config.json` in the data directory.
 *
 * Every operation runs synchronously from start to finish, so two handlers on the
 * event loop can never interleave inside a read-modify-write or see a half-written map.
 */
export class ServerConfigStore {
  private dataFilePath: string;
  private servers = new Map<string, ServerConfig>();

  constructor(dataDir = process.cwd()) {
    this.dataFilePath = resolve(dataDir, 'config.json');
  }

  /** Absolute path of the backing file */
  get filePath(): string {
    return this.dataFilePath;
  }

  /**
   * Replace the in-memory map with the file contents.
   * A missing file yields an empty map; malformed JSON throws.
   */
  load(): void {
    if (!existsSync(this.dataFilePath)) {
      this.servers = new Map();
      log.info({ path: this.dataFilePath }, 'No config file found, starting with empty config');
      return;
    }

    const raw = readFileSync(this.dataFilePath, 'utf-8');
    const data: unknown = JSON.parse(raw);
    const servers = new Map<string, ServerConfig>();

    if (isRecord(data) && isRecord(data.servers)) {
      for (const [guildId, entry] of Object.entries(data.servers)) {
        servers.set(guildId, normalizeServerConfig(entry));
      }
    }

    this.servers = servers;
    log.info({ path: this.dataFilePath, guilds: servers.size }, 'Config loaded');
  }

  /**
   * Write the map to disk via a temp file and rename. Throws when the
   * directory cannot be created or the write fails.
   */
  save(): void {
    const file: ConfigFile = { servers: Object.fromEntries(this.servers) };
    const tmpPath = `${this.dataFilePath}.tmp`;

    mkdirSync(dirname(this.dataFilePath), { recursive: true });
    writeFileSync(tmpPath, JSON.stringify(file, null, 2), 'utf-8');
    renameSync(tmpPath, this.dataFilePath);
  }

  /**
   * Get the settings of a guild
   * @param guildId - Discord guild ID
   * @returns A copy of the config, or undefined when the guild is unconfigured
   */
  get(guildId: string): ServerConfig | undefined {
    const config = this.servers.get(guildId);
    return config ? { ...config } : undefined;
  }

  /**
   * Get-or-create the guild's config, apply the mutator, then persist.
   * Save errors propagate; the in-memory change is kept either way.
   * @param guildId - Discord guild ID
   * @param mutate - Receives a draft to modify in place
   * @returns The stored config after mutation
   */
  upsert(guildId: string, mutate: (draft: ServerConfig) => void): ServerConfig {
    const draft = { ...(this.servers.get(guildId) ?? defaultServerConfig()) };
    mutate(draft);
    this.servers.set(guildId, draft);
    this.save();
    log.info({ guildId }, 'Server config updated');
    return { ...draft };
  }

  /** Snapshot of every configured guild */
  list(): Map<string, ServerConfig> {
    const copy = new Map<string, ServerConfig>();
    for (const [guildId, config] of this.servers) {
      copy.set(guildId, { ...config });
    }
    return copy;
  }
}
