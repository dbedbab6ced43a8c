import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync } from 'node:fs';
import { resolve } from 'node:path';
import type { PendingVerification } from '../types.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'PendingStore' });

const STRING_FIELDS = ['userId', 'guildId', 'email', 'auditChannelId', 'auditMessageId', 'requestedAt'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isPendingVerification(value: unknown): value is PendingVerification {
  if (!isRecord(value)) return false;
  return STRING_FIELDS.every((field) => typeof value[field] === 'string');
}

/**
 * Verification requests awaiting a moderator decision, keyed by userId.
 * Persisted to a JSON file so the queue of open requests survives restarts
 * and a deleted audit message does not lose track of who is waiting.
 */
export class PendingVerificationStore {
  private dataDir: string;
  private dataFilePath: string;
  private pending: Map<string, PendingVerification>;

  constructor(dataDir = process.cwd()) {
    this.dataDir = dataDir;
    this.dataFilePath = resolve(dataDir, 'pending-verifications.json');
    this.pending = this.loadFromDisk();
  }

  private loadFromDisk(): Map<string, PendingVerification> {
    if (!existsSync(this.dataFilePath)) return new Map();
    try {
      const raw = readFileSync(this.dataFilePath, 'utf-8');
      const data: unknown = JSON.parse(raw);
      const list = Array.isArray(data) ? data.filter(isPendingVerification) : [];
      return new Map(list.map((entry) => [entry.userId, entry]));
    } catch (error) {
      log.warn({ err: error }, 'Failed to load pending verifications, starting fresh');
      return new Map();
    }
  }

  private saveToDisk(): boolean {
    try {
      const tmpPath = `${this.dataFilePath}.tmp`;
      mkdirSync(this.dataDir, { recursive: true });
      writeFileSync(tmpPath, JSON.stringify([...this.pending.values()], null, 2), 'utf-8');
      renameSync(tmpPath, this.dataFilePath);
      return true;
    } catch (error) {
      log.error({ err: error }, 'Failed to save pending verifications');
      return false;
    }
  }

  /** Record a request, replacing any earlier one from the same user. Returns false if persistence failed. */
  add(entry: PendingVerification): boolean {
    this.pending.set(entry.userId, entry);
    return this.saveToDisk();
  }

  /** Get the open request of a user */
  get(userId: string): PendingVerification | undefined {
    return this.pending.get(userId);
  }

  /** Delete a user's request. Returns true if one existed. */
  remove(userId: string): boolean {
    if (!this.pending.delete(userId)) return false;
    this.saveToDisk();
    return true;
  }

  /** Open requests for one guild, oldest first */
  listByGuild(guildId: string): PendingVerification[] {
    return [...this.pending.values()]
      .filter((entry) => entry.guildId === guildId)
      .sort((a, b) => a.requestedAt.localeCompare(b.requestedAt));
  }
}
