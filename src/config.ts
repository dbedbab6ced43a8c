import { resolve } from 'node:path';
import pino from 'pino';
import type { BotConfig } from './types.js';

const DEFAULT_EMAIL_DOMAIN = 'uclan.ac.uk';
const DOMAIN_PATTERN = /^[a-z0-9-]+(\.[a-z0-9-]+)+$/;

/**
 * Parse environment variables into a BotConfig object
 * @param env - Key-value pairs of environment variables
 * @returns Parsed bot configuration
 */
export function parseConfig(env: Record<string, string | undefined>): BotConfig {
  return {
    discordToken: env.DISCORD_BOT_TOKEN ?? '',
    discordGuildId: env.DISCORD_GUILD_ID?.trim() ?? '',
    discordClientId: env.DISCORD_CLIENT_ID ?? '',
    dataDir: resolve(env.DATA_DIR || resolve(process.cwd(), 'data')),
    emailDomain: normalizeDomain(env.EMAIL_DOMAIN),
    defaultRateLimitMinutes: safeParsePositiveInt(env.DEFAULT_RATE_LIMIT_MINUTES, 5),
    reinviteUrl: env.REINVITE_URL?.trim() ?? '',
    communityName: env.COMMUNITY_NAME?.trim() || 'the server',
    logLevel: env.LOG_LEVEL?.trim() || 'info',
  };
}

/**
 * Validate configuration, returning an array of error messages (empty array means passed)
 * @param config - The bot configuration to validate
 * @returns Array of error messages (empty array means validation passed)
 */
export function validateConfig(config: BotConfig): string[] {
  const errors: string[] = [];

  if (!config.discordToken) {
    errors.push('DISCORD_BOT_TOKEN is not set');
  }
  if (!DOMAIN_PATTERN.test(config.emailDomain)) {
    errors.push(`EMAIL_DOMAIN "${config.emailDomain}" is not a valid domain`);
  }
  if (!isLogLevel(config.logLevel)) {
    errors.push(`LOG_LEVEL "${config.logLevel}" is not one of ${[...Object.keys(pino.levels.values), 'silent'].join(', ')}`);
  }
  if (config.reinviteUrl && !/^https?:\/\/\S+$/.test(config.reinviteUrl)) {
    errors.push(`REINVITE_URL "${config.reinviteUrl}" is not an http(s) URL`);
  }

  return errors;
}

function isLogLevel(level: string): boolean {
  return level === 'silent' || Object.hasOwn(pino.levels.values, level);
}

function normalizeDomain(value: string | undefined): string {
  const domain = value?.trim().replace(/^@/, '').toLowerCase();
  return domain || DEFAULT_EMAIL_DOMAIN;
}

function safeParsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 1 ? fallback : parsed;
}
