import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { parseConfig, validateConfig } from './config.js';

describe('parseConfig', () => {
  const minimal = { DISCORD_BOT_TOKEN: 'test-token' };

  it('parses basic environment variables', () => {
    const config = parseConfig({ ...minimal, DISCORD_GUILD_ID: 'guild', DISCORD_CLIENT_ID: 'client' });
    expect(config.discordToken).toBe('test-token');
    expect(config.discordGuildId).toBe('guild');
    expect(config.discordClientId).toBe('client');
  });

  it('default values are correct', () => {
    const config = parseConfig(minimal);
    expect(config.discordGuildId).toBe('');
    expect(config.dataDir).toBe(resolve(process.cwd(), 'data'));
    expect(config.emailDomain).toBe('uclan.ac.uk');
    expect(config.defaultRateLimitMinutes).toBe(5);
    expect(config.reinviteUrl).toBe('');
    expect(config.communityName).toBe('the server');
    expect(config.logLevel).toBe('info');
  });

  it('normalizes the email domain', () => {
    const config = parseConfig({ ...minimal, EMAIL_DOMAIN: ' @Example.AC.uk ' });
    expect(config.emailDomain).toBe('example.ac.uk');
  });

  it('resolves DATA_DIR to an absolute path', () => {
    const config = parseConfig({ ...minimal, DATA_DIR: 'state' });
    expect(config.dataDir).toBe(resolve('state'));
  });

  it('custom rate limit default', () => {
    expect(parseConfig({ ...minimal, DEFAULT_RATE_LIMIT_MINUTES: '10' }).defaultRateLimitMinutes).toBe(10);
  });

  it('non-numeric or non-positive rate limit falls back to default', () => {
    expect(parseConfig({ ...minimal, DEFAULT_RATE_LIMIT_MINUTES: 'abc' }).defaultRateLimitMinutes).toBe(5);
    expect(parseConfig({ ...minimal, DEFAULT_RATE_LIMIT_MINUTES: '0' }).defaultRateLimitMinutes).toBe(5);
  });

  it('missing token results in empty string', () => {
    expect(parseConfig({}).discordToken).toBe('');
  });
});

describe('validateConfig', () => {
  it('complete config has no errors', () => {
    const config = parseConfig({ DISCORD_BOT_TOKEN: 'test-token', REINVITE_URL: 'https://discord.gg/example' });
    expect(validateConfig(config)).toEqual([]);
  });

  it('missing token produces an error', () => {
    expect(validateConfig(parseConfig({}))).toEqual(['DISCORD_BOT_TOKEN is not set']);
  });

  it('rejects a domain without a dot', () => {
    const errors = validateConfig(parseConfig({ DISCORD_BOT_TOKEN: 'test-token', EMAIL_DOMAIN: 'localhost' }));
    expect(errors).toEqual(['EMAIL_DOMAIN "localhost" is not a valid domain']);
  });

  it('rejects a re-invite link without a scheme', () => {
    const errors = validateConfig(parseConfig({ DISCORD_BOT_TOKEN: 'test-token', REINVITE_URL: 'discord.gg/example' }));
    expect(errors).toEqual(['REINVITE_URL "discord.gg/example" is not an http(s) URL']);
  });

  it('rejects an unknown log level', () => {
    const errors = validateConfig(parseConfig({ DISCORD_BOT_TOKEN: 'test-token', LOG_LEVEL: 'verbose' }));
    expect(errors).toEqual(['LOG_LEVEL "verbose" is not one of trace, debug, info, warn, error, fatal, silent']);
  });

  it.each(['debug', 'warn', 'silent'])('accepts log level %s', (level) => {
    expect(validateConfig(parseConfig({ DISCORD_BOT_TOKEN: 'test-token', LOG_LEVEL: level }))).toEqual([]);
  });
});
