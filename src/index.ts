import { config as loadEnv } from 'dotenv';
import type { Client } from 'discord.js';
import { parseConfig, validateConfig } from './config.js';
import { logger, printBanner } from './effects/logger.js';
import { ServerConfigStore } from './effects/config-store.js';
import { RateLimitStore } from './effects/rate-limit-store.js';
import { PendingVerificationStore } from './effects/pending-store.js';
import { createDiscordClient, destroyDiscordClient } from './effects/discord-client.js';
import { deployCommands } from './effects/command-deployer.js';
import { createInteractionHandler } from './handlers/interaction-handler.js';
import { createDirectMessageHandler } from './handlers/direct-message-handler.js';
import { createMemberJoinHandler } from './handlers/member-join-handler.js';
import { createMemberLeaveHandler } from './handlers/member-leave-handler.js';

const log = logger.child({ module: 'Bot' });

// Load .env
loadEnv();

function fatal(err: unknown, message: string): never {
  log.fatal({ err }, message);
  process.exit(1);
}

process.on('uncaughtException', (error) => fatal(error, 'Bot crashed'));
process.on('unhandledRejection', (reason) => fatal(reason, 'Bot crashed (unhandled rejection)'));

async function main() {
  // Parse and validate config
  const config = parseConfig(process.env);
  const errors = validateConfig(config);

  if (errors.length > 0) {
    log.fatal({ errors }, 'Config validation failed');
    process.exit(1);
  }
  logger.level = config.logLevel;

  // Create state stores
  const configStore = new ServerConfigStore(config.dataDir);
  try {
    configStore.load();
  } catch (error) {
    fatal(error, `Error loading config from ${configStore.filePath}`);
  }
  const rateLimitStore = new RateLimitStore();
  const pendingStore = new PendingVerificationStore(config.dataDir);

  const deps = { config, configStore, rateLimitStore, pendingStore };

  const client: Client<true> = await createDiscordClient(config, {
    onInteraction: createInteractionHandler(deps),
    onMessageCreate: createDirectMessageHandler(deps),
    onMemberJoin: createMemberJoinHandler(deps),
    onMemberLeave: createMemberLeaveHandler(deps),
  });

  let registered: number;
  try {
    registered = await deployCommands(config.discordToken, client.application.id, config.discordGuildId);
  } catch (error) {
    fatal(error, 'Error registering slash commands');
  }

  // Startup banner
  const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;
  const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;
  const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
  const cyan = (s: string) => `\x1b[36m${s}\x1b[0m`;

  printBanner([
    '',
    bold('  Verification Bot'),
    dim('  ─────────────────────────────────'),
    '',
    `  ${green('●')} Discord     ${client.user.tag}`,
    '',
    `  ${dim('Guilds')}        ${client.guilds.cache.size} (${configStore.list().size} configured)`,
    `  ${dim('Commands')}      ${registered} (${config.discordGuildId ? `guild ${config.discordGuildId}` : 'global'})`,
    `  ${dim('Email Domain')}  ${config.emailDomain}`,
    `  ${dim('Data Dir')}      ${config.dataDir}`,
    '',
    `  ${cyan('Ready. Press CTRL-C to exit.')}`,
    '',
  ]);

  // Graceful shutdown
  function shutdown() {
    log.info('Shutdown signal received, shutting down...');
    destroyDiscordClient(client)
      .catch((error) => log.error({ err: error }, 'Error closing Discord connection'))
      .finally(() => process.exit(0));
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  fatal(error, 'Startup failed');
});
