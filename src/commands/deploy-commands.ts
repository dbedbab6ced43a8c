import { config as loadEnv } from 'dotenv';
import { logger } from '../effects/logger.js';
import { deployCommands } from '../effects/command-deployer.js';

const log = logger.child({ module: 'Deploy' });

loadEnv();

async function main() {
  const token = process.env.DISCORD_BOT_TOKEN;
  const clientId = process.env.DISCORD_CLIENT_ID;
  const guildId = process.env.DISCORD_GUILD_ID ?? '';

  if (!token || !clientId) {
    log.fatal('Please set DISCORD_BOT_TOKEN and DISCORD_CLIENT_ID (DISCORD_GUILD_ID is optional)');
    process.exit(1);
  }

  await deployCommands(token, clientId, guildId);
}

main().catch((error) => {
  log.error({ err: error }, 'Registration failed');
  process.exit(1);
});
