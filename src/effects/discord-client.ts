import {
  Client,
  Events,
  GatewayIntentBits,
  MessageFlags,
  Partials,
  type GuildMember,
  type PartialGuildMember,
  type Interaction,
  type Message,
} from 'discord.js';
import type { BotConfig } from '../types.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'Discord' });

/** Event callbacks wired onto the client */
export interface DiscordEventHandlers {
  onInteraction: (interaction: Interaction) => Promise<void>;
  onMessageCreate: (message: Message) => Promise<void>;
  onMemberJoin: (member: GuildMember) => Promise<void>;
  onMemberLeave: (member: GuildMember | PartialGuildMember) => Promise<void>;
}

/**
 * Create and log in a Discord Client, binding interaction, DM, member join and member leave events
 * @param config - Bot configuration
 * @param handlers - Event callbacks
 * @returns The Client once it has emitted ready
 */
export async function createDiscordClient(
  config: BotConfig,
  handlers: DiscordEventHandlers,
): Promise<Client<true>> {
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMembers,
      GatewayIntentBits.DirectMessages,
    ],
    // DM channels are not cached until the first message arrives; members who
    // leave may never have been cached either
    partials: [Partials.Channel, Partials.GuildMember],
  });

  client.on(Events.InteractionCreate, async (interaction) => {
    try {
      await handlers.onInteraction(interaction);
    } catch (error) {
      log.error({ err: error }, 'Interaction handling error');

      if (interaction.isRepliable()) {
        const content = '❌ An error occurred while executing the command';
        try {
          if (interaction.replied || interaction.deferred) {
            await interaction.followUp({ content, flags: [MessageFlags.Ephemeral] });
          } else {
            await interaction.reply({ content, flags: [MessageFlags.Ephemeral] });
          }
        } catch (replyError) {
          log.warn({ err: replyError }, 'Failed to report interaction error');
        }
      }
    }
  });

  client.on(Events.MessageCreate, async (message) => {
    try {
      await handlers.onMessageCreate(message);
    } catch (error) {
      log.error({ err: error }, 'Message handling error');
    }
  });

  client.on(Events.GuildMemberAdd, async (member) => {
    try {
      await handlers.onMemberJoin(member);
    } catch (error) {
      log.error({ err: error, guildId: member.guild.id }, 'Member join handling error');
    }
  });

  client.on(Events.GuildMemberRemove, async (member) => {
    try {
      await handlers.onMemberLeave(member);
    } catch (error) {
      log.error({ err: error, guildId: member.guild.id }, 'Member leave handling error');
    }
  });

  client.on(Events.Error, (error) => {
    log.error({ err: error }, 'Discord client error');
  });

  const ready = new Promise<Client<true>>((resolve) => {
    client.once(Events.ClientReady, resolve);
  });
  await client.login(config.discordToken);
  return ready;
}

/**
 * Safely shut down a Discord Client
 * @param client - The Client instance to shut down
 */
export async function destroyDiscordClient(client: Client): Promise<void> {
  await client.destroy();
}
