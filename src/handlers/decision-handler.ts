import { MessageFlags, type ButtonInteraction, type Guild } from 'discord.js';
import type { BotConfig } from '../types.js';
import type { ServerConfigStore } from '../effects/config-store.js';
import type { PendingVerificationStore } from '../effects/pending-store.js';
import { sendDirectMessage } from '../effects/discord-sender.js';
import { parseDecisionCustomId } from '../modules/custom-id.js';
import {
  ACTION_COMPLETED,
  DENIAL_FAILED,
  UNKNOWN_ACTION,
  buildApprovalDm,
  buildApprovedLine,
  buildDenialDm,
  buildDeniedLine,
} from '../modules/messages.js';
import { logger } from '../effects/logger.js';

const log = logger.child({ module: 'Decision' });

/** Dependency injection interface for the moderator decision handler */
export interface DecisionHandlerDeps {
  config: BotConfig;
  configStore: ServerConfigStore;
  pendingStore: PendingVerificationStore;
}

async function editReply(interaction: ButtonInteraction, content: string): Promise<void> {
  try {
    await interaction.editReply(content);
  } catch (error) {
    log.error({ err: error, customId: interaction.customId }, 'Error editing interaction response');
  }
}

/**
 * Creates the handler for Approve / Deny buttons on audit messages.
 *
 * Approve: welcome DM, unverified role removed. Deny: denial DM, member kicked.
 * Either way the audit message loses its buttons and shows the outcome. When the
 * kick fails the audit message is left as is so the decision can be retried.
 *
 * @param deps - Dependencies required by the handler
 * @returns An async function that handles button interactions
 */
export function createDecisionHandler(deps: DecisionHandlerDeps) {
  async function approve(guild: Guild, userId: string): Promise<string> {
    await sendDirectMessage(guild.client, userId, buildApprovalDm(deps.config));

    const roleId = deps.configStore.get(guild.id)?.unverifiedRoleId;
    if (roleId) {
      try {
        await guild.members.removeRole({ user: userId, role: roleId });
      } catch (error) {
        log.error({ err: error, guildId: guild.id, userId }, 'Error removing unverified role');
      }
    }
    return buildApprovedLine(userId);
  }

  async function deny(guild: Guild, userId: string, moderatorTag: string): Promise<string | null> {
    await sendDirectMessage(guild.client, userId, buildDenialDm(deps.config));

    try {
      await guild.members.kick(userId, `Verification denied by ${moderatorTag}`);
    } catch (error) {
      log.error({ err: error, guildId: guild.id, userId }, 'Error kicking user');
      return null;
    }
    return buildDeniedLine(userId);
  }

  return async function handleDecision(interaction: ButtonInteraction): Promise<void> {
    try {
      await interaction.deferReply({ flags: [MessageFlags.Ephemeral] });
    } catch (error) {
      log.error({ err: error, customId: interaction.customId }, 'Error acknowledging interaction');
      return;
    }

    const parsed = parseDecisionCustomId(interaction.customId);
    if (!parsed.ok) {
      log.warn({ customId: parsed.customId, reason: parsed.reason }, 'Invalid decision button');
      await editReply(interaction, UNKNOWN_ACTION);
      return;
    }
    if (!interaction.inCachedGuild()) {
      log.warn({ customId: interaction.customId }, 'Decision button used outside a guild');
      await editReply(interaction, UNKNOWN_ACTION);
      return;
    }

    const { action, userId } = parsed;
    const { guild } = interaction;
    log.info({ action, userId, guildId: guild.id, moderatorId: interaction.user.id }, 'Processing verification decision');

    const outcome = action === 'approve'
      ? await approve(guild, userId)
      : await deny(guild, userId, interaction.user.tag);

    if (outcome === null) {
      await editReply(interaction, DENIAL_FAILED);
      return;
    }

    try {
      await interaction.message.edit({ content: outcome, components: [], allowedMentions: { parse: [] } });
    } catch (error) {
      log.error({ err: error, messageId: interaction.message.id }, 'Error editing original message');
    }

    deps.pendingStore.remove(userId);
    await editReply(interaction, ACTION_COMPLETED);
  };
}
