import { MessageFlags, type Interaction } from 'discord.js';
import type { CommandDeps } from '../types.js';
import { commandHandlers } from '../commands/index.js';
import { createDecisionHandler, type DecisionHandlerDeps } from './decision-handler.js';

/** Dependency injection interface for the interaction handler */
export type InteractionHandlerDeps = CommandDeps & DecisionHandlerDeps;

/**
 * Creates the interaction handler, routing slash commands through the command
 * table and every button to the verification decision handler
 *
 * @param deps - Dependencies required by the interaction handler
 * @returns An async function that handles Discord interaction events
 */
export function createInteractionHandler(deps: InteractionHandlerDeps) {
  const handleDecision = createDecisionHandler(deps);

  return async function handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      const command = commandHandlers.get(interaction.commandName);
      if (!command) {
        await interaction.reply({ content: '❌ Unknown command', flags: [MessageFlags.Ephemeral] });
        return;
      }
      if (!interaction.inGuild()) {
        await interaction.reply({ content: '❌ This command can only be used in a server', flags: [MessageFlags.Ephemeral] });
        return;
      }
      await command.execute(interaction, deps);
      return;
    }

    if (interaction.isButton()) {
      await handleDecision(interaction);
    }
  };
}
