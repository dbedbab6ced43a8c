import { describe, it, expect, vi } from 'vitest';

vi.mock('../effects/logger.js', () => ({
  logger: { child: () => ({ error: vi.fn(), info: vi.fn(), warn: vi.fn() }) },
}));

import { MessageFlags } from 'discord.js';
import { applyConfigUpdate } from './config-reply.js';

function makeInteraction() {
  return {
    guildId: 'g1',
    commandName: 'set_rate_limit',
    reply: vi.fn().mockResolvedValue(undefined),
  };
}

describe('applyConfigUpdate', () => {
  it('upserts the invoking guild and confirms', async () => {
    const interaction = makeInteraction();
    const configStore = { upsert: vi.fn() };
    const mutate = vi.fn();

    await applyConfigUpdate(interaction as never, configStore as never, mutate, 'Done ✅');

    expect(configStore.upsert).toHaveBeenCalledWith('g1', mutate);
    expect(interaction.reply).toHaveBeenCalledWith({
      content: 'Done ✅',
      flags: [MessageFlags.Ephemeral],
      allowedMentions: { parse: [] },
    });
  });

  it('reports a save failure instead of the confirmation', async () => {
    const interaction = makeInteraction();
    const configStore = {
      upsert: vi.fn(() => {
        throw new Error('EACCES: permission denied');
      }),
    };

    await applyConfigUpdate(interaction as never, configStore as never, vi.fn(), 'Done ✅');

    expect(interaction.reply).toHaveBeenCalledTimes(1);
    expect(interaction.reply).toHaveBeenCalledWith(
      expect.objectContaining({ content: 'Error saving config: EACCES: permission denied' }),
    );
  });
});
