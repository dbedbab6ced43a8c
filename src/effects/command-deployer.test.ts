import { describe, it, expect, vi, afterEach } from 'vitest';

vi.mock('./logger.js', () => ({
  logger: { child: () => ({ error: vi.fn(), info: vi.fn(), warn: vi.fn() }) },
}));

import { REST, Routes } from 'discord.js';
import { buildCommandArray, deployCommands } from './command-deployer.js';

describe('buildCommandArray', () => {
  it('includes every administrative command', () => {
    expect(buildCommandArray().map((c) => c.name)).toEqual([
      'set_verification_channel',
      'set_member_audit_channel',
      'set_unverified_role',
      'enable_rate_limit',
      'disable_rate_limit',
      'set_rate_limit',
      'check_rate_limit',
      'list_pending_verifications',
    ]);
  });

  it('restricts every command to members who can manage the server', () => {
    for (const command of buildCommandArray()) {
      expect(command.default_member_permissions).toBe('32');
    }
  });

  it('set_rate_limit takes a required positive integer', () => {
    const command = buildCommandArray().find((c) => c.name === 'set_rate_limit');
    expect(command?.options).toEqual([
      expect.objectContaining({ name: 'minutes', type: 4, required: true, min_value: 1 }),
    ]);
  });
});

describe('deployCommands', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers to a single guild when a guild ID is given', async () => {
    const put = vi.spyOn(REST.prototype, 'put').mockResolvedValue([]);
    const count = await deployCommands('test-token', 'client-1', 'guild-1');

    expect(count).toBe(8);
    expect(put).toHaveBeenCalledWith(Routes.applicationGuildCommands('client-1', 'guild-1'), {
      body: buildCommandArray(),
    });
  });

  it('registers globally without a guild ID', async () => {
    const put = vi.spyOn(REST.prototype, 'put').mockResolvedValue([]);
    await deployCommands('test-token', 'client-1', '');

    expect(put).toHaveBeenCalledWith(Routes.applicationCommands('client-1'), { body: buildCommandArray() });
  });

  it('propagates registration errors', async () => {
    vi.spyOn(REST.prototype, 'put').mockRejectedValue(new Error('401: Unauthorized'));
    await expect(deployCommands('test-token', 'client-1', '')).rejects.toThrow('401: Unauthorized');
  });
});
