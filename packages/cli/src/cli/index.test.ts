import { describe, it, expect, vi } from 'vitest';

vi.mock('./graph-cmd.js', () => ({
  graphCommand: vi.fn().mockResolvedValue(undefined),
}));

import { graphCommand } from './graph-cmd.js';
import { program } from './index.js';

describe('program', () => {
  it('should hand the root and parsed options to the graph command', async () => {
    await program.parseAsync(
      ['project', '-f', 'png', '-s', '-t', '-b', 'build', 'out', '-g', 'vendor/lwip', '-o', 'docs/deps'],
      { from: 'user' },
    );

    expect(graphCommand).toHaveBeenCalledWith(
      'project',
      {
        format: 'png',
        strict: true,
        tree: true,
        blacklist: ['build', 'out'],
        group: ['vendor/lwip'],
        output: 'docs/deps',
      },
      program,
    );
  });

  it('should default the format to svg', () => {
    expect(program.options.find(option => option.long === '--format')?.defaultValue).toBe('svg');
  });
});
