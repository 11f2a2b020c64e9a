import { describe, it, expect, afterEach, vi } from 'vitest';
import chalk from 'chalk';

vi.mock('figlet', () => ({
  default: {
    textSync: vi.fn(() => 'ABCDEFGH\n'),
  },
}));

vi.mock('./version.js', () => ({
  getPackageVersion: vi.fn(() => '1.0.0'),
}));

import { showCompactBanner } from './banner.js';

describe('showCompactBanner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should box the logo with the subtitle and version centred below', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    showCompactBanner('graph');

    expect(logSpy).toHaveBeenNthCalledWith(1, chalk.cyan([
      '┌──────────┐',
      '│ ABCDEFGH │',
      '├──────────┤',
      '│  graph   │',
      '│  v1.0.0  │',
      '└──────────┘',
    ].join('\n')));
  });
});
