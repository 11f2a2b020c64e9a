import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('./utils.js', () => ({
  isGitRepo: vi.fn(),
  describeTags: vi.fn(),
  getShortCommit: vi.fn(),
  isDirty: vi.fn(),
}));

import { autoName, formatTimestamp } from './auto-name.js';
import { isGitRepo, describeTags, getShortCommit, isDirty } from './utils.js';
import type { Logger } from '../logger.js';

const NOW = new Date(2024, 0, 5, 9, 3, 7);

describe('formatTimestamp', () => {
  it('should zero-pad every field', () => {
    expect(formatTimestamp(NOW)).toBe('05-01-2024 09.03.07');
  });

  it('should keep two-digit fields as they are', () => {
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe('31-12-2023 23.59.58');
  });
});

describe('autoName', () => {
  beforeEach(() => {
    vi.mocked(isGitRepo).mockResolvedValue(true);
    vi.mocked(describeTags).mockResolvedValue('v2.0.1');
    vi.mocked(getShortCommit).mockResolvedValue('abc123');
    vi.mocked(isDirty).mockResolvedValue(false);
  });

  afterEach(() => {
    vi.resetAllMocks();
  });

  it('should use a local timestamp name outside a repository', async () => {
    vi.mocked(isGitRepo).mockResolvedValue(false);

    expect(await autoName('/project', NOW)).toBe('local - 05-01-2024 09.03.07');
    expect(describeTags).not.toHaveBeenCalled();
  });

  it('should use the tag description for a clean tree', async () => {
    expect(await autoName('/project', NOW)).toBe('v2.0.1');
  });

  it('should append the timestamp when the tree is dirty', async () => {
    vi.mocked(isDirty).mockResolvedValue(true);

    expect(await autoName('/project', NOW)).toBe('v2.0.1 - 05-01-2024 09.03.07');
  });

  it('should fall back to the short commit hash without tags', async () => {
    vi.mocked(describeTags).mockRejectedValue(new Error('No names found'));

    expect(await autoName('/project', NOW)).toBe('abc123');
  });

  it('should fall back to the local name when git fails', async () => {
    vi.mocked(describeTags).mockRejectedValue(new Error('No names found'));
    vi.mocked(getShortCommit).mockRejectedValue(new Error('bad HEAD'));
    const logger: Logger = { info: vi.fn(), warning: vi.fn(), error: vi.fn(), debug: vi.fn() };

    expect(await autoName('/project', NOW, logger)).toBe('local - 05-01-2024 09.03.07');
    expect(logger.warning).toHaveBeenCalledWith(
      'Could not read git metadata, using a timestamp name: bad HEAD',
    );
  });
});
