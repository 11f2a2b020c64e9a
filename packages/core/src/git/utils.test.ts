import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';

type ExecCallback = (error: Error | null, result?: { stdout: string; stderr: string }) => void;

const execResponses = vi.hoisted(() => new Map<string, string | Error>());

vi.mock('child_process', () => ({
  exec: vi.fn((command: string, _options: unknown, callback: ExecCallback) => {
    const response = execResponses.get(command);
    if (response === undefined || response instanceof Error) {
      callback(response ?? new Error(`unexpected command: ${command}`));
    } else {
      callback(null, { stdout: response, stderr: '' });
    }
  }),
}));

import { exec } from 'child_process';
import { isGitRepo, describeTags, getShortCommit, isDirty } from './utils.js';

describe('Git Utils', () => {
  let testDir: string;

  beforeEach(async () => {
    execResponses.clear();
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'incgraph-test-git-'));
  });

  afterEach(async () => {
    vi.mocked(exec).mockClear();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('isGitRepo', () => {
    it('should return false for non-git directory', async () => {
      expect(await isGitRepo(testDir)).toBe(false);
    });

    it('should return true when a .git directory exists', async () => {
      await fs.mkdir(path.join(testDir, '.git'));
      expect(await isGitRepo(testDir)).toBe(true);
    });

    it('should return false for a missing directory', async () => {
      expect(await isGitRepo(path.join(testDir, 'does-not-exist'))).toBe(false);
    });
  });

  describe('describeTags', () => {
    it('should return the trimmed tag description', async () => {
      execResponses.set('git describe --tags', 'v1.2.0-3-gabc1234\n');

      expect(await describeTags(testDir)).toBe('v1.2.0-3-gabc1234');
      expect(exec).toHaveBeenCalledWith(
        'git describe --tags',
        { cwd: testDir, timeout: 5000 },
        expect.any(Function),
      );
    });

    it('should throw when there is no tag', async () => {
      execResponses.set('git describe --tags', new Error('No names found'));

      await expect(describeTags(testDir)).rejects.toThrow('Failed to describe tags');
    });
  });

  describe('getShortCommit', () => {
    it('should ask for a 6 character hash', async () => {
      execResponses.set('git rev-parse --short=6 HEAD', 'abc123\n');

      expect(await getShortCommit(testDir)).toBe('abc123');
    });

    it('should throw when git fails', async () => {
      await expect(getShortCommit(testDir)).rejects.toThrow('Failed to get current commit');
    });
  });

  describe('isDirty', () => {
    it('should be false for a clean tree', async () => {
      execResponses.set('git status --porcelain --untracked-files=no', '');

      expect(await isDirty(testDir)).toBe(false);
    });

    it('should be true when tracked files changed', async () => {
      execResponses.set('git status --porcelain --untracked-files=no', ' M src/main.c\n');

      expect(await isDirty(testDir)).toBe(true);
    });
  });
});
