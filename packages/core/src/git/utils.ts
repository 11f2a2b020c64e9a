import { exec } from 'child_process';
import { promisify } from 'util';
import fs from 'fs/promises';
import path from 'path';
import { GIT_COMMAND_TIMEOUT_MS, SHORT_HASH_LENGTH } from '../constants.js';

const execAsync = promisify(exec);

/**
 * Checks if a directory is a git repository.
 *
 * @param rootDir - Directory to check
 * @returns true if directory is a git repo, false otherwise
 */
export async function isGitRepo(rootDir: string): Promise<boolean> {
  try {
    const gitDir = path.join(rootDir, '.git');
    await fs.access(gitDir);
    return true;
  } catch {
    return false;
  }
}

/**
 * Describes HEAD using the nearest tag (`git describe --tags`).
 *
 * @returns Tag description, e.g. "v1.2.0" or "v1.2.0-3-gabc1234"
 * @throws Error if there is no reachable tag or git fails
 */
export async function describeTags(rootDir: string): Promise<string> {
  try {
    const { stdout } = await execAsync('git describe --tags', {
      cwd: rootDir,
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });
    return stdout.trim();
  } catch (error) {
    throw new Error(`Failed to describe tags: ${error}`);
  }
}

/**
 * Gets the abbreviated hash of HEAD.
 *
 * @throws Error if not a git repo or git command fails
 */
export async function getShortCommit(rootDir: string): Promise<string> {
  try {
    const { stdout } = await execAsync(`git rev-parse --short=${SHORT_HASH_LENGTH} HEAD`, {
      cwd: rootDir,
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });
    return stdout.trim();
  } catch (error) {
    throw new Error(`Failed to get current commit: ${error}`);
  }
}

/**
 * Checks whether tracked files have uncommitted changes.
 * Untracked files do not make the tree dirty.
 *
 * @throws Error if git command fails
 */
export async function isDirty(rootDir: string): Promise<boolean> {
  try {
    const { stdout } = await execAsync('git status --porcelain --untracked-files=no', {
      cwd: rootDir,
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });
    return stdout.trim().length > 0;
  } catch (error) {
    throw new Error(`Failed to get working tree status: ${error}`);
  }
}
