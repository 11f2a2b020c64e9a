import { silentLogger, type Logger } from '../logger.js';
import { getErrorMessage } from '../errors/index.js';
import { describeTags, getShortCommit, isDirty, isGitRepo } from './utils.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a date as `DD-MM-YYYY HH.MM.SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getDate())}-${pad(date.getMonth() + 1)}-${date.getFullYear()}`;
  const time = `${pad(date.getHours())}.${pad(date.getMinutes())}.${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Names an output file after the state of the repository at `rootDir`.
 *
 * - outside a repository: `local - <timestamp>`
 * - tagged history: the `git describe --tags` output, else the short HEAD hash
 * - a dirty tree appends ` - <timestamp>`
 *
 * Never throws; any git failure falls back to the local name.
 */
export async function autoName(
  rootDir: string,
  now: Date = new Date(),
  logger: Logger = silentLogger
): Promise<string> {
  const timestamp = formatTimestamp(now);
  const localName = `local - ${timestamp}`;

  if (!(await isGitRepo(rootDir))) {
    return localName;
  }

  try {
    let id: string;
    try {
      id = await describeTags(rootDir);
    } catch (error) {
      logger.debug(`No tag description, using commit hash (${getErrorMessage(error)})`);
      id = await getShortCommit(rootDir);
    }

    return (await isDirty(rootDir)) ? `${id} - ${timestamp}` : id;
  } catch (error) {
    logger.warning(`Could not read git metadata, using a timestamp name: ${getErrorMessage(error)}`);
    return localName;
  }
}
