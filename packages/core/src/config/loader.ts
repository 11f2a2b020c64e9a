import fs from 'fs';
import path from 'path';
import { DEFAULT_BLACKLIST, DEFAULT_OUTPUT_DIR } from '../constants.js';
import { ConfigError, IncgraphErrorCode, getErrorMessage } from '../errors/index.js';
import { GraphOptionsSchema, type GraphConfig, type GraphOptions } from './schema.js';

/**
 * Validates raw caller options (see {@link GraphOptions}) and merges them
 * with the built-in defaults.
 *
 * User blacklist entries are appended to the default set; groups keep the
 * order they were given in, since the first matching group wins.
 *
 * @throws ConfigError when an option is invalid or the root is not a directory
 */
export function createGraphConfig(options: GraphOptions | Record<string, unknown>): GraphConfig {
  const parsed = GraphOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    const code = field === 'format'
      ? IncgraphErrorCode.UNSUPPORTED_FORMAT
      : IncgraphErrorCode.CONFIG_INVALID;
    throw new ConfigError(`Invalid option "${field}": ${issue.message}`, { field }, code);
  }

  const { blacklist, group, strict, format, output } = parsed.data;
  const root = path.resolve(parsed.data.root);

  let stats: fs.Stats | undefined;
  try {
    stats = fs.statSync(root, { throwIfNoEntry: false });
  } catch (error) {
    throw new ConfigError(
      `Cannot access root directory ${root}: ${getErrorMessage(error)}`,
      { root },
      IncgraphErrorCode.ROOT_NOT_FOUND
    );
  }
  if (!stats?.isDirectory()) {
    throw new ConfigError(
      `Root directory not found: ${root}`,
      { root },
      IncgraphErrorCode.ROOT_NOT_FOUND
    );
  }

  const resolveAll = (dirs: readonly string[]): readonly string[] =>
    Object.freeze(dirs.map(dir => path.resolve(root, dir)));

  return Object.freeze({
    root,
    blacklist: resolveAll([...DEFAULT_BLACKLIST, ...blacklist]),
    groups: resolveAll(group),
    strict,
    format,
    output,
  });
}

/**
 * Path (without extension) the rendered image is written to.
 */
export function resolveOutputPath(config: GraphConfig, autoName: string): string {
  return config.output ?? path.join(DEFAULT_OUTPUT_DIR, autoName);
}
