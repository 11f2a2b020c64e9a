import chalk from 'chalk';
import ora from 'ora';
import {
  AsciiGraphRenderer,
  autoName,
  buildDependencyGraph,
  createGraphConfig,
  IncgraphErrorCode,
  isIncgraphError,
  resolveOutputPath,
  wrapError,
} from '@incgraph/core';
import type { DependencyGraph, GraphConfig, Logger } from '@incgraph/core';
import { renderGraph } from '../render/dot-renderer.js';
import { showCompactBanner } from '../utils/banner.js';
import { createCliLogger } from '../utils/logger.js';

export interface GraphCommandOptions {
  format?: string;
  strict?: boolean;
  output?: string;
  blacklist?: string[];
  group?: string[];
  tree?: boolean;
  verbose?: boolean;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function scan(config: GraphConfig, logger: Logger, verbose: boolean): DependencyGraph {
  // Debug lines would be overwritten by a live spinner
  const spinner = ora({ text: `Scanning ${config.root}...`, isEnabled: !verbose }).start();
  try {
    const graph = buildDependencyGraph(config, logger);
    spinner.succeed(chalk.green(
      `Built graph: ${plural(graph.nodes.length, 'node')}, ${plural(graph.edges.length, 'edge')}`
    ));
    return graph;
  } catch (error) {
    spinner.fail(chalk.red('Scan failed'));
    throw error;
  }
}

async function outputPathFor(config: GraphConfig, logger: Logger): Promise<string> {
  if (config.output) {
    return config.output;
  }
  return resolveOutputPath(config, await autoName(config.root, new Date(), logger));
}

/**
 * Builds the include graph of a C/C++ tree and renders it with Graphviz.
 */
export async function graphCommand(root: string, options: GraphCommandOptions): Promise<void> {
  showCompactBanner('C/C++ include graph');
  const verbose = options.verbose ?? false;
  const logger = createCliLogger(verbose);

  try {
    const config = createGraphConfig({
      root,
      blacklist: options.blacklist,
      group: options.group,
      strict: options.strict,
      format: options.format,
      output: options.output,
    });

    const graph = scan(config, logger, verbose);

    if (options.tree) {
      logger.info('');
      logger.info(new AsciiGraphRenderer().render(graph));
      logger.info('');
    }

    const outputPath = await outputPathFor(config, logger);
    const spinner = ora(`Rendering ${config.format}...`).start();
    try {
      const file = await renderGraph(graph, { outputPath, format: config.format });
      spinner.succeed(chalk.green(`Graph written to ${file}`));
    } catch (error) {
      spinner.fail(chalk.red('Rendering failed'));
      throw error;
    }
  } catch (error) {
    const failure = isIncgraphError(error) ? error : wrapError(error, 'Unexpected failure');
    logger.error(`Error: ${failure.message}`);
    if (verbose) {
      logger.debug(failure.code === IncgraphErrorCode.INTERNAL_ERROR
        ? failure.stack ?? ''
        : JSON.stringify(failure.context ?? {}, null, 2));
    }
    process.exit(1);
  }
}
