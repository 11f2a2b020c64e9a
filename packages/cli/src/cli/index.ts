import { Command } from 'commander';
import { DEFAULT_FORMAT, OUTPUT_FORMATS } from '@incgraph/core';
import { getPackageVersion } from '../utils/version.js';
import { graphCommand } from './graph-cmd.js';

export const program = new Command();

program
  .name('incgraph')
  .description('Visualise #include dependencies between the files of a C/C++ project')
  .version(getPackageVersion())
  .argument('<root>', 'Root of the project directory')
  .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, DEFAULT_FORMAT)
  .option('-s, --strict', 'Merge multi-edges between the same two nodes')
  .option('-o, --output <path>', 'Output file path without extension (default: img/<git describe>)')
  .option('-b, --blacklist <dirs...>', 'Directories to skip, relative to root')
  .option('-g, --group <dirs...>', 'Directories to collapse into one node each, relative to root')
  .option('-t, --tree', 'Print the graph as a tree in the terminal')
  .option('-v, --verbose', 'Log discovered files and unresolved includes')
  .action(graphCommand);
