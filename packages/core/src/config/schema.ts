import { z } from 'zod';
import { DEFAULT_FORMAT, OUTPUT_FORMATS } from '../constants.js';

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Schema for the options a caller (the CLI) hands to the engine.
 *
 * Paths in `blacklist` and `group` are relative to `root`.
 */
export const GraphOptionsSchema = z.object({
  root: z.string()
    .min(1, 'Root directory cannot be empty')
    .describe('Root of the project directory'),
  blacklist: z.array(z.string().min(1, 'Blacklisted directory cannot be empty'))
    .default([])
    .describe('Directories excluded from the scan, relative to root'),
  group: z.array(z.string().min(1, 'Group directory cannot be empty'))
    .default([])
    .describe('Directories collapsed into a single node, relative to root'),
  strict: z.boolean()
    .default(false)
    .describe('Merge multi-edges when rendering'),
  format: z.enum(OUTPUT_FORMATS)
    .default(DEFAULT_FORMAT)
    .describe('Format of the output image'),
  output: z.string()
    .min(1, 'Output path cannot be empty')
    .optional()
    .describe('Output file path without extension; auto-named when omitted'),
});

export type GraphOptions = z.input<typeof GraphOptionsSchema>;

/**
 * Run configuration. Built once at startup and never mutated.
 * All paths are absolute.
 */
export interface GraphConfig {
  readonly root: string;
  readonly blacklist: readonly string[];
  readonly groups: readonly string[];
  readonly strict: boolean;
  readonly format: OutputFormat;
  readonly output?: string;
}
