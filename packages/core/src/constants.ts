/**
 * Centralized constants for @incgraph/core.
 * This file contains the built-in defaults and display settings.
 */

// Directories (relative to the project root) that are never scanned
export const DEFAULT_BLACKLIST = ['.git', '.settings', '.vscode'] as const;

// Extension whitelist, split by file kind
export const HEADER_EXTENSIONS: readonly string[] = ['.h', '.hpp'];
export const SOURCE_EXTENSIONS: readonly string[] = ['.c', '.cc', '.cpp'];

// Output
export const DEFAULT_OUTPUT_DIR = './img/';
export const DEFAULT_FORMAT = 'svg';
export const OUTPUT_FORMATS = ['bmp', 'gif', 'jpg', 'png', 'pdf', 'svg'] as const;

// Node ids
export const GROUP_NODE_PREFIX = 'group - ';

// Display colors. Edges are coloured by the kind of the including file.
export const HEADER_EDGE_COLOR = 'red';
export const SOURCE_EDGE_COLOR = 'blue';
export const OTHER_EDGE_COLOR = 'black';
export const FILE_NODE_COLOR = '#b2dfee'; // lightblue2
export const GROUP_NODE_COLOR = '#90ee90'; // lightgreen

// Git
export const GIT_COMMAND_TIMEOUT_MS = 5000;
export const SHORT_HASH_LENGTH = 6;
