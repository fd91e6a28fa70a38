/**
 * CLI Commands - Public API
 */

export { executeVersionsCommand, type VersionsCommandDeps } from './versions.js';
export { executeInfoCommand, type InfoCommandDeps } from './info.js';
export { executePathCommand, type PathCommandDeps } from './path.js';
export { executeInvalidateCommand, type InvalidateCommandDeps } from './invalidate.js';
export { executeDiffCommand, type DiffCommandDeps } from './diff.js';
