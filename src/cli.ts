#!/usr/bin/env node
/**
 * ophys-cache CLI - Composition Root
 *
 * 1. Turns flags into config and a version selection
 * 2. Opens the project cache through the container
 * 3. Interprets the command's CliResult into process termination
 *
 * All command logic lives in src/cli/commands/*.ts
 */

import { Command } from 'commander';

import { container } from './di/container.js';
import { DI } from './di/tokens.js';
import { loadConfig, type ValidatedConfig } from './config/app-config.js';
import { openProjectCache } from './open-project-cache.js';
import type { ProjectCache } from './cache/project-cache.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import { CLIENT_NAME, CLIENT_VERSION } from './version.js';

import { interpretCliResult } from './cli/interpret-result.js';
import { misuse, cacheFailure, type CliResult } from './cli/types/index.js';
import { cliEnv, parseSelection, type GlobalFlags } from './cli/arguments.js';
import {
  executeVersionsCommand,
  executeInfoCommand,
  executePathCommand,
  executeInvalidateCommand,
  executeDiffCommand,
} from './cli/commands/index.js';

const terminator = new NodeProcessTerminator();

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('ophys-cache')
  .description('Inspect and fill the local cache of a cloud-hosted ophys release')
  .version(`${CLIENT_NAME} ${CLIENT_VERSION}`)
  .option('-p, --project <name>', 'project to open (default: OPHYS_CACHE_PROJECT)')
  .option('-r, --release <version>', 'open this exact manifest version')
  .option('-s, --select <mode>', 'latest | last_used | latest_downloaded', 'latest')
  .option('--cache-dir <dir>', 'cache root (default: OPHYS_CACHE_DIR)')
  .option('--verify <mode>', 'size | digest');

async function runWithCache(run: (cache: ProjectCache) => CliResult | Promise<CliResult>): Promise<void> {
  const flags = program.opts<GlobalFlags>();

  const selection = parseSelection(flags);
  if (selection.isErr()) return interpretCliResult(misuse(selection.error), terminator);

  const config = loadConfig({ env: cliEnv(flags, process.env) });
  if (config.isErr()) return interpretCliResult(cacheFailure(config.error), terminator);
  container.register<ValidatedConfig>(DI.Config.App, { useValue: config.value });

  const opened = await openProjectCache({ version: selection.value });
  const result = opened.isOk() ? await run(opened.value) : cacheFailure(opened.error);
  interpretCliResult(result, terminator);
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('versions')
  .description('List published versions of the project')
  .action(() => runWithCache((cache) => executeVersionsCommand(cache)));

program
  .command('info')
  .description('Show the selected release, its compatibility and tables')
  .action(() => runWithCache((cache) => executeInfoCommand(cache)));

program
  .command('path <recordType> <recordId>')
  .description('Download a record\'s artifact if needed and print its local path')
  .action((recordType: string, recordId: string) =>
    runWithCache((cache) => executePathCommand(cache, recordType, recordId))
  );

program
  .command('invalidate <fileId>')
  .description('Remove the cached copy of an artifact')
  .action((fileId: string) => runWithCache((cache) => executeInvalidateCommand(cache, fileId)));

program
  .command('diff <version>')
  .description('Compare the selected release with another version')
  .action((version: string) => runWithCache((cache) => executeDiffCommand(cache, version)));

await program.parseAsync(process.argv);
