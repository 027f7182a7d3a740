#!/usr/bin/env node

import { Command } from 'commander';
import { LogLevel } from './types/index.js';
import { logger, parseLogLevel } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import type { GlobalOptions } from './cli/context.js';

// Import command setup functions
import { setupCheckCommand } from './commands/check.js';
import { setupEnsureCommand } from './commands/ensure.js';
import { setupInstallCommand } from './commands/install.js';
import { setupUninstallCommand } from './commands/uninstall.js';
import { setupListCommand } from './commands/list.js';

/**
 * hostdeps CLI - Main entry point
 *
 * Checks and installs the system-level tools an application declares in its
 * hostdeps manifest.
 */

const program = new Command();

program
  .name('hostdeps')
  .description('Check, install and verify the host dependencies declared in a hostdeps manifest')
  .version(getVersion())
  .option('-c, --config <path>', 'path to the manifest (default: hostdeps.yml in the current directory)')
  .option('-p, --platform <platform>', 'override platform detection (windows, linux, darwin)')
  .option('-l, --log-level <level>', 'log level (debug, info, warn, error)')
  .option('-v, --verbose', 'enable verbose output (same as --log-level debug)')
  .configureHelp({ sortSubcommands: true });

setupCheckCommand(program);
setupEnsureCommand(program);
setupInstallCommand(program);
setupUninstallCommand(program);
setupListCommand(program);

program.hook('preAction', () => {
  const opts = program.opts<GlobalOptions>();

  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  } else if (opts.logLevel) {
    const level = parseLogLevel(opts.logLevel);
    if (!level) {
      console.error(`❌ Invalid --log-level '${opts.logLevel}': expected debug, info, warn or error`);
      process.exit(1);
    }
    logger.setLevel(level);
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  try {
    if (argv.length <= 2) {
      program.outputHelp();
      return;
    }
    await program.parseAsync(argv);
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('hostdeps')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
