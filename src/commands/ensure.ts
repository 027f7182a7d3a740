import { Command } from 'commander';

import { DependencyState } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCliContext, createInterruptSignal, createManager, type GlobalOptions } from '../cli/context.js';
import { formatStatusReport, hasFailures, summarizeStatuses } from './status-printer.js';
import { parsePositiveInteger } from './options.js';

interface EnsureOptions {
  upgrade?: boolean;
  concurrency?: number;
}

async function ensureCommand(options: EnsureOptions, command: Command): Promise<void> {
  const ctx = await createCliContext(command.optsWithGlobals<GlobalOptions>(), {
    concurrency: options.concurrency
  });
  const { output } = ctx;

  const manager = createManager(ctx, (name, state) => {
    if (state === DependencyState.Installing) {
      output.step(`Installing ${name}`);
    }
  });
  const statuses = await manager.ensureAll(ctx.manifest, ctx.platform, {
    signal: createInterruptSignal(output),
    upgrade: options.upgrade ?? false
  });

  output.message(formatStatusReport(statuses));

  const summary = summarizeStatuses(statuses);
  if (hasFailures(statuses)) {
    output.error(`Some dependencies could not be ensured (${summary})`);
    process.exitCode = 1;
    return;
  }
  output.success(`Dependencies ensured (${summary})`);
}

export function setupEnsureCommand(program: Command): void {
  program
    .command('ensure')
    .description('Install missing dependencies and verify them')
    .option('--upgrade', 'reinstall dependencies whose installed version is outdated')
    .option('--concurrency <n>', 'number of independent dependencies processed at once', parsePositiveInteger)
    .action(withErrorHandling(async (options: EnsureOptions, command: Command) => {
      await ensureCommand(options, command);
    }));
}
