import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliContext, createInterruptSignal, createManager, type GlobalOptions } from '../cli/context.js';
import { formatStatusReport, needsAttention, summarizeStatuses } from './status-printer.js';

async function checkCommand(command: Command): Promise<void> {
  const ctx = await createCliContext(command.optsWithGlobals<GlobalOptions>());
  const { output } = ctx;

  const spinner = output.spinner();
  spinner.start(`Checking ${ctx.manifest.dependencies.length} dependencies for ${ctx.platform}`);
  const manager = createManager(ctx, name => spinner.message(`Checking ${name}`));
  const statuses = await manager.checkAll(ctx.manifest, ctx.platform, {
    signal: createInterruptSignal(output)
  });
  spinner.stop(`Checked ${ctx.manifest.name}`);

  output.message(formatStatusReport(statuses));

  const summary = summarizeStatuses(statuses);
  if (Array.from(statuses.values()).some(needsAttention)) {
    output.error(`One or more dependencies need attention (${summary})`);
    process.exitCode = 1;
    return;
  }
  output.success(`All dependencies satisfied (${summary})`);
}

export function setupCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Check dependencies without installing anything')
    .action(withErrorHandling(async (_options: Record<string, never>, command: Command) => {
      await checkCommand(command);
    }));
}
