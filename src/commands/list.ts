import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliContext, type GlobalOptions } from '../cli/context.js';
import { formatManifest } from './status-printer.js';

async function listCommand(command: Command): Promise<void> {
  const ctx = await createCliContext(command.optsWithGlobals<GlobalOptions>());
  ctx.output.note(formatManifest(ctx.manifest), ctx.manifestPath);
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List the dependencies declared in the manifest')
    .action(withErrorHandling(async (_options: Record<string, never>, command: Command) => {
      await listCommand(command);
    }));
}
