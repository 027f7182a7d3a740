import { Command } from 'commander';

import { DependencyState } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCliContext, createManager, findDependency, type GlobalOptions } from '../cli/context.js';
import { formatStatusLine } from './status-printer.js';

async function installCommand(name: string, command: Command): Promise<void> {
  const ctx = await createCliContext(command.optsWithGlobals<GlobalOptions>());
  const dependency = findDependency(ctx.manifest, name);
  const { output } = ctx;

  const spinner = output.spinner();
  spinner.start(`Installing ${name}`);
  const status = await createManager(ctx).installOne(dependency, ctx.platform);
  spinner.stop();

  output.message(formatStatusLine(status));
  if (status.state === DependencyState.Failed) {
    process.exitCode = 1;
  }
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .description('Install (or reinstall an outdated) single dependency, ignoring its prerequisites')
    .argument('<name>', 'dependency name from the manifest')
    .action(withErrorHandling(async (name: string, _options: Record<string, never>, command: Command) => {
      await installCommand(name, command);
    }));
}
