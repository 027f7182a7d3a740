import { Command } from 'commander';

import { withErrorHandling, UserCancellationError, ValidationError } from '../utils/errors.js';
import { createCliContext, createManager, findDependency, type GlobalOptions } from '../cli/context.js';
import { formatStatusLine } from './status-printer.js';

interface UninstallOptions {
  yes?: boolean;
}

async function uninstallCommand(name: string, options: UninstallOptions, command: Command): Promise<void> {
  const ctx = await createCliContext(command.optsWithGlobals<GlobalOptions>());
  const dependency = findDependency(ctx.manifest, name);
  const { output } = ctx;

  if (!options.yes) {
    const confirmed = await output.confirm(`Uninstall ${name} from this machine?`, { initial: false });
    if (!confirmed && !ctx.interactive) {
      throw new ValidationError('Refusing to uninstall without confirmation; pass --yes in non-interactive sessions');
    }
    if (!confirmed) {
      throw new UserCancellationError();
    }
  }

  const status = await createManager(ctx).uninstallOne(dependency, ctx.platform);
  output.success(`Uninstalled ${name}`);
  output.message(formatStatusLine(status));
}

export function setupUninstallCommand(program: Command): void {
  program
    .command('uninstall')
    .description("Run a dependency's uninstall command")
    .argument('<name>', 'dependency name from the manifest')
    .option('-y, --yes', 'do not ask for confirmation')
    .action(withErrorHandling(async (name: string, options: UninstallOptions, command: Command) => {
      await uninstallCommand(name, options, command);
    }));
}
