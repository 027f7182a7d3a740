/**
 * Command Executor
 *
 * Renders a command template and runs it as a single foreground subprocess.
 * Spawning is delegated to a CommandRunner so tests can substitute a fake and
 * count invocations.
 */

import { spawn } from 'child_process';
import { logger } from '../../utils/logger.js';
import { CommandFailedError, TimeoutError, ValidationError } from '../../utils/errors.js';
import { renderTemplate, type Substitutions } from './command-template.js';

export interface RunOptions {
  /** Required; the subprocess is terminated once it elapses */
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface RunResult {
  /** null when the process could not be started or was killed by a signal */
  exitCode: number | null;
  /** Combined stdout and stderr, in arrival order */
  output: string;
  timedOut: boolean;
  /** Set when the binary could not be started (e.g. ENOENT) */
  spawnError?: string;
}

export interface CommandRunner {
  run(argv: string[], options: RunOptions): Promise<RunResult>;
}

export interface CommandOutcome {
  exitCode: number;
  output: string;
}

/** Grace period between SIGTERM and SIGKILL for a timed-out subprocess */
const KILL_GRACE_MS = 2000;

/**
 * Runs commands with child_process.spawn (no shell).
 *
 * Off Windows the child leads its own process group, so a timeout signals the
 * whole group. Once the grace period after SIGKILL is over the pipes are
 * destroyed and the call settles even if some descendant still holds them.
 */
export class SpawnCommandRunner implements CommandRunner {
  constructor(
    private readonly hostPlatform: NodeJS.Platform = process.platform,
    private readonly killGraceMs: number = KILL_GRACE_MS
  ) {}

  run(argv: string[], options: RunOptions): Promise<RunResult> {
    const [command, ...args] = argv;
    const ownGroup = this.hostPlatform !== 'win32';

    return new Promise<RunResult>(resolve => {
      const chunks: Buffer[] = [];
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        shell: false,
        windowsHide: true,
        detached: ownGroup,
        stdio: ['ignore', 'pipe', 'pipe']
      });

      const output = (): string => Buffer.concat(chunks).toString('utf8');

      const finish = (result: RunResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        resolve(result);
      };

      const signal = (name: NodeJS.Signals): void => {
        if (ownGroup && child.pid !== undefined) {
          try {
            process.kill(-child.pid, name);
            return;
          } catch (error) {
            logger.debug(`Could not signal process group ${child.pid}`, { error });
          }
        }
        child.kill(name);
      };

      const abandon = (): void => {
        child.stdout?.destroy();
        child.stderr?.destroy();
        finish({ exitCode: child.exitCode, output: output(), timedOut: true });
      };

      const timer = setTimeout(() => {
        timedOut = true;
        logger.debug(`Timed out after ${options.timeoutMs}ms: ${argv.join(' ')}`);
        signal('SIGTERM');
        killTimer = setTimeout(() => {
          signal('SIGKILL');
          killTimer = setTimeout(abandon, this.killGraceMs);
        }, this.killGraceMs);
      }, options.timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => chunks.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => chunks.push(chunk));

      child.on('error', error => {
        finish({ exitCode: null, output: output(), timedOut, spawnError: error.message });
      });

      child.on('exit', () => {
        // Descendants may keep the pipes open past a timeout
        if (timedOut) abandon();
      });

      child.on('close', code => {
        finish({ exitCode: code, output: output(), timedOut });
      });
    });
  }
}

export class CommandExecutor {
  constructor(private readonly runner: CommandRunner = new SpawnCommandRunner()) {}

  /**
   * Render and run a command template.
   *
   * @throws TemplateError before anything is spawned when a placeholder cannot be resolved
   * @throws TimeoutError when the subprocess outlives `timeoutMs`
   * @throws CommandFailedError on a non-zero exit or when the binary cannot be started
   */
  async run(template: string[], substitutions: Substitutions, options: RunOptions): Promise<CommandOutcome> {
    if (template.length === 0) {
      throw new ValidationError('Command template is empty');
    }
    if (!(options.timeoutMs > 0)) {
      throw new ValidationError(`Command timeout must be positive (got ${options.timeoutMs})`);
    }

    const argv = renderTemplate(template, substitutions);
    logger.debug(`Running command: ${argv.join(' ')}`, { timeoutMs: options.timeoutMs });

    const result = await this.runner.run(argv, options);

    if (result.timedOut) {
      throw new TimeoutError(`Command '${argv.join(' ')}'`, options.timeoutMs);
    }
    if (result.spawnError !== undefined) {
      logger.debug(`Command could not be started: ${result.spawnError}`);
      throw new CommandFailedError(argv, null, result.output || result.spawnError);
    }
    if (result.exitCode !== 0) {
      throw new CommandFailedError(argv, result.exitCode, result.output);
    }

    return { exitCode: 0, output: result.output };
  }
}
