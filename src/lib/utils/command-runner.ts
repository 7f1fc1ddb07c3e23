import { execFile } from 'child_process';
import { createLogger } from '../logger.js';

const log = createLogger('exec');

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Executes an external program; rejects with CommandError on non-zero exit. */
export type CommandRunner = (file: string, args: readonly string[], input?: string) => Promise<CommandResult>;

export class CommandError extends Error {
  constructor(
    readonly file: string,
    readonly args: readonly string[],
    readonly exitCode: number | string | undefined,
    readonly stdout: string,
    readonly stderr: string,
    options?: { cause?: unknown },
  ) {
    super(`${file} ${args.join(' ')} exited with ${exitCode ?? 'unknown status'}${stderr ? `: ${stderr.trim()}` : ''}`, options);
    this.name = 'CommandError';
  }

  /** Checker output worth showing to the operator. */
  get output(): string {
    return (this.stderr || this.stdout).trim();
  }
}

export const execRunner: CommandRunner = (file, args, input) =>
  new Promise((resolve, reject) => {
    log.debug('exec %s %o', file, args);
    const child = execFile(file, [...args], { encoding: 'utf-8' }, (error, stdout, stderr) => {
      if (error) {
        reject(new CommandError(file, args, error.code ?? undefined, stdout, stderr, { cause: error }));
        return;
      }
      resolve({ stdout, stderr });
    });
    if (input !== undefined) {
      child.stdin?.end(input);
    }
  });
