/**
 * hoststate — Shell command executor
 *
 * Runs commands with `sh -c` on this machine, or on the managed host via
 * the system `ssh` client when a target is configured. Authentication is
 * whatever the ssh client is set up for; BatchMode keeps it non-interactive.
 */

import { execFile } from 'node:child_process';
import type { CommandExecutor, CommandResult, ScanContext } from './types.js';

const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

export class ShellCommandExecutor implements CommandExecutor {
  private readonly sshTarget: string | undefined;

  constructor(sshTarget?: string) {
    this.sshTarget = sshTarget;
  }

  /** Program and argument vector for `command`. */
  argv(command: string, timeoutMs: number): [string, string[]] {
    if (this.sshTarget === undefined) {
      return ['sh', ['-c', command]];
    }
    const connectTimeout = Math.max(1, Math.ceil(timeoutMs / 1000));
    return [
      'ssh',
      ['-o', 'BatchMode=yes', '-o', `ConnectTimeout=${connectTimeout}`, this.sshTarget, command],
    ];
  }

  run(command: string, context: ScanContext): Promise<CommandResult> {
    const [file, args] = this.argv(command, context.timeoutMs);
    return new Promise((resolve, reject) => {
      execFile(
        file,
        args,
        {
          signal: context.signal,
          timeout: context.timeoutMs,
          maxBuffer: MAX_OUTPUT_BYTES,
          encoding: 'utf8',
        },
        (error, stdout, stderr) => {
          if (error === null) {
            resolve({ stdout, stderr, exitCode: 0 });
            return;
          }
          // Non-zero exit: the command ran, report its status
          if (typeof error.code === 'number') {
            resolve({ stdout, stderr, exitCode: error.code });
            return;
          }
          reject(error);
        },
      );
    });
  }
}
