import { spawn } from 'child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
}

const SPAWN_FAILED = 127;

/**
 * Runs an external binary to completion. Never rejects: a binary that cannot
 * be started resolves with code 127 and the spawn error as stderr.
 */
export function runCommand(command: string, args: string[]): Promise<CommandResult> {
  return new Promise((resolve) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (result: CommandResult): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      finish({ stdout, stderr, code: code ?? 1 });
    });

    proc.on('error', (err) => {
      finish({ stdout, stderr: err.message, code: SPAWN_FAILED });
    });
  });
}

export type CommandRunner = typeof runCommand;
