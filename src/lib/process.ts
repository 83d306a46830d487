import { spawn } from 'node:child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  cwd?: string;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
}

/**
 * Run an external command to completion and capture its output.
 * Never rejects for a non-zero exit; a command that cannot be started at all
 * (e.g. not on PATH) resolves with exit code 127 and the spawn error in stderr.
 */
export function runCommand(
  command: string,
  args: string[],
  opts?: RunOptions,
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      cwd: opts?.cwd,
      stdio: [opts?.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (err) => {
      finish({ stdout: '', stderr: `Failed to execute ${command}: ${err.message}`, exitCode: 127 });
    });

    proc.on('close', (code) => {
      finish({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode: code ?? 1 });
    });

    if (opts?.input !== undefined && proc.stdin) {
      proc.stdin.on('error', () => {
        // child exited before reading its input; exit status reports the failure
      });
      proc.stdin.end(opts.input);
    }
  });
}
