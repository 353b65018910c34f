import { execa } from 'execa';

export interface ExecutionResult {
  exitCode: number | undefined;
  timedOut: boolean;
  stdout: string;
  stderr: string;
}

/**
 * Runs a job's command. Implementations throw only for faults that
 * prevented the command from being run at all.
 */
export interface CommandExecutor {
  execute(command: string, timeoutMs: number): Promise<ExecutionResult>;
}

export function succeeded(result: ExecutionResult): boolean {
  return result.exitCode === 0 && !result.timedOut;
}

/**
 * Executes commands through the platform shell.
 */
export class ShellExecutor implements CommandExecutor {
  async execute(command: string, timeoutMs: number): Promise<ExecutionResult> {
    const proc = await execa(command, {
      shell: true,
      reject: false,
      timeout: timeoutMs,
      stdin: 'ignore',
      windowsHide: true,
    });

    return {
      exitCode: proc.exitCode,
      timedOut: proc.timedOut,
      stdout: proc.stdout,
      stderr: proc.stderr,
    };
  }
}

export function truncate(s: string, max = 4000) {
  if (s.length <= max) return s;
  return s.slice(0, max) + `\n...[truncated ${s.length - max} chars]`;
}
