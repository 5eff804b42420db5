import { spawn } from 'child_process';
import { CommandOptions, CommandResult, CommandRunner } from './types';

/**
 * Spawns commands without a shell and buffers their output.
 */
export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly baseEnv: Record<string, string | undefined>) {}

  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise(resolve => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (result: CommandResult) => {
        if (!settled) {
          settled = true;
          resolve(result);
        }
      };

      const child = spawn(command, args, {
        cwd: options.cwd,
        env: { ...this.baseEnv, ...options.env },
        timeout: options.timeoutMs
      });

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      // EPIPE when the child exits before reading its input; the exit code reports the failure
      child.stdin.on('error', (error: Error) => {
        stderr += `stdin: ${error.message}\n`;
      });

      child.on('error', (error: Error) => {
        finish({ ok: false, exitCode: null, stdout, stderr, error: error.message });
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          finish({ ok: true, exitCode: 0, stdout, stderr });
          return;
        }
        const reason = signal ? `was terminated by ${signal}` : `exited with code ${code}`;
        finish({ ok: false, exitCode: code, stdout, stderr, error: `${command} ${reason}` });
      });

      if (options.input !== undefined) {
        child.stdin.end(options.input);
      } else {
        child.stdin.end();
      }
    });
  }
}

/** Last non-empty line of a command's diagnostics, for one-line log messages */
export function describeFailure(result: CommandResult): string {
  const lastLine = (text: string) => text.split('\n').map(line => line.trim()).filter(Boolean).pop();
  return lastLine(result.stderr) ?? result.error ?? lastLine(result.stdout) ?? 'unknown error';
}
