import { spawnSync } from 'child_process';
import { isDebugEnabled } from '../config';
import { ExecOptions, ExecResult, SystemExecutor } from './types';

/**
 * Runs host commands synchronously, one at a time.
 * A command that cannot be spawned at all (missing binary) is reported as
 * exit code 127, the same code a shell would give.
 */
export class ChildProcessExecutor implements SystemExecutor {
  constructor(private debug: boolean = isDebugEnabled()) {}

  async run(command: string, args: readonly string[], options: ExecOptions = {}): Promise<ExecResult> {
    if (this.debug) {
      console.log(`$ ${[command, ...args].join(' ')}`);
    }

    const result = spawnSync(command, args, {
      encoding: 'utf-8',
      input: options.input,
      stdio: options.inheritOutput
        ? ['inherit', 'inherit', 'inherit']
        : [options.input === undefined ? 'inherit' : 'pipe', 'pipe', 'pipe'],
    });

    if (result.error) {
      return { stdout: '', stderr: result.error.message, exitCode: 127 };
    }

    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: result.status ?? 1,
    };
  }

  async commandExists(name: string): Promise<boolean> {
    const result = await this.run('sh', ['-c', `command -v ${name}`]);
    return result.exitCode === 0;
  }
}

export function describeFailure(result: ExecResult): string {
  const detail = result.stderr.trim().split('\n').filter(Boolean).pop();
  return detail ? `exit ${result.exitCode}: ${detail}` : `exit ${result.exitCode}`;
}
