import * as fs from 'fs';
import * as path from 'path';
import { describeFailure } from './system-executor';
import { ExecResult, FileOperations, FileOperationsByDomain, InstallLayout, PrivilegeDomain, SystemExecutor } from './types';

/**
 * Plain fs access. Copies merge into an existing destination and overwrite
 * files already there.
 */
export class LocalFileOperations implements FileOperations {
  constructor(public readonly domain: PrivilegeDomain) {}

  async ensureDir(dir: string): Promise<void> {
    fs.mkdirSync(dir, { recursive: true });
  }

  async copy(source: string, destination: string): Promise<void> {
    fs.mkdirSync(path.dirname(destination), { recursive: true });
    if (fs.statSync(source).isDirectory()) {
      fs.cpSync(source, destination, { recursive: true, force: true });
    } else {
      fs.copyFileSync(source, destination);
    }
  }

  async writeFile(destination: string, content: string, mode?: number): Promise<void> {
    fs.mkdirSync(path.dirname(destination), { recursive: true });
    fs.writeFileSync(destination, content);
    if (mode !== undefined) {
      fs.chmodSync(destination, mode);
    }
  }

  async remove(target: string): Promise<void> {
    fs.rmSync(target, { recursive: true, force: true });
  }
}

/**
 * Root-owned locations, written through sudo one command at a time.
 */
export class SudoFileOperations implements FileOperations {
  public readonly domain: PrivilegeDomain = 'system';

  constructor(private executor: SystemExecutor) {}

  async ensureDir(dir: string): Promise<void> {
    await this.sudo(['mkdir', '-p', dir]);
  }

  async copy(source: string, destination: string): Promise<void> {
    await this.sudo(['mkdir', '-p', path.dirname(destination)]);
    // -T merges into an existing destination directory instead of nesting inside it
    await this.sudo(['cp', '-rT', source, destination]);
  }

  async writeFile(destination: string, content: string, mode?: number): Promise<void> {
    await this.sudo(['mkdir', '-p', path.dirname(destination)]);
    await this.sudo(['tee', destination], content);
    if (mode !== undefined) {
      await this.sudo(['chmod', mode.toString(8), destination]);
    }
  }

  async remove(target: string): Promise<void> {
    await this.sudo(['rm', '-rf', target]);
  }

  private async sudo(args: string[], input?: string): Promise<ExecResult> {
    const result = await this.executor.run('sudo', args, { input });
    if (result.exitCode !== 0) {
      throw new Error(`sudo ${args[0]} failed (${describeFailure(result)})`);
    }
    return result;
  }
}

function nearestExistingDir(target: string): string {
  let current = path.resolve(target);
  while (!fs.existsSync(current) && path.dirname(current) !== current) {
    current = path.dirname(current);
  }
  return current;
}

export function isWritable(target: string): boolean {
  try {
    fs.accessSync(nearestExistingDir(target), fs.constants.W_OK);
    return true;
  } catch (error) {
    return false;
  }
}

/**
 * The user domain always writes directly. The system domain only goes through
 * sudo when the current process cannot write the system directories itself.
 */
export function createFileOperations(
  layout: InstallLayout,
  executor: SystemExecutor,
  canWrite: (target: string) => boolean = isWritable
): FileOperationsByDomain {
  const systemWritable = canWrite(layout.installDir) && canWrite(layout.binDir);
  return {
    system: systemWritable ? new LocalFileOperations('system') : new SudoFileOperations(executor),
    user: new LocalFileOperations('user'),
  };
}
