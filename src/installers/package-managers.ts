import { describeFailure } from './system-executor';
import { DistroFamily, ExecResult, SystemExecutor } from './types';

export abstract class PackageManager {
  constructor(protected executor: SystemExecutor) {}

  abstract getName(): string;
  abstract installPackages(names: readonly string[]): Promise<ExecResult>;

  async installPip(pipPackage: string): Promise<ExecResult> {
    return this.installPackages([pipPackage]);
  }

  protected sudo(args: readonly string[]): Promise<ExecResult> {
    return this.executor.run('sudo', args, { inheritOutput: true });
  }
}

export class AptPackageManager extends PackageManager {
  getName(): string {
    return 'apt';
  }

  async installPip(pipPackage: string): Promise<ExecResult> {
    return this.sudo(['apt', 'install', '-y', pipPackage]);
  }

  async installPackages(names: readonly string[]): Promise<ExecResult> {
    const update = await this.sudo(['apt', 'update']);
    if (update.exitCode !== 0) {
      console.warn(`⚠️  apt update failed (${describeFailure(update)}), using cached package lists`);
    }
    return this.sudo(['apt', 'install', '-y', ...names]);
  }
}

export class DnfPackageManager extends PackageManager {
  getName(): string {
    return 'dnf';
  }

  async installPackages(names: readonly string[]): Promise<ExecResult> {
    return this.sudo(['dnf', 'install', '-y', ...names]);
  }
}

export class PacmanPackageManager extends PackageManager {
  getName(): string {
    return 'pacman';
  }

  async installPip(pipPackage: string): Promise<ExecResult> {
    return this.sudo(['pacman', '-S', '--noconfirm', pipPackage]);
  }

  async installPackages(names: readonly string[]): Promise<ExecResult> {
    return this.sudo(['pacman', '-S', '--noconfirm', '--needed', ...names]);
  }
}

export class ZypperPackageManager extends PackageManager {
  getName(): string {
    return 'zypper';
  }

  async installPackages(names: readonly string[]): Promise<ExecResult> {
    return this.sudo(['zypper', 'install', '-y', ...names]);
  }
}

export function packageManagerFor(
  family: Exclude<DistroFamily, 'unknown'>,
  executor: SystemExecutor
): PackageManager {
  switch (family) {
    case 'debian':
      return new AptPackageManager(executor);
    case 'fedora':
      return new DnfPackageManager(executor);
    case 'arch':
      return new PacmanPackageManager(executor);
    case 'suse':
      return new ZypperPackageManager(executor);
  }
}
