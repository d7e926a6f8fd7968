import * as fs from 'fs';
import * as path from 'path';
import {
  DEPENDENCY_SETS,
  MANUAL_DEPENDENCIES,
  PYTHON_FALLBACK_PACKAGES,
  PYTHON_REQUIREMENTS_FILE,
} from '../config';
import { packageManagerFor } from './package-managers';
import { describeFailure } from './system-executor';
import { Confirmer, HostProfile, InstallLayout, SystemExecutor } from './types';

export type ProvisionResult = 'provisioned' | 'declined';

/**
 * Best-effort dependency installation: a nonzero exit from the package
 * manager or pip is reported as a warning and the run continues.
 */
export class DependencyProvisioner {
  constructor(
    private executor: SystemExecutor,
    private confirmer: Confirmer,
    private layout: InstallLayout
  ) {}

  async provision(host: HostProfile): Promise<ProvisionResult> {
    console.log('\n📦 Installing system dependencies...');

    if (host.family === 'unknown') {
      console.warn(`⚠️  Unknown distro: ${host.distroId}`);
      console.log('Please install these dependencies manually:');
      for (const dependency of MANUAL_DEPENDENCIES) {
        console.log(`  - ${dependency}`);
      }

      if (!(await this.confirmer.askConfirmation('Continue anyway?'))) {
        console.log('Installation cancelled.');
        return 'declined';
      }
    } else {
      const manager = packageManagerFor(host.family, this.executor);
      const dependencySet = DEPENDENCY_SETS[host.family];

      if (!host.runtime.hasPip) {
        console.log(`Installing ${dependencySet.pipPackage}...`);
        const pip = await manager.installPip(dependencySet.pipPackage);
        if (pip.exitCode !== 0) {
          console.warn(`⚠️  Could not install ${dependencySet.pipPackage} (${describeFailure(pip)})`);
        }
      }

      const result = await manager.installPackages(dependencySet.packages);
      if (result.exitCode === 0) {
        console.log(`✓ System packages installed with ${manager.getName()}`);
      } else {
        console.warn(`⚠️  Some packages may already be installed (${manager.getName()} ${describeFailure(result)})`);
      }
    }

    await this.installPythonPackages();
    return 'provisioned';
  }

  async installPythonPackages(): Promise<void> {
    console.log('\n🐍 Installing Python dependencies...');

    const requirements = path.join(this.layout.projectDir, PYTHON_REQUIREMENTS_FILE);
    if (fs.existsSync(requirements)) {
      const result = await this.pip(['-r', requirements]);
      if (result === 0) {
        console.log(`✓ Installed packages from ${PYTHON_REQUIREMENTS_FILE}`);
        return;
      }
      console.warn(`⚠️  pip could not install ${PYTHON_REQUIREMENTS_FILE}, falling back to the default package list`);
    }

    const fallback = await this.pip(PYTHON_FALLBACK_PACKAGES);
    if (fallback === 0) {
      console.log('✓ Installed default Python packages');
    } else {
      console.warn(`⚠️  pip exited with ${fallback}; install ${PYTHON_FALLBACK_PACKAGES.join(' ')} manually`);
    }
  }

  private async pip(args: readonly string[]): Promise<number> {
    const result = await this.executor.run('pip3', ['install', '--user', ...args], { inheritOutput: true });
    return result.exitCode;
  }
}
