import * as fs from 'fs';
import { FileProvisioner } from './file-provisioner';
import { ComponentInstaller, InstallationError, InstallLayout, ManifestEntry, RemovalTarget } from './types';

export abstract class BaseInstaller implements ComponentInstaller {
  constructor(
    protected layout: InstallLayout,
    protected provisioner: FileProvisioner
  ) {}

  abstract getName(): string;
  abstract getEntries(): ManifestEntry[];

  /**
   * Always rewrites every entry, so a second run replaces stale paths rather
   * than skipping an "already installed" component.
   */
  async install(): Promise<void> {
    const name = this.getName();
    console.log(`\n📦 Installing ${name}...`);

    await this.provisioner.apply(this.getEntries(), name);

    if (!(await this.validate())) {
      throw new InstallationError(`Installation validation failed for ${name}`, name, 'install');
    }
    console.log(`✓ ${name} installed`);
  }

  async uninstall(): Promise<number> {
    const name = this.getName();
    console.log(`🗑️  Removing ${name}...`);

    const failures = await this.provisioner.remove(this.getRemovalTargets());
    if (failures === 0) {
      console.log(`✓ ${name} removed`);
    }
    return failures;
  }

  /**
   * A component made only of optional entries counts as installed once any of
   * them is present.
   */
  async isInstalled(): Promise<boolean> {
    const entries = this.getEntries();
    const required = entries.filter(entry => entry.required);

    if (required.length === 0) {
      return entries.some(entry => fs.existsSync(entry.destination));
    }
    return required.every(entry => fs.existsSync(entry.destination));
  }

  async validate(): Promise<boolean> {
    try {
      return await this.validateInstallation();
    } catch (error) {
      return false;
    }
  }

  protected getRemovalTargets(): RemovalTarget[] {
    return this.getEntries().map(entry => ({ path: entry.destination, domain: entry.domain }));
  }

  /**
   * Required entries must exist and generated files must match what this
   * version renders. Optional entries are only checked when present.
   */
  protected async validateInstallation(): Promise<boolean> {
    for (const entry of this.getEntries()) {
      if (!fs.existsSync(entry.destination)) {
        if (entry.required) {
          return false;
        }
        continue;
      }
      if (entry.kind === 'generate' && fs.readFileSync(entry.destination, 'utf-8') !== entry.render()) {
        return false;
      }
    }
    return true;
  }
}
