import { BaseInstaller } from './base-installer';
import { buildProgramFilesManifest } from './manifest';
import { ManifestEntry, RemovalTarget } from './types';

/**
 * Application sources under the system install directory plus the three
 * launcher wrappers in the system bin directory.
 */
export class ProgramFilesInstaller extends BaseInstaller {
  getName(): string {
    return 'program-files';
  }

  getEntries(): ManifestEntry[] {
    return buildProgramFilesManifest(this.layout);
  }

  protected getRemovalTargets(): RemovalTarget[] {
    const wrappers = this.getEntries()
      .filter(entry => entry.kind === 'generate')
      .map(entry => ({ path: entry.destination, domain: entry.domain }));

    return [...wrappers, { path: this.layout.installDir, domain: 'system' }];
  }
}
