import { BaseInstaller } from './base-installer';
import { buildNautilusExtensionManifest } from './manifest';
import { ManifestEntry } from './types';

export class NautilusExtensionInstaller extends BaseInstaller {
  getName(): string {
    return 'nautilus-extension';
  }

  getEntries(): ManifestEntry[] {
    return buildNautilusExtensionManifest(this.layout);
  }
}
