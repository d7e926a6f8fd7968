import * as fs from 'fs';
import { BaseInstaller } from './base-installer';
import { parseKeyValueDescriptor } from './descriptors';
import { buildDesktopEntriesManifest, buildServiceDescriptorsManifest } from './manifest';
import { ManifestEntry } from './types';

/**
 * Components made only of generated key=value descriptors. On top of the base
 * checks every installed descriptor has to parse.
 */
abstract class DescriptorInstaller extends BaseInstaller {
  protected async validateInstallation(): Promise<boolean> {
    if (!(await super.validateInstallation())) {
      return false;
    }

    for (const entry of this.getEntries()) {
      if (fs.existsSync(entry.destination)) {
        parseKeyValueDescriptor(fs.readFileSync(entry.destination, 'utf-8'));
      }
    }
    return true;
  }
}

export class ServiceDescriptorsInstaller extends DescriptorInstaller {
  getName(): string {
    return 'service-descriptors';
  }

  getEntries(): ManifestEntry[] {
    return buildServiceDescriptorsManifest(this.layout);
  }
}

export class DesktopEntriesInstaller extends DescriptorInstaller {
  getName(): string {
    return 'desktop-entries';
  }

  getEntries(): ManifestEntry[] {
    return buildDesktopEntriesManifest(this.layout);
  }
}
