import * as fs from 'fs';
import {
  FileOperations,
  FileOperationsByDomain,
  InstallationError,
  ManifestEntry,
  PrivilegeDomain,
  RemovalTarget,
} from './types';

const DOMAINS: readonly PrivilegeDomain[] = ['system', 'user'];

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Applies manifest entries with the file operations of each entry's privilege
 * domain. System entries are never written through the user operations and
 * vice versa, so everything under $HOME stays owned by the invoking user.
 */
export class FileProvisioner {
  constructor(private fileOps: FileOperationsByDomain) {}

  async apply(entries: ManifestEntry[], component: string): Promise<void> {
    for (const domain of DOMAINS) {
      const ops = this.fileOps[domain];
      for (const entry of entries.filter(e => e.domain === domain)) {
        await this.applyEntry(ops, entry, component);
      }
    }
  }

  async ensureDirs(dirs: string[], domain: PrivilegeDomain, component: string): Promise<void> {
    for (const dir of dirs) {
      try {
        await this.fileOps[domain].ensureDir(dir);
      } catch (error) {
        throw new InstallationError(
          `Failed to create ${dir}: ${errorMessage(error)}`,
          component,
          'install',
          error instanceof Error ? error : undefined
        );
      }
    }
  }

  /**
   * Best-effort removal. A missing target is not a failure; any other failure
   * is reported and the remaining targets are still removed.
   * Returns the number of targets that could not be removed.
   */
  async remove(targets: RemovalTarget[]): Promise<number> {
    let failures = 0;

    for (const target of targets) {
      try {
        await this.fileOps[target.domain].remove(target.path);
      } catch (error) {
        failures++;
        console.warn(`⚠️  Could not remove ${target.path}: ${errorMessage(error)}`);
      }
    }

    return failures;
  }

  private async applyEntry(ops: FileOperations, entry: ManifestEntry, component: string): Promise<void> {
    if (entry.kind === 'copy' && !fs.existsSync(entry.source)) {
      if (entry.required) {
        throw new InstallationError(`Required source is missing: ${entry.source}`, component, 'install');
      }
      console.warn(`⚠️  Skipping ${entry.id}: ${entry.source} not found`);
      return;
    }

    try {
      if (entry.kind === 'copy') {
        await ops.copy(entry.source, entry.destination);
      } else {
        await ops.writeFile(entry.destination, entry.render(), entry.mode);
      }
    } catch (error) {
      throw new InstallationError(
        `Failed to write ${entry.destination}: ${errorMessage(error)}`,
        component,
        'install',
        error instanceof Error ? error : undefined
      );
    }

    console.log(`✓ ${entry.destination}`);
  }
}
