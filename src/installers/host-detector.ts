import * as fs from 'fs';
import { DetectionSource, DistroFamily, HostProfile, SystemExecutor } from './types';

const FAMILY_IDS: ReadonlyArray<[DistroFamily, readonly string[]]> = [
  ['debian', ['ubuntu', 'debian', 'linuxmint', 'pop', 'elementary', 'zorin']],
  ['fedora', ['fedora', 'rhel', 'centos', 'rocky', 'alma', 'almalinux']],
  ['arch', ['arch', 'manjaro', 'endeavouros', 'garuda']],
];

const SUSE_PREFIXES = ['opensuse', 'suse'];

export const OS_RELEASE_PATH = '/etc/os-release';

/**
 * Parse the KEY=value lines of an os-release file. Values may be wrapped in
 * single or double quotes; comments and blank lines are skipped.
 */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    const eq = line.indexOf('=');
    if (eq <= 0) {
      continue;
    }

    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
      value = value.slice(1, -1);
    }
    fields[key] = value;
  }

  return fields;
}

function familyOf(id: string): DistroFamily {
  for (const [family, ids] of FAMILY_IDS) {
    if (ids.includes(id)) {
      return family;
    }
  }
  if (SUSE_PREFIXES.some(prefix => id.startsWith(prefix))) {
    return 'suse';
  }
  return 'unknown';
}

/**
 * Map a distribution id to its family, trying each ID_LIKE word when the id
 * itself is not one we know.
 */
export function mapDistroFamily(id: string, idLike?: string): DistroFamily {
  const direct = familyOf(id.toLowerCase());
  if (direct !== 'unknown' || !idLike) {
    return direct;
  }

  for (const candidate of idLike.toLowerCase().split(/\s+/).filter(Boolean)) {
    const family = familyOf(candidate);
    if (family !== 'unknown') {
      return family;
    }
  }
  return 'unknown';
}

export class HostDetector {
  constructor(
    private executor: SystemExecutor,
    private osReleasePath: string = OS_RELEASE_PATH
  ) {}

  async detect(): Promise<HostProfile> {
    const { distroId, idLike, detectionSource } = await this.readDistroId();
    const pythonVersion = await this.detectPythonVersion();
    const hasPip = await this.executor.commandExists('pip3');

    return Object.freeze({
      distroId,
      family: mapDistroFamily(distroId, idLike),
      detectionSource,
      runtime: Object.freeze({ pythonVersion, hasPip }),
    });
  }

  private async readDistroId(): Promise<{ distroId: string; idLike?: string; detectionSource: DetectionSource }> {
    const fields = this.readOsRelease();
    if (fields?.ID) {
      return { distroId: fields.ID.toLowerCase(), idLike: fields.ID_LIKE, detectionSource: 'os-release' };
    }

    if (await this.executor.commandExists('lsb_release')) {
      const result = await this.executor.run('lsb_release', ['-si']);
      const id = result.stdout.trim().toLowerCase();
      if (result.exitCode === 0 && id) {
        return { distroId: id, detectionSource: 'lsb-release' };
      }
    }

    return { distroId: 'unknown', detectionSource: 'none' };
  }

  // An unreadable os-release is treated like a missing one
  private readOsRelease(): Record<string, string> | null {
    try {
      return parseOsRelease(fs.readFileSync(this.osReleasePath, 'utf-8'));
    } catch (error) {
      return null;
    }
  }

  private async detectPythonVersion(): Promise<string | null> {
    if (!(await this.executor.commandExists('python3'))) {
      return null;
    }

    const result = await this.executor.run('python3', [
      '-c',
      'import sys; print(f"{sys.version_info.major}.{sys.version_info.minor}")',
    ]);
    const version = result.stdout.trim();
    return result.exitCode === 0 && version ? version : null;
  }
}
