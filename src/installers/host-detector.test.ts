import * as fs from 'fs';
import * as path from 'path';
import { HostDetector, mapDistroFamily, parseOsRelease } from './host-detector';
import { FakeExecutor, TEST_TEMP_DIR, writeOsRelease } from '../test-setup';

describe('parseOsRelease', () => {
  it('should read quoted and unquoted values', () => {
    const fields = parseOsRelease([
      'NAME="Ubuntu"',
      "VERSION_ID='24.04'",
      'ID=ubuntu',
      'ID_LIKE=debian',
    ].join('\n'));

    expect(fields).toEqual({
      NAME: 'Ubuntu',
      VERSION_ID: '24.04',
      ID: 'ubuntu',
      ID_LIKE: 'debian',
    });
  });

  it('should skip comments, blank lines and lines without a key', () => {
    const fields = parseOsRelease('# generated\n\n=orphan\nID=arch\n');
    expect(fields).toEqual({ ID: 'arch' });
  });

  it('should keep a lone quote character as the value', () => {
    expect(parseOsRelease('PRETTY_NAME="')).toEqual({ PRETTY_NAME: '"' });
  });
});

describe('mapDistroFamily', () => {
  it.each([
    ['ubuntu', 'debian'],
    ['debian', 'debian'],
    ['linuxmint', 'debian'],
    ['pop', 'debian'],
    ['elementary', 'debian'],
    ['zorin', 'debian'],
    ['fedora', 'fedora'],
    ['rhel', 'fedora'],
    ['centos', 'fedora'],
    ['rocky', 'fedora'],
    ['alma', 'fedora'],
    ['arch', 'arch'],
    ['manjaro', 'arch'],
    ['endeavouros', 'arch'],
    ['garuda', 'arch'],
    ['opensuse-tumbleweed', 'suse'],
    ['opensuse-leap', 'suse'],
    ['suse', 'suse'],
    ['gentoo', 'unknown'],
  ])('should map %s to %s', (id, family) => {
    expect(mapDistroFamily(id)).toBe(family);
  });

  it('should fall back to ID_LIKE when the id is not known', () => {
    expect(mapDistroFamily('kali', 'debian')).toBe('debian');
    expect(mapDistroFamily('nobara', 'rhel centos fedora')).toBe('fedora');
  });

  it('should prefer the id over ID_LIKE', () => {
    expect(mapDistroFamily('manjaro', 'debian')).toBe('arch');
  });

  it('should stay unknown when nothing in ID_LIKE matches', () => {
    expect(mapDistroFamily('nixos', 'nix')).toBe('unknown');
  });

  it('should ignore case', () => {
    expect(mapDistroFamily('Ubuntu')).toBe('debian');
  });
});

describe('HostDetector', () => {
  let executor: FakeExecutor;

  beforeEach(() => {
    executor = new FakeExecutor();
  });

  it('should detect the family and runtime from os-release', async () => {
    const osRelease = writeOsRelease('NAME="Fedora Linux"\nID=fedora\n');

    const host = await new HostDetector(executor, osRelease).detect();

    expect(host).toEqual({
      distroId: 'fedora',
      family: 'fedora',
      detectionSource: 'os-release',
      runtime: { pythonVersion: '3.12', hasPip: true },
    });
  });

  it('should return a frozen profile', async () => {
    const host = await new HostDetector(executor, writeOsRelease('ID=arch\n')).detect();

    expect(Object.isFrozen(host)).toBe(true);
    expect(Object.isFrozen(host.runtime)).toBe(true);
  });

  it('should fall back to lsb_release when os-release is missing', async () => {
    executor.available.add('lsb_release');
    executor.respond('lsb_release -si', { stdout: 'LinuxMint\n' });

    const host = await new HostDetector(executor, path.join(TEST_TEMP_DIR, 'missing')).detect();

    expect(host.distroId).toBe('linuxmint');
    expect(host.family).toBe('debian');
    expect(host.detectionSource).toBe('lsb-release');
  });

  it('should fall back to lsb_release when os-release cannot be read', async () => {
    const unreadable = path.join(TEST_TEMP_DIR, 'etc', 'os-release');
    fs.mkdirSync(unreadable, { recursive: true });
    executor.available.add('lsb_release');
    executor.respond('lsb_release -si', { stdout: 'Fedora\n' });

    const host = await new HostDetector(executor, unreadable).detect();

    expect(host.family).toBe('fedora');
    expect(host.detectionSource).toBe('lsb-release');
  });

  it('should report unknown when neither source is available', async () => {
    const host = await new HostDetector(executor, path.join(TEST_TEMP_DIR, 'missing')).detect();

    expect(host.distroId).toBe('unknown');
    expect(host.family).toBe('unknown');
    expect(host.detectionSource).toBe('none');
    expect(executor.lines()).not.toContain('lsb_release -si');
  });

  it('should report unknown when lsb_release fails', async () => {
    executor.available.add('lsb_release');
    executor.respond('lsb_release -si', { exitCode: 1, stderr: 'No LSB modules are available.' });

    const host = await new HostDetector(executor, path.join(TEST_TEMP_DIR, 'missing')).detect();

    expect(host.family).toBe('unknown');
    expect(host.detectionSource).toBe('none');
  });

  it('should report a missing Python runtime', async () => {
    executor.available.delete('python3');
    executor.available.delete('pip3');

    const host = await new HostDetector(executor, writeOsRelease('ID=debian\n')).detect();

    expect(host.runtime).toEqual({ pythonVersion: null, hasPip: false });
    expect(executor.lines().some(line => line.startsWith('python3'))).toBe(false);
  });
});
