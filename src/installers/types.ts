export type DistroFamily = 'debian' | 'fedora' | 'arch' | 'suse' | 'unknown';

export type DetectionSource = 'os-release' | 'lsb-release' | 'none';

export interface RuntimeInfo {
  pythonVersion: string | null;
  hasPip: boolean;
}

export interface HostProfile {
  readonly distroId: string;
  readonly family: DistroFamily;
  readonly detectionSource: DetectionSource;
  readonly runtime: Readonly<RuntimeInfo>;
}

export interface DependencySet {
  pipPackage: string;
  packages: readonly string[];
}

export interface InstallLayout {
  projectDir: string;
  binDir: string;
  installDir: string;
  systemdUserDir: string;
  dbusServicesDir: string;
  applicationsDir: string;
  autostartDir: string;
  configDir: string;
  dataDir: string;
  conversationsDir: string;
  cacheDir: string;
  nautilusExtensionsDir: string;
}

// 'system' entries need root; 'user' entries must stay owned by the invoking user
export type PrivilegeDomain = 'system' | 'user';

interface ManifestEntryBase {
  id: string;
  domain: PrivilegeDomain;
  destination: string;
  required: boolean;
  mode?: number;
}

export interface CopyEntry extends ManifestEntryBase {
  kind: 'copy';
  source: string;
}

export interface GeneratedEntry extends ManifestEntryBase {
  kind: 'generate';
  render(): string;
}

export type ManifestEntry = CopyEntry | GeneratedEntry;

export type ServiceState =
  | 'absent'
  | 'installed-disabled'
  | 'installed-enabled-stopped'
  | 'installed-enabled-running';

export type InstallOutcome = 'completed' | 'cancelled';

export type UninstallOutcome =
  | 'cancelled-at-gate-1'
  | 'completed-data-preserved'
  | 'completed-data-deleted';

export interface ExecOptions {
  input?: string;
  inheritOutput?: boolean;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Every command that touches the package database or the service manager
 * goes through this, so tests can substitute a recording fake.
 */
export interface SystemExecutor {
  run(command: string, args: readonly string[], options?: ExecOptions): Promise<ExecResult>;
  commandExists(name: string): Promise<boolean>;
}

export interface Confirmer {
  askConfirmation(message: string): Promise<boolean>;
}

export interface FileOperations {
  readonly domain: PrivilegeDomain;
  ensureDir(dir: string): Promise<void>;
  copy(source: string, destination: string): Promise<void>;
  writeFile(destination: string, content: string, mode?: number): Promise<void>;
  remove(target: string): Promise<void>;
}

export type FileOperationsByDomain = Record<PrivilegeDomain, FileOperations>;

export interface RemovalTarget {
  path: string;
  domain: PrivilegeDomain;
}

export interface ComponentInstaller {
  install(): Promise<void>;
  /** Resolves with the number of targets that could not be removed. */
  uninstall(): Promise<number>;
  isInstalled(): Promise<boolean>;
  validate(): Promise<boolean>;
  getName(): string;
}

export class InstallationError extends Error {
  constructor(
    message: string,
    public component: string,
    public operation: 'install' | 'uninstall',
    public cause?: Error
  ) {
    super(message);
    this.name = 'InstallationError';
  }
}
