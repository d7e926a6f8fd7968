export * from './types';
export { BaseInstaller } from './base-installer';
export { DependencyProvisioner, ProvisionResult } from './dependency-provisioner';
export { DesktopEntriesInstaller, ServiceDescriptorsInstaller } from './descriptor-installer';
export {
  parseKeyValueDescriptor,
  renderAutostartEntry,
  renderDbusService,
  renderDesktopEntry,
  renderSystemdUnit,
  renderWrapper,
} from './descriptors';
export { createFileOperations, LocalFileOperations, SudoFileOperations } from './file-operations';
export { FileProvisioner } from './file-provisioner';
export { HostDetector, mapDistroFamily, parseOsRelease } from './host-detector';
export { NautilusExtensionInstaller } from './nautilus-extension-installer';
export { packageManagerFor, PackageManager } from './package-managers';
export { ProgramFilesInstaller } from './program-files-installer';
export { InquirerConfirmer } from './prompts';
export { ServiceActivator } from './service-activator';
export { ChildProcessExecutor } from './system-executor';
export { TuxAgentInstaller, InstallerOptions, InstallationStatus } from './tuxagent-installer';
