import * as path from 'path';
import { DESKTOP, EXECUTABLES, NAUTILUS_EXTENSION_FILE, SERVICE } from '../config';
import {
  renderAutostartEntry,
  renderDbusService,
  renderDesktopEntry,
  renderSystemdUnit,
  renderWrapper,
} from './descriptors';
import { InstallLayout, ManifestEntry } from './types';

export const EXECUTABLE_MODE = 0o755;

export function buildProgramFilesManifest(layout: InstallLayout): ManifestEntry[] {
  const wrappers: ManifestEntry[] = Object.values(EXECUTABLES).map((executable): ManifestEntry => ({
    id: `wrapper:${executable.name}`,
    kind: 'generate',
    domain: 'system',
    destination: path.join(layout.binDir, executable.name),
    required: true,
    mode: EXECUTABLE_MODE,
    render: () => renderWrapper(layout, executable.entryScript),
  }));

  return [
    {
      id: 'source-tree',
      kind: 'copy',
      domain: 'system',
      source: path.join(layout.projectDir, 'src'),
      destination: path.join(layout.installDir, 'src'),
      required: true,
    },
    {
      id: 'config-tree',
      kind: 'copy',
      domain: 'system',
      source: path.join(layout.projectDir, 'config'),
      destination: path.join(layout.installDir, 'config'),
      required: true,
    },
    ...wrappers,
  ];
}

export function buildServiceDescriptorsManifest(layout: InstallLayout): ManifestEntry[] {
  return [
    {
      id: 'dbus-service',
      kind: 'generate',
      domain: 'user',
      destination: path.join(layout.dbusServicesDir, `${SERVICE.BUS_NAME}.service`),
      required: true,
      render: () => renderDbusService(layout),
    },
    {
      id: 'systemd-unit',
      kind: 'generate',
      domain: 'user',
      destination: path.join(layout.systemdUserDir, SERVICE.UNIT_NAME),
      required: true,
      render: () => renderSystemdUnit(layout),
    },
  ];
}

export function buildDesktopEntriesManifest(layout: InstallLayout): ManifestEntry[] {
  return [
    {
      id: 'launcher',
      kind: 'generate',
      domain: 'user',
      destination: path.join(layout.applicationsDir, DESKTOP.LAUNCHER_FILE),
      required: true,
      render: () => renderDesktopEntry(layout),
    },
    {
      id: 'autostart',
      kind: 'generate',
      domain: 'user',
      destination: path.join(layout.autostartDir, DESKTOP.AUTOSTART_FILE),
      required: false,
      render: () => renderAutostartEntry(layout),
    },
  ];
}

export function buildNautilusExtensionManifest(layout: InstallLayout): ManifestEntry[] {
  return [
    {
      id: 'nautilus-extension',
      kind: 'copy',
      domain: 'user',
      source: path.join(layout.projectDir, 'extensions', 'nautilus', NAUTILUS_EXTENSION_FILE),
      destination: path.join(layout.nautilusExtensionsDir, NAUTILUS_EXTENSION_FILE),
      required: false,
    },
  ];
}

/**
 * Directories the application writes at run time. Created on install, removed
 * only when the operator explicitly asks for user data to be deleted.
 */
export function getUserDataDirs(layout: InstallLayout): string[] {
  return [layout.configDir, layout.dataDir, layout.cacheDir];
}
