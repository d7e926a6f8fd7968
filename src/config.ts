/**
 * Central configuration constants for TuxAgent setup
 *
 * Product names, descriptor values and per-distribution dependency sets live
 * here so the install and uninstall paths never disagree about a name.
 */

import * as os from 'os';
import * as path from 'path';
import type { DependencySet, DistroFamily, InstallLayout } from './installers/types';

export const PRODUCT = {
  NAME: 'TuxAgent',
  SLUG: 'tuxagent',
  DESCRIPTION: 'Linux AI Assistant',
  DOCUMENTATION_URL: 'https://github.com/yourusername/tux-agent',
} as const;

export const SERVICE = {
  UNIT_NAME: 'tuxagent.service',
  BUS_NAME: 'org.tuxagent.Assistant',
  SESSION_TARGET: 'graphical-session.target',
  RESTART_SEC: 5,                 // Backoff before systemd restarts a crashed daemon
} as const;

export const DESKTOP = {
  LAUNCHER_FILE: 'org.tuxagent.desktop',
  AUTOSTART_FILE: 'tuxagent-daemon.desktop',
  ICON: 'dialog-question',
  AUTOSTART_DELAY_SECONDS: 5,
} as const;

export const NAUTILUS_EXTENSION_FILE = 'tuxagent-extension.py';

// Wrapper name in the bin directory -> Python entry script inside the install directory
export const EXECUTABLES = {
  CLI: { name: 'tux', entryScript: 'src/cli/tux.py' },
  DAEMON: { name: 'tuxagent-daemon', entryScript: 'src/daemon/main.py' },
  OVERLAY: { name: 'tuxagent-overlay', entryScript: 'src/ui/main.py' },
} as const;

export const ENV_VARS = {
  PROJECT_DIR: 'TUXAGENT_PROJECT_DIR',
  BIN_DIR: 'TUXAGENT_BIN_DIR',
  INSTALL_DIR: 'TUXAGENT_INSTALL_DIR',
  DEBUG: 'TUXAGENT_DEBUG',
} as const;

export const DEFAULT_SYSTEM_DIRS = {
  BIN_DIR: '/usr/local/bin',
  INSTALL_DIR: '/usr/lib/tuxagent',
} as const;

export const ANSI_COLORS = {
  RED: '\x1b[0;31m',
  GREEN: '\x1b[0;32m',
  YELLOW: '\x1b[1;33m',
  RESET: '\x1b[0m',
} as const;

export const PYTHON_REQUIREMENTS_FILE = 'requirements.txt';

// Installed with pip when requirements.txt is missing or fails to install
export const PYTHON_FALLBACK_PACKAGES = [
  'httpx',
  'Pillow',
  'markdown',
  'psutil',
  'python-dateutil',
  'requests',
  'beautifulsoup4',
] as const;

export const DEPENDENCY_SETS: Record<Exclude<DistroFamily, 'unknown'>, DependencySet> = {
  debian: {
    pipPackage: 'python3-pip',
    packages: [
      'python3-gi',
      'python3-gi-cairo',
      'gir1.2-gtk-4.0',
      'gir1.2-adw-1',
      'python3-dbus',
      'libgirepository1.0-dev',
      'xdg-desktop-portal',
      'xdg-desktop-portal-gtk',
      'python3-nautilus',
    ],
  },
  fedora: {
    pipPackage: 'python3-pip',
    packages: [
      'python3-gobject',
      'gtk4',
      'libadwaita',
      'python3-dbus',
      'gobject-introspection-devel',
      'xdg-desktop-portal',
      'xdg-desktop-portal-gtk',
      'nautilus-python',
    ],
  },
  arch: {
    pipPackage: 'python-pip',
    packages: [
      'python-gobject',
      'gtk4',
      'libadwaita',
      'python-dbus',
      'gobject-introspection',
      'xdg-desktop-portal',
      'xdg-desktop-portal-gtk',
      'python-nautilus',
    ],
  },
  suse: {
    pipPackage: 'python3-pip',
    packages: [
      'python3-gobject',
      'gtk4',
      'libadwaita',
      'python3-dbus',
      'gobject-introspection',
      'xdg-desktop-portal',
      'xdg-desktop-portal-gtk',
    ],
  },
};

// Shown when the distribution is not recognised
export const MANUAL_DEPENDENCIES = [
  'Python 3 GTK bindings (python3-gi/python-gobject)',
  'GTK 4',
  'libadwaita',
  'xdg-desktop-portal',
] as const;

export interface LayoutOptions {
  homeDir?: string;
  projectDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build the fixed set of paths install and uninstall operate on.
 * System directories can be redirected through TUXAGENT_BIN_DIR and
 * TUXAGENT_INSTALL_DIR; the project directory defaults to the working directory.
 */
export function resolveLayout(options: LayoutOptions = {}): InstallLayout {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  const projectDir = path.resolve(options.projectDir ?? env[ENV_VARS.PROJECT_DIR] ?? process.cwd());
  const dataDir = path.join(homeDir, '.local', 'share', PRODUCT.SLUG);

  return {
    projectDir,
    binDir: env[ENV_VARS.BIN_DIR] || DEFAULT_SYSTEM_DIRS.BIN_DIR,
    installDir: env[ENV_VARS.INSTALL_DIR] || DEFAULT_SYSTEM_DIRS.INSTALL_DIR,
    systemdUserDir: path.join(homeDir, '.config', 'systemd', 'user'),
    dbusServicesDir: path.join(homeDir, '.local', 'share', 'dbus-1', 'services'),
    applicationsDir: path.join(homeDir, '.local', 'share', 'applications'),
    autostartDir: path.join(homeDir, '.config', 'autostart'),
    configDir: path.join(homeDir, '.config', PRODUCT.SLUG),
    dataDir,
    conversationsDir: path.join(dataDir, 'conversations'),
    cacheDir: path.join(homeDir, '.cache', PRODUCT.SLUG),
    nautilusExtensionsDir: path.join(homeDir, '.local', 'share', 'nautilus-python', 'extensions'),
  };
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env[ENV_VARS.DEBUG] === '1' || env[ENV_VARS.DEBUG] === 'true';
}
