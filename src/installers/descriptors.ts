import * as path from 'path';
import { DESKTOP, EXECUTABLES, PRODUCT, SERVICE } from '../config';
import { InstallLayout } from './types';

function document(lines: string[]): string {
  return lines.join('\n') + '\n';
}

function executablePath(layout: InstallLayout, name: string): string {
  return path.join(layout.binDir, name);
}

export function renderSystemdUnit(layout: InstallLayout): string {
  return document([
    '[Unit]',
    `Description=${PRODUCT.NAME} - ${PRODUCT.DESCRIPTION}`,
    `Documentation=${PRODUCT.DOCUMENTATION_URL}`,
    `After=${SERVICE.SESSION_TARGET}`,
    `PartOf=${SERVICE.SESSION_TARGET}`,
    '',
    '[Service]',
    'Type=dbus',
    `BusName=${SERVICE.BUS_NAME}`,
    `ExecStart=${executablePath(layout, EXECUTABLES.DAEMON.name)}`,
    'Restart=on-failure',
    `RestartSec=${SERVICE.RESTART_SEC}`,
    `Environment="PYTHONPATH=${layout.installDir}"`,
    'Environment=PYTHONUNBUFFERED=1',
    '',
    '[Install]',
    `WantedBy=${SERVICE.SESSION_TARGET}`,
  ]);
}

export function renderDbusService(layout: InstallLayout): string {
  return document([
    '[D-BUS Service]',
    `Name=${SERVICE.BUS_NAME}`,
    `Exec=${executablePath(layout, EXECUTABLES.DAEMON.name)}`,
  ]);
}

export function renderDesktopEntry(layout: InstallLayout): string {
  return document([
    '[Desktop Entry]',
    'Type=Application',
    `Name=${PRODUCT.NAME}`,
    `Comment=${PRODUCT.DESCRIPTION}`,
    `Icon=${DESKTOP.ICON}`,
    `Exec=${executablePath(layout, EXECUTABLES.OVERLAY.name)}`,
    'Terminal=false',
    'Categories=Utility;System;',
    'Keywords=AI;Assistant;Help;Linux;',
    'StartupNotify=false',
  ]);
}

export function renderAutostartEntry(layout: InstallLayout): string {
  return document([
    '[Desktop Entry]',
    'Type=Application',
    `Name=${PRODUCT.NAME} Daemon`,
    `Exec=${executablePath(layout, EXECUTABLES.DAEMON.name)}`,
    'Hidden=false',
    'NoDisplay=true',
    'X-GNOME-Autostart-enabled=true',
    `X-GNOME-Autostart-Delay=${DESKTOP.AUTOSTART_DELAY_SECONDS}`,
  ]);
}

/**
 * Shell wrapper that puts the install directory on PYTHONPATH so the
 * application's absolute imports resolve from any working directory.
 */
export function renderWrapper(layout: InstallLayout, entryScript: string): string {
  return document([
    '#!/bin/bash',
    `export PYTHONPATH="${layout.installDir}:$PYTHONPATH"`,
    `python3 "${path.join(layout.installDir, entryScript)}" "$@"`,
  ]);
}

export interface DescriptorSection {
  name: string;
  entries: Array<[string, string]>;
}

export class DescriptorSyntaxError extends Error {
  constructor(message: string, public lineNumber: number) {
    super(`Line ${lineNumber}: ${message}`);
    this.name = 'DescriptorSyntaxError';
  }
}

const SECTION_HEADER = /^\[([^\]]+)\]$/;
const KEY_VALUE = /^([A-Za-z0-9][A-Za-z0-9_.\-]*(?:\[[^\]]+\])?)=(.*)$/;

/**
 * Parse the INI-style format shared by systemd units, D-Bus service files
 * and desktop entries. Keys may repeat (systemd allows several Environment=).
 */
export function parseKeyValueDescriptor(content: string): DescriptorSection[] {
  const sections: DescriptorSection[] = [];
  let current: DescriptorSection | null = null;

  const lines = content.split('\n');
  for (let index = 0; index < lines.length; index++) {
    const lineNumber = index + 1;
    const line = lines[index].trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    const header = SECTION_HEADER.exec(line);
    if (header) {
      current = { name: header[1], entries: [] };
      sections.push(current);
      continue;
    }

    const pair = KEY_VALUE.exec(line);
    if (!pair) {
      throw new DescriptorSyntaxError(`expected key=value, got "${line}"`, lineNumber);
    }
    if (!current) {
      throw new DescriptorSyntaxError(`"${pair[1]}" appears before any [section]`, lineNumber);
    }
    current.entries.push([pair[1], pair[2]]);
  }

  return sections;
}

export function getDescriptorValues(sections: DescriptorSection[], section: string, key: string): string[] {
  return sections
    .filter(s => s.name === section)
    .flatMap(s => s.entries.filter(([k]) => k === key).map(([, value]) => value));
}
