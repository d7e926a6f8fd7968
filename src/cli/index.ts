#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import { TuxAgentInstaller } from '../installers/tuxagent-installer';
import { InstallationError } from '../installers/types';

export type LifecycleManager = Pick<TuxAgentInstaller, 'install' | 'uninstall' | 'getStatus'>;

function readVersion(): string {
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

export async function runInstall(manager: LifecycleManager): Promise<number> {
  try {
    const outcome = await manager.install();
    if (outcome === 'cancelled') {
      console.log('Nothing was changed.');
    }
    return 0;
  } catch (error) {
    if (!(error instanceof InstallationError)) {
      console.error('❌ Unexpected error:', error);
    }
    return 1;
  }
}

export async function runUninstall(manager: LifecycleManager): Promise<number> {
  try {
    const outcome = await manager.uninstall();
    if (outcome === 'completed-data-preserved') {
      console.log('User data was kept.');
    }
    return 0;
  } catch (error) {
    console.error('❌ Uninstall failed:', error instanceof Error ? error.message : error);
    return 1;
  }
}

export async function runStatus(manager: LifecycleManager): Promise<number> {
  const status = await manager.getStatus();

  console.log('\nComponents:');
  for (const [name, installed] of Object.entries(status.components)) {
    console.log(`  ${installed ? '✓' : '✗'} ${name}`);
  }
  console.log(`\nService: ${status.service}`);

  return Object.values(status.components).every(Boolean) ? 0 : 1;
}

export function createProgram(
  createManager: () => LifecycleManager = () => new TuxAgentInstaller()
): Command {
  const program = new Command();

  program
    .name('tuxagent-setup')
    .description('Install or remove the TuxAgent desktop assistant')
    .version(readVersion());

  program
    .command('install')
    .description('Install dependencies, program files, descriptors and the user service')
    .action(async () => {
      process.exitCode = await runInstall(createManager());
    });

  program
    .command('uninstall')
    .description('Remove TuxAgent, optionally including config, conversations and cache')
    .action(async () => {
      process.exitCode = await runUninstall(createManager());
    });

  program
    .command('status')
    .description('Show which components are installed and the service state')
    .action(async () => {
      process.exitCode = await runStatus(createManager());
    });

  return program;
}

// Only run if this file is executed directly
if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(error => {
      console.error('❌', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
