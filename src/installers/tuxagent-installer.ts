import * as fs from 'fs';
import * as path from 'path';
import { EXECUTABLES, PRODUCT, SERVICE, resolveLayout } from '../config';
import { DependencyProvisioner } from './dependency-provisioner';
import { DesktopEntriesInstaller, ServiceDescriptorsInstaller } from './descriptor-installer';
import { createFileOperations } from './file-operations';
import { FileProvisioner } from './file-provisioner';
import { HostDetector } from './host-detector';
import { getUserDataDirs } from './manifest';
import { NautilusExtensionInstaller } from './nautilus-extension-installer';
import { ProgramFilesInstaller } from './program-files-installer';
import { InquirerConfirmer } from './prompts';
import { ServiceActivator } from './service-activator';
import { ChildProcessExecutor } from './system-executor';
import {
  ComponentInstaller,
  Confirmer,
  FileOperationsByDomain,
  InstallationError,
  InstallLayout,
  InstallOutcome,
  ServiceState,
  SystemExecutor,
  UninstallOutcome,
} from './types';
import { formatBanner } from './utils';

export interface InstallerOptions {
  layout?: InstallLayout;
  executor?: SystemExecutor;
  confirmer?: Confirmer;
  fileOps?: FileOperationsByDomain;
  osReleasePath?: string;
}

export interface InstallationStatus {
  components: { [name: string]: boolean };
  service: ServiceState;
}

export class TuxAgentInstaller {
  private layout: InstallLayout;
  private confirmer: Confirmer;
  private installers: ComponentInstaller[];
  private provisioner: FileProvisioner;
  private hostDetector: HostDetector;
  private dependencies: DependencyProvisioner;
  private service: ServiceActivator;

  constructor(options: InstallerOptions = {}) {
    const executor = options.executor ?? new ChildProcessExecutor();
    this.layout = options.layout ?? resolveLayout();
    this.confirmer = options.confirmer ?? new InquirerConfirmer();
    this.provisioner = new FileProvisioner(options.fileOps ?? createFileOperations(this.layout, executor));
    this.hostDetector = new HostDetector(executor, options.osReleasePath);
    this.dependencies = new DependencyProvisioner(executor, this.confirmer, this.layout);
    this.service = new ServiceActivator(executor);

    // Install order; uninstall walks it backwards
    this.installers = [
      new ProgramFilesInstaller(this.layout, this.provisioner),
      new ServiceDescriptorsInstaller(this.layout, this.provisioner),
      new DesktopEntriesInstaller(this.layout, this.provisioner),
      new NautilusExtensionInstaller(this.layout, this.provisioner),
    ];
  }

  async install(): Promise<InstallOutcome> {
    console.log(formatBanner([`${PRODUCT.NAME} Installation`, PRODUCT.DESCRIPTION], 'GREEN'));

    try {
      const host = await this.hostDetector.detect();
      if (!host.runtime.pythonVersion) {
        throw new InstallationError('Python 3 is required but not installed.', 'runtime', 'install');
      }
      console.log(`Python version: ${host.runtime.pythonVersion}`);
      console.log(`Detected distro: ${host.distroId} (${host.family})`);

      if ((await this.dependencies.provision(host)) === 'declined') {
        return 'cancelled';
      }

      console.log('\n📁 Creating directories...');
      await this.provisioner.ensureDirs(
        [this.layout.configDir, this.layout.conversationsDir, this.layout.cacheDir],
        'user',
        'user-directories'
      );

      for (const installer of this.installers) {
        await installer.install();
      }

      await this.service.activate();
    } catch (error) {
      console.error('❌ Installation failed:', error instanceof Error ? error.message : error);
      console.error('Every step is safe to repeat: fix the problem above and run install again.');
      throw error;
    }

    this.printUsage();
    return 'completed';
  }

  async uninstall(): Promise<UninstallOutcome> {
    console.log(formatBanner([`${PRODUCT.NAME} Uninstallation`], 'RED'));

    if (!(await this.confirmer.askConfirmation(`Are you sure you want to uninstall ${PRODUCT.NAME}?`))) {
      console.log('Uninstall cancelled.');
      return 'cancelled-at-gate-1';
    }

    // Past this point removal always runs to the end
    await this.service.deactivate();

    console.log('\n🧹 Removing installed files...');
    let failures = 0;
    for (const installer of [...this.installers].reverse()) {
      failures += await installer.uninstall();
    }
    await this.service.reload();

    const deleteData = await this.confirmUserDataRemoval();
    if (deleteData) {
      const dataFailures = await this.provisioner.remove(
        getUserDataDirs(this.layout).map(dir => ({ path: dir, domain: 'user' as const }))
      );
      failures += dataFailures;
      if (dataFailures === 0) {
        console.log('✓ User data deleted.');
      }
    }

    console.log();
    if (failures > 0) {
      console.warn(`⚠️  Uninstall finished, but ${failures} item(s) could not be removed (see warnings above)`);
    }
    console.log(formatBanner([`${PRODUCT.NAME} Uninstalled!`], 'GREEN'));
    console.log('ℹ️  Restart Nautilus to fully unload the extension: nautilus -q');

    return deleteData ? 'completed-data-deleted' : 'completed-data-preserved';
  }

  async getStatus(): Promise<InstallationStatus> {
    const components: { [name: string]: boolean } = {};

    for (const installer of this.installers) {
      try {
        components[installer.getName()] = await installer.isInstalled();
      } catch (error) {
        components[installer.getName()] = false;
      }
    }

    const unitFile = path.join(this.layout.systemdUserDir, SERVICE.UNIT_NAME);
    return {
      components,
      service: await this.service.getState(fs.existsSync(unitFile)),
    };
  }

  async validate(): Promise<{ [name: string]: boolean }> {
    const validation: { [name: string]: boolean } = {};

    for (const installer of this.installers) {
      validation[installer.getName()] = await installer.validate();
    }

    return validation;
  }

  async isFullyInstalled(): Promise<boolean> {
    const status = await this.getStatus();
    return Object.values(status.components).every(installed => installed);
  }

  private async confirmUserDataRemoval(): Promise<boolean> {
    console.log('\nKeeping user data (config, conversations) unless you ask otherwise:');
    console.log(`  Config: ${this.layout.configDir}`);
    console.log(`  Conversations: ${this.layout.dataDir}`);
    console.log(`  Cache: ${this.layout.cacheDir}`);

    return this.confirmer.askConfirmation('Delete user data too?');
  }

  private printUsage(): void {
    console.log();
    console.log(formatBanner(['Installation Complete!'], 'GREEN'));
    console.log('\nUsage:');
    console.log(`  ${EXECUTABLES.CLI.name} ask "How do I install Chrome?"`);
    console.log(`  ${EXECUTABLES.CLI.name} ask --screenshot "What application is this?"`);
    console.log(`  ${EXECUTABLES.CLI.name} interactive`);
    console.log(`  ${EXECUTABLES.CLI.name} status`);
    console.log(`\nTo start the daemon manually:  ${EXECUTABLES.DAEMON.name}`);
    console.log(`To open the overlay:           ${EXECUTABLES.OVERLAY.name}`);
    console.log('\nThe daemon will start automatically on next login.');
    console.log('ℹ️  Restart Nautilus to load the extension: nautilus -q');
  }
}
