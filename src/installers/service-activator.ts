import { SERVICE } from '../config';
import { describeFailure } from './system-executor';
import { ExecResult, ServiceState, SystemExecutor } from './types';

/**
 * Talks to the user's systemd instance. Nothing here is fatal: the service
 * may already be enabled, already stopped, or not loaded at all.
 */
export class ServiceActivator {
  constructor(
    private executor: SystemExecutor,
    private unitName: string = SERVICE.UNIT_NAME
  ) {}

  async activate(): Promise<void> {
    console.log(`\n⚙️  Enabling ${this.unitName}...`);
    await this.reload();

    const result = await this.systemctl(['enable', this.unitName]);
    if (result.exitCode === 0) {
      console.log(`✓ ${this.unitName} enabled (starts at next login or on first D-Bus request)`);
    } else {
      console.warn(`⚠️  Could not enable ${this.unitName} (${describeFailure(result)})`);
    }
  }

  async deactivate(): Promise<void> {
    console.log(`\n⏹️  Stopping ${this.unitName}...`);

    for (const action of ['stop', 'disable']) {
      const result = await this.systemctl([action, this.unitName]);
      if (result.exitCode !== 0) {
        console.warn(`⚠️  systemctl --user ${action} ${this.unitName}: ${describeFailure(result)}`);
      }
    }
  }

  async reload(): Promise<void> {
    const result = await this.systemctl(['daemon-reload']);
    if (result.exitCode !== 0) {
      console.warn(`⚠️  systemctl --user daemon-reload failed (${describeFailure(result)})`);
    }
  }

  async getState(unitFileExists: boolean): Promise<ServiceState> {
    if (!unitFileExists) {
      return 'absent';
    }

    const enabled = await this.systemctl(['is-enabled', this.unitName]);
    if (enabled.exitCode !== 0 || enabled.stdout.trim() !== 'enabled') {
      return 'installed-disabled';
    }

    const active = await this.systemctl(['is-active', this.unitName]);
    return active.stdout.trim() === 'active' ? 'installed-enabled-running' : 'installed-enabled-stopped';
  }

  private systemctl(args: string[]): Promise<ExecResult> {
    return this.executor.run('systemctl', ['--user', ...args]);
  }
}
