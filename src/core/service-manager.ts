import { CommandRunner, checkCall } from '../runner/command-runner';
import { Logger } from '../logging/logger';
import { readinessReport } from './readiness';
import type { ManagedService, ServiceReadiness } from './readiness';
import type { SettingsTree } from './settings-tree';

export interface ServiceController {
  start(service: ManagedService): Promise<void>;
  stop(service: ManagedService): Promise<void>;
}

/** Starts and stops the snap's own daemons through snapd. */
export class SnapctlServiceController implements ServiceController {
  constructor(
    private runner: CommandRunner,
    private snapName: string
  ) {}

  public async start(service: ManagedService): Promise<void> {
    await checkCall(this.runner, ['snapctl', 'start', '--enable', `${this.snapName}.${service}`]);
  }

  public async stop(service: ManagedService): Promise<void> {
    await checkCall(this.runner, ['snapctl', 'stop', `${this.snapName}.${service}`]);
  }
}

export class ServiceManager {
  constructor(
    private controller: ServiceController,
    private logger: Logger
  ) {}

  /** Stops every service still missing settings, then starts the rest. */
  public async applyReadiness(settings: SettingsTree): Promise<ServiceReadiness[]> {
    const report = readinessReport(settings);

    for (const entry of report.filter(candidate => !candidate.ready)) {
      this.logger.info(`Service ${entry.service} not ready, missing: ${entry.blockedBy.join(', ')}`);
      await this.controller.stop(entry.service);
    }

    for (const entry of report.filter(candidate => candidate.ready)) {
      this.logger.info(`Starting service ${entry.service}`);
      await this.controller.start(entry.service);
    }

    return report;
  }
}
