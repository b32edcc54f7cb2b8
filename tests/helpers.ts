import type { SettingsStore } from '../src/config/settings';
import type { ManagedService } from '../src/core/readiness';
import type { ServiceController } from '../src/core/service-manager';
import { cloneTree, setPath } from '../src/core/settings-tree';
import type { SettingsScalar, SettingsTree } from '../src/core/settings-tree';
import { Logger, LogLevel } from '../src/logging/logger';
import type { CommandResult, CommandRunner } from '../src/runner/command-runner';

export type CommandHandler = (argv: string[]) => Partial<CommandResult> | string | undefined;

/** Answers commands from a handler and records every argv it was given. */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: string[][] = [];

  constructor(private handler: CommandHandler = () => undefined) {}

  async run(argv: string[]): Promise<CommandResult> {
    this.calls.push([...argv]);
    const answer = this.handler(argv);
    if (typeof answer === 'string') {
      return { exitCode: 0, stdout: answer, stderr: '' };
    }
    return { exitCode: 0, stdout: '', stderr: '', ...answer };
  }

  callsMatching(...prefix: string[]): string[][] {
    return this.calls.filter(call => prefix.every((part, index) => call[index] === part));
  }
}

export class MemorySettingsStore implements SettingsStore {
  readonly writes: Record<string, SettingsScalar>[] = [];

  constructor(public tree: SettingsTree = {}) {}

  async load(): Promise<SettingsTree> {
    return cloneTree(this.tree);
  }

  async set(entries: Record<string, SettingsScalar>): Promise<void> {
    this.writes.push({ ...entries });
    for (const [key, value] of Object.entries(entries)) {
      setPath(this.tree, key, value);
    }
  }
}

export class RecordingServiceController implements ServiceController {
  readonly actions: string[] = [];

  async start(service: ManagedService): Promise<void> {
    this.actions.push(`start ${service}`);
  }

  async stop(service: ManagedService): Promise<void> {
    this.actions.push(`stop ${service}`);
  }
}

export function silentLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger(level, line => lines.push(line)), lines };
}

export const PORT_HEADINGS = ['_uuid', 'external_ids', 'interfaces', 'name'];

/** `ovs-vsctl --format json find Port` output for the given external ports. */
export function externalPortTable(names: string[]): string {
  return JSON.stringify({
    headings: PORT_HEADINGS,
    data: names.map((name, index) => [
      ['uuid', `port-${index}`],
      ['map', [['microstack-function', 'ext-port']]],
      ['uuid', `iface-${index}`],
      name
    ])
  });
}
