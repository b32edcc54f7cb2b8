import path from 'path';
import {
  FileSettingsStore,
  hostDefaults,
  loadDefaultSettings,
  SettingsStore,
  SnapctlSettingsStore
} from '../config/settings';
import { SettingsError } from '../core/errors';
import { ServiceController, SnapctlServiceController } from '../core/service-manager';
import { mergeDefaults } from '../core/settings-tree';
import type { SettingsTree } from '../core/settings-tree';
import { Logger, LogLevel, parseLogLevel } from '../logging/logger';
import { CommandRunner, ProcessCommandRunner } from '../runner/command-runner';
import { HookEnvironmentSchema } from '../types/schemas';

export interface SnapPaths {
  /** Read-only install root ($SNAP). */
  snap: string;
  /** Revision-independent writable area ($SNAP_COMMON). */
  common: string;
  /** Revision-specific writable area ($SNAP_DATA). */
  data: string;
}

export interface HookContext {
  snapName: string;
  paths: SnapPaths;
  settings: SettingsStore;
  runner: CommandRunner;
  services: ServiceController;
  logger: Logger;
  defaults: () => SettingsTree;
  kvmDevice: string;
}

export interface HookContextOptions {
  /** Use a YAML/JSON settings file instead of snapctl. */
  settingsFile?: string;
  /** Install root used when $SNAP is not set, e.g. for local runs. */
  fallbackRoot?: string;
}

export const PACKAGE_ROOT = path.resolve(__dirname, '../..');

export function defaultSettings(): SettingsTree {
  return mergeDefaults(loadDefaultSettings(), hostDefaults());
}

export function createHookContext(
  env: NodeJS.ProcessEnv = process.env,
  options: HookContextOptions = {}
): HookContext {
  const fallbackRoot = options.fallbackRoot ?? PACKAGE_ROOT;
  const parsed = HookEnvironmentSchema.safeParse({
    ...env,
    SNAP: env.SNAP ?? fallbackRoot,
    SNAP_COMMON: env.SNAP_COMMON ?? (options.settingsFile ? path.join(fallbackRoot, '.local/common') : undefined),
    SNAP_DATA: env.SNAP_DATA ?? (options.settingsFile ? path.join(fallbackRoot, '.local/data') : undefined)
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new SettingsError(`Hook environment is incomplete: ${issues}`);
  }
  const hookEnv = parsed.data;

  const logger = new Logger(parseLogLevel(hookEnv.HYPERVISOR_LOG_LEVEL) ?? LogLevel.INFO);
  const runner = new ProcessCommandRunner(logger);

  return {
    snapName: hookEnv.SNAP_INSTANCE_NAME,
    paths: {
      snap: hookEnv.SNAP,
      common: hookEnv.SNAP_COMMON,
      data: hookEnv.SNAP_DATA
    },
    settings: options.settingsFile ? new FileSettingsStore(options.settingsFile) : new SnapctlSettingsStore(runner),
    runner,
    services: new SnapctlServiceController(runner, hookEnv.SNAP_INSTANCE_NAME),
    logger,
    defaults: defaultSettings,
    kvmDevice: '/dev/kvm'
  };
}
