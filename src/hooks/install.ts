import { promises as fs } from 'fs';
import path from 'path';
import { ensureDefaults, ensureSecrets } from '../config/settings';
import { Logger } from '../logging/logger';
import type { SettingsTree } from '../core/settings-tree';
import type { HookContext } from './context';

/** Directories under $SNAP_COMMON the managed services expect to exist. */
export const COMMON_DIRECTORIES = [
  'etc/nova',
  'etc/neutron',
  'etc/libvirt',
  'etc/pki/ovn',
  'lib/nova/instances',
  'lib/libvirt/images',
  'lib/neutron',
  'log/nova',
  'log/neutron',
  'log/libvirt/qemu',
  'run/nova',
  'run/libvirt',
  'run/neutron',
  'lock'
] as const;

export async function createDirectories(commonDir: string, logger: Logger): Promise<void> {
  for (const dir of COMMON_DIRECTORIES) {
    const target = path.join(commonDir, dir);
    await fs.mkdir(target, { recursive: true });
    logger.debug(`Ensured directory ${target}`);
  }
}

/** Writes missing defaults and the metadata proxy secret; returns the settings tree. */
export async function prepareSettings(ctx: HookContext): Promise<SettingsTree> {
  const settings = await ensureDefaults(ctx.settings, ctx.defaults());
  return ensureSecrets(ctx.settings, settings);
}

export async function install(ctx: HookContext): Promise<void> {
  ctx.logger.info('Running install hook');
  await createDirectories(ctx.paths.common, ctx.logger);
  await prepareSettings(ctx);
  ctx.logger.info('Install hook complete');
}
