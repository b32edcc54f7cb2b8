import fs from 'fs';
import path from 'path';
import { BridgeReconciler } from '../core/ovs';
import { OvnChassisConfigurator } from '../core/ovn';
import type { ServiceReadiness } from '../core/readiness';
import { ServiceManager } from '../core/service-manager';
import { lookupBoolean, lookupString } from '../core/settings-tree';
import type { SettingsTree } from '../core/settings-tree';
import { getTemplate, TEMPLATE_TARGETS, writeRenderedFile } from '../core/templates';
import { LogLevel } from '../logging/logger';
import type { HookContext, SnapPaths } from './context';
import { createDirectories, prepareSettings } from './install';

export function resolveVirtType(setting: string | undefined, kvmAvailable: boolean): string {
  if (!setting || setting === 'auto') {
    return kvmAvailable ? 'kvm' : 'qemu';
  }
  return setting;
}

export function templateContext(settings: SettingsTree, paths: SnapPaths, kvmAvailable: boolean): Record<string, unknown> {
  return {
    ...settings,
    snap_paths: { ...paths },
    virt_type: resolveVirtType(lookupString(settings, 'compute.virt-type'), kvmAvailable)
  };
}

export async function renderTemplates(ctx: HookContext, settings: SettingsTree): Promise<string[]> {
  const context = templateContext(settings, ctx.paths, fs.existsSync(ctx.kvmDevice));
  const written: string[] = [];
  for (const target of TEMPLATE_TARGETS) {
    const template = await getTemplate(ctx.paths.snap, target.template);
    const text = await template.render(context);
    const file = path.join(ctx.paths.common, target.path);
    await writeRenderedFile(file, text, target.mode);
    ctx.logger.debug(`Wrote ${file}`);
    written.push(file);
  }
  return written;
}

/**
 * Reconciles the host with the current settings: config files, OVS/OVN
 * chassis state, then which services run.
 */
export async function configure(ctx: HookContext): Promise<ServiceReadiness[]> {
  ctx.logger.info('Running configure hook');
  await createDirectories(ctx.paths.common, ctx.logger);
  const settings = await prepareSettings(ctx);
  if (lookupBoolean(settings, 'logging.debug')) {
    ctx.logger.setLevel(LogLevel.DEBUG);
  }

  await renderTemplates(ctx, settings);

  const bridges = new BridgeReconciler(ctx.runner, ctx.logger);
  const ovn = new OvnChassisConfigurator(ctx.runner, bridges, ctx.logger);
  await ovn.configureOvs(settings);
  await ovn.configureExternalNetworking(settings);
  await ovn.configureOvnTls(settings, ctx.paths.common);

  const report = await new ServiceManager(ctx.services, ctx.logger).applyReadiness(settings);
  ctx.logger.info('Configure hook complete');
  return report;
}
