import { promises as fs } from 'fs';
import path from 'path';
import { Liquid } from 'liquidjs';
import type { Template } from 'liquidjs';
import { TemplateError } from './errors';

export const TEMPLATES_DIR = 'templates';

export interface TemplateTarget {
  /** Output path relative to $SNAP_COMMON. */
  path: string;
  template: string;
  mode: number;
}

export const TEMPLATE_TARGETS: readonly TemplateTarget[] = [
  { path: 'etc/nova/nova.conf', template: 'nova.conf.liquid', mode: 0o640 },
  { path: 'etc/neutron/neutron.conf', template: 'neutron.conf.liquid', mode: 0o640 },
  {
    path: 'etc/neutron/neutron_ovn_metadata_agent.ini',
    template: 'neutron_ovn_metadata_agent.ini.liquid',
    mode: 0o640
  },
  { path: 'etc/libvirt/libvirtd.conf', template: 'libvirtd.conf.liquid', mode: 0o644 },
  { path: 'etc/libvirt/virtlogd.conf', template: 'virtlogd.conf.liquid', mode: 0o644 },
  { path: 'etc/libvirt/qemu.conf', template: 'qemu.conf.liquid', mode: 0o644 }
];

export interface RenderableTemplate {
  name: string;
  render(context: object): Promise<string>;
}

export function createTemplateEngine(snapRoot: string): Liquid {
  return new Liquid({
    root: [path.join(snapRoot, TEMPLATES_DIR)],
    cache: false,
    strictFilters: true,
    strictVariables: true,
    lenientIf: true,
    jsTruthy: true
  });
}

/** Loads `name` from `<snapRoot>/templates`. */
export async function getTemplate(snapRoot: string, name: string): Promise<RenderableTemplate> {
  let engine: Liquid;
  let parsed: Template[];
  try {
    engine = createTemplateEngine(snapRoot);
    parsed = await engine.parseFile(name);
  } catch (error) {
    throw new TemplateError(name, error);
  }

  return {
    name,
    async render(context: object): Promise<string> {
      try {
        const output: unknown = await engine.render(parsed, context);
        return String(output);
      } catch (error) {
        throw new TemplateError(name, error);
      }
    }
  };
}

/** Replaces `target` with `text` through a sibling temp file. */
export async function writeRenderedFile(target: string, text: string, mode: number): Promise<void> {
  const tmp = `${target}.tmp`;
  await fs.writeFile(tmp, text, { encoding: 'utf8', mode });
  await fs.chmod(tmp, mode);
  await fs.rename(tmp, target);
}
