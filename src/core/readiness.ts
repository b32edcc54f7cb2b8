import { isEmptyValue, isSettingsTree, resolvePath } from './settings-tree';
import type { SettingsTree } from './settings-tree';

/** Keys that must hold a non-empty value before a section counts as complete. */
export const SECTION_REQUIRED_KEYS: Readonly<Record<string, readonly string[]>> = {
  identity: ['password'],
  rabbitmq: ['url'],
  node: ['fqdn'],
  network: ['ovn_cert', 'ovn_key', 'ovn_cacert'],
  credentials: ['ovn_metadata_proxy_shared_secret']
};

/** Managed snap services, in the order they are reported and started. */
export const MANAGED_SERVICES = [
  'libvirtd',
  'neutron-ovn-metadata-agent',
  'nova-api-metadata',
  'nova-compute',
  'virtlogd'
] as const;

export type ManagedService = (typeof MANAGED_SERVICES)[number];

export const SERVICE_REQUIREMENTS: Readonly<Record<ManagedService, readonly string[]>> = {
  'libvirtd': [],
  'neutron-ovn-metadata-agent': ['node', 'network', 'credentials'],
  'nova-api-metadata': ['identity', 'rabbitmq', 'node', 'network'],
  'nova-compute': ['identity', 'rabbitmq', 'node'],
  'virtlogd': []
};

export interface ServiceReadiness {
  service: ManagedService;
  ready: boolean;
  blockedBy: string[];
}

export function services(): ManagedService[] {
  return [...MANAGED_SERVICES];
}

export function sectionComplete(section: string, config: SettingsTree): boolean {
  const lookup = resolvePath(config, section);
  if (!lookup.found || !isSettingsTree(lookup.value)) {
    return false;
  }
  const values = lookup.value;
  const required = SECTION_REQUIRED_KEYS[section];
  if (!required) {
    return !isEmptyValue(values);
  }
  return required.every(key => typeof values[key] === 'string' && values[key] !== '');
}

/**
 * Point check for either a bare section (`identity`) or a single key
 * (`identity.password`).
 */
export function checkConfigPresent(path: string, config: SettingsTree): boolean {
  const lookup = resolvePath(config, path);
  return lookup.found && !isEmptyValue(lookup.value);
}

export function blockingSections(service: ManagedService, config: SettingsTree): string[] {
  return SERVICE_REQUIREMENTS[service].filter(section => !sectionComplete(section, config));
}

export function servicesNotReady(config: SettingsTree): ManagedService[] {
  return services().filter(service => blockingSections(service, config).length > 0);
}

export function readinessReport(config: SettingsTree): ServiceReadiness[] {
  return services().map(service => {
    const blockedBy = blockingSections(service, config);
    return { service, ready: blockedBy.length === 0, blockedBy };
  });
}
