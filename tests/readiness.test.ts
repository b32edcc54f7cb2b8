import { describe, expect, it } from 'vitest';
import {
  blockingSections,
  checkConfigPresent,
  readinessReport,
  sectionComplete,
  services,
  servicesNotReady
} from '../src/core/readiness';
import type { SettingsTree } from '../src/core/settings-tree';

describe('services', () => {
  it('lists every managed service in declared order', () => {
    expect(services()).toEqual([
      'libvirtd',
      'neutron-ovn-metadata-agent',
      'nova-api-metadata',
      'nova-compute',
      'virtlogd'
    ]);
  });
});

describe('sectionComplete', () => {
  it('accepts an identity section with a password', () => {
    expect(sectionComplete('identity', { identity: { password: 'foo' } })).toBe(true);
    expect(sectionComplete('identity', { identity: { username: 'user', password: 'foo' } })).toBe(true);
  });

  it('rejects empty required values', () => {
    expect(sectionComplete('identity', { identity: { username: 'user', password: '' } })).toBe(false);
    expect(sectionComplete('identity', { identity: { password: '' } })).toBe(false);
  });

  it('fails closed when the section is absent', () => {
    expect(sectionComplete('identity', { rabbitmq: { url: 'rabbit://sss' } })).toBe(false);
  });

  it('requires every network certificate', () => {
    const network = { ovn_cert: 'cert', ovn_key: 'key', ovn_cacert: '' };
    expect(sectionComplete('network', { network })).toBe(false);
    expect(sectionComplete('network', { network: { ...network, ovn_cacert: 'cacert' } })).toBe(true);
  });

  it('treats sections without a key list as complete when non-empty', () => {
    expect(sectionComplete('compute', { compute: { 'virt-type': 'kvm' } })).toBe(true);
    expect(sectionComplete('compute', { compute: {} })).toBe(false);
  });

  it('rejects a scalar where a section is expected', () => {
    expect(sectionComplete('identity', { identity: 'password' })).toBe(false);
  });
});

describe('checkConfigPresent', () => {
  it('checks single keys and whole sections', () => {
    expect(checkConfigPresent('identity.password', { identity: { password: 'foo' } })).toBe(true);
    expect(checkConfigPresent('identity', { identity: { password: 'foo' } })).toBe(true);
    expect(checkConfigPresent('identity.password', { rabbitmq: { url: 'rabbit://sss' } })).toBe(false);
  });

  it('treats empty strings and empty sections as absent', () => {
    expect(checkConfigPresent('identity.password', { identity: { password: '' } })).toBe(false);
    expect(checkConfigPresent('identity', { identity: {} })).toBe(false);
  });

  it('counts false as a set value', () => {
    expect(checkConfigPresent('logging.debug', { logging: { debug: false } })).toBe(true);
  });
});

describe('servicesNotReady', () => {
  it('only moves services off the list once all their sections are complete', () => {
    const config: SettingsTree = {};
    expect(servicesNotReady(config)).toEqual([
      'neutron-ovn-metadata-agent',
      'nova-api-metadata',
      'nova-compute'
    ]);

    config.identity = { username: 'user', password: 'pass' };
    expect(servicesNotReady(config)).toEqual([
      'neutron-ovn-metadata-agent',
      'nova-api-metadata',
      'nova-compute'
    ]);

    config.rabbitmq = { url: 'rabbit://localhost:5672' };
    config.node = { fqdn: 'myhost.maas' };
    expect(servicesNotReady(config)).toEqual(['neutron-ovn-metadata-agent', 'nova-api-metadata']);

    config.network = {
      'external-bridge-address': '10.0.0.10',
      ovn_cert: 'cert',
      ovn_key: 'key',
      ovn_cacert: 'cacert'
    };
    expect(servicesNotReady(config)).toEqual(['neutron-ovn-metadata-agent']);

    config.credentials = { ovn_metadata_proxy_shared_secret: 'secret' };
    expect(servicesNotReady(config)).toEqual([]);
  });

  it('never reports a service outside the managed list', () => {
    const notReady = servicesNotReady({ unrelated: { key: 'value' } });
    expect(notReady.every(service => services().includes(service))).toBe(true);
  });
});

describe('readinessReport', () => {
  it('names the missing sections per service', () => {
    const config: SettingsTree = { identity: { password: 'pass' }, node: { fqdn: 'host' } };
    expect(blockingSections('nova-compute', config)).toEqual(['rabbitmq']);
    expect(readinessReport(config)).toEqual([
      { service: 'libvirtd', ready: true, blockedBy: [] },
      { service: 'neutron-ovn-metadata-agent', ready: false, blockedBy: ['network', 'credentials'] },
      { service: 'nova-api-metadata', ready: false, blockedBy: ['rabbitmq', 'network'] },
      { service: 'nova-compute', ready: false, blockedBy: ['rabbitmq'] },
      { service: 'virtlogd', ready: true, blockedBy: [] }
    ]);
  });
});
