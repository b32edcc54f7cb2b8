import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import YAML from 'yaml';
import {
  ensureDefaults,
  ensureSecrets,
  FileSettingsStore,
  generateSecret,
  hostDefaults,
  loadDefaultSettings,
  SHARED_SECRET_KEY,
  SnapctlSettingsStore,
  withSecretPlaceholders
} from '../src/config/settings';
import { SettingsError } from '../src/core/errors';
import { FakeCommandRunner, MemorySettingsStore } from './helpers';

describe('SnapctlSettingsStore', () => {
  it('loads the tree from snapctl get -d', async () => {
    const runner = new FakeCommandRunner(() => '{"identity": {"username": "nova"}, "logging": {"debug": true}}\n');
    const store = new SnapctlSettingsStore(runner);

    await expect(store.load()).resolves.toEqual({ identity: { username: 'nova' }, logging: { debug: true } });
    expect(runner.calls).toEqual([['snapctl', 'get', '-d']]);
  });

  it('rejects output that is not a settings tree', async () => {
    const store = new SnapctlSettingsStore(new FakeCommandRunner(() => '{"identity": ["a", "b"]}'));
    await expect(store.load()).rejects.toBeInstanceOf(SettingsError);
  });

  it('rejects malformed JSON', async () => {
    const store = new SnapctlSettingsStore(new FakeCommandRunner(() => '{identity'));
    await expect(store.load()).rejects.toThrow('snapctl get returned malformed JSON');
  });

  it('sets all entries in one snapctl call', async () => {
    const runner = new FakeCommandRunner();
    await new SnapctlSettingsStore(runner).set({ 'rabbitmq.url': '', 'logging.debug': false });
    expect(runner.calls).toEqual([['snapctl', 'set', 'rabbitmq.url=', 'logging.debug=false']]);
  });

  it('skips snapctl when there is nothing to set', async () => {
    const runner = new FakeCommandRunner();
    await new SnapctlSettingsStore(runner).set({});
    expect(runner.calls).toEqual([]);
  });
});

describe('FileSettingsStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'hooks-settings-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and updates a YAML file', async () => {
    const file = path.join(dir, 'settings.yaml');
    await writeFile(file, 'identity:\n  username: nova\n');
    const store = new FileSettingsStore(file);

    await store.set({ 'identity.password': 'test-secret' });

    await expect(store.load()).resolves.toEqual({ identity: { username: 'nova', password: 'test-secret' } });
    expect(YAML.parse(await readFile(file, 'utf8'))).toEqual({
      identity: { username: 'nova', password: 'test-secret' }
    });
  });

  it('reports a missing file', async () => {
    await expect(new FileSettingsStore(path.join(dir, 'none.yaml')).load()).rejects.toThrow('Settings file not found');
  });

  it('treats an empty file as an empty tree', async () => {
    const file = path.join(dir, 'empty.yaml');
    await writeFile(file, '');
    await expect(new FileSettingsStore(file).load()).resolves.toEqual({});
  });
});

describe('defaults', () => {
  it('ships defaults for every section the templates read', () => {
    const defaults = loadDefaultSettings();
    expect(Object.keys(defaults)).toEqual(['identity', 'rabbitmq', 'compute', 'network', 'logging']);
    expect(defaults.network).toMatchObject({ 'external-bridge': 'br-ex', 'physnet-name': 'physnet1' });
  });

  it('derives the node name from the host', () => {
    expect(hostDefaults().node).toMatchObject({ fqdn: os.hostname() });
  });

  it('writes only the keys the store is missing', async () => {
    const store = new MemorySettingsStore({ identity: { username: 'nova', password: '' } });
    const merged = await ensureDefaults(store, { identity: { username: '', 'region-name': 'RegionOne' } });

    expect(store.writes).toEqual([{ 'identity.region-name': 'RegionOne' }]);
    expect(merged).toEqual({ identity: { username: 'nova', password: '', 'region-name': 'RegionOne' } });
  });

  it('does not write when nothing is missing', async () => {
    const store = new MemorySettingsStore({ rabbitmq: { url: '' } });
    await ensureDefaults(store, { rabbitmq: { url: 'rabbit://default' } });
    expect(store.writes).toEqual([]);
  });
});

describe('ensureSecrets', () => {
  it('generates the metadata proxy secret once', async () => {
    const store = new MemorySettingsStore({});
    const updated = await ensureSecrets(store, {}, () => 'generated-secret');

    expect(store.writes).toEqual([{ [SHARED_SECRET_KEY]: 'generated-secret' }]);
    expect(updated).toEqual({ credentials: { ovn_metadata_proxy_shared_secret: 'generated-secret' } });

    await ensureSecrets(store, updated, () => 'other');
    expect(store.writes).toHaveLength(1);
  });

  it('replaces an empty secret', async () => {
    const store = new MemorySettingsStore();
    const updated = await ensureSecrets(store, { credentials: { ovn_metadata_proxy_shared_secret: '' } }, () => 's');
    expect(updated.credentials).toEqual({ ovn_metadata_proxy_shared_secret: 's' });
  });

  it('generates 64 hex characters by default', () => {
    expect(generateSecret()).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('withSecretPlaceholders', () => {
  it('adds an empty shared secret only when none is set', () => {
    expect(withSecretPlaceholders({ node: { fqdn: 'h' } })).toEqual({
      node: { fqdn: 'h' },
      credentials: { ovn_metadata_proxy_shared_secret: '' }
    });
    expect(withSecretPlaceholders({ credentials: { ovn_metadata_proxy_shared_secret: 'test-secret' } })).toEqual({
      credentials: { ovn_metadata_proxy_shared_secret: 'test-secret' }
    });
  });
});
