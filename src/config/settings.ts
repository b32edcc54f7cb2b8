/**
 * Settings Store
 * Reads and updates the hypervisor settings tree. On a host the tree lives in
 * snapd (`snapctl get/set`); for local runs it can come from a YAML file.
 */

import { randomBytes } from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import YAML from 'yaml';
import { CommandRunner, checkCall, checkOutput } from '../runner/command-runner';
import { SettingsError } from '../core/errors';
import {
  cloneTree,
  lookupString,
  mergeDefaults,
  missingDefaults,
  setPath,
  unflattenEntries
} from '../core/settings-tree';
import type { SettingsScalar, SettingsTree } from '../core/settings-tree';
import { validateSettingsSafe } from '../types/schemas';

export const DEFAULTS_FILE = path.resolve(__dirname, '../../config/defaults.yaml');

export const SHARED_SECRET_KEY = 'credentials.ovn_metadata_proxy_shared_secret';

export interface SettingsStore {
  load(): Promise<SettingsTree>;
  set(entries: Record<string, SettingsScalar>): Promise<void>;
}

function validate(data: unknown, source: string): SettingsTree {
  const result = validateSettingsSafe(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || 'root'}: ${i.message}`).join('; ');
    throw new SettingsError(`Invalid settings from ${source}: ${issues}`);
  }
  return result.data;
}

export class SnapctlSettingsStore implements SettingsStore {
  constructor(private runner: CommandRunner) {}

  async load(): Promise<SettingsTree> {
    const output = await checkOutput(this.runner, ['snapctl', 'get', '-d']);
    let data: unknown;
    try {
      data = output.trim() ? JSON.parse(output) : {};
    } catch (error) {
      throw new SettingsError('snapctl get returned malformed JSON', { cause: error });
    }
    return validate(data, 'snapctl');
  }

  async set(entries: Record<string, SettingsScalar>): Promise<void> {
    const pairs = Object.entries(entries).map(([key, value]) => `${key}=${value ?? ''}`);
    if (pairs.length === 0) {
      return;
    }
    await checkCall(this.runner, ['snapctl', 'set', ...pairs]);
  }
}

export class FileSettingsStore implements SettingsStore {
  constructor(private filePath: string) {}

  async load(): Promise<SettingsTree> {
    if (!fs.existsSync(this.filePath)) {
      throw new SettingsError(`Settings file not found: ${this.filePath}`);
    }
    const raw = await fs.promises.readFile(this.filePath, 'utf8');
    let data: unknown;
    try {
      data = this.filePath.endsWith('.json') ? JSON.parse(raw) : YAML.parse(raw);
    } catch (error) {
      throw new SettingsError(`Settings file ${this.filePath} could not be parsed`, { cause: error });
    }
    return validate(data, this.filePath);
  }

  async set(entries: Record<string, SettingsScalar>): Promise<void> {
    const tree: SettingsTree = fs.existsSync(this.filePath) ? await this.load() : {};
    for (const [key, value] of Object.entries(entries)) {
      setPath(tree, key, value);
    }
    const text = this.filePath.endsWith('.json') ? `${JSON.stringify(tree, null, 2)}\n` : YAML.stringify(tree);
    await fs.promises.writeFile(this.filePath, text, 'utf8');
  }
}

export function loadDefaultSettings(file: string = DEFAULTS_FILE): SettingsTree {
  const raw = fs.readFileSync(file, 'utf8');
  return validate(YAML.parse(raw), file);
}

export function localIpAddress(): string | undefined {
  for (const addresses of Object.values(os.networkInterfaces())) {
    const match = addresses?.find(address => address.family === 'IPv4' && !address.internal);
    if (match) {
      return match.address;
    }
  }
  return undefined;
}

/** Defaults that depend on the host rather than on the defaults file. */
export function hostDefaults(): SettingsTree {
  const entries: Record<string, SettingsScalar> = { 'node.fqdn': os.hostname() };
  const ip = localIpAddress();
  if (ip) {
    entries['node.ip-address'] = ip;
    entries['network.ip-address'] = ip;
  }
  return unflattenEntries(entries);
}

/**
 * Writes every default key the store does not hold yet and returns the
 * merged tree. Keys already present, even empty ones, are left alone.
 */
export async function ensureDefaults(store: SettingsStore, defaults: SettingsTree): Promise<SettingsTree> {
  const current = await store.load();
  const missing = missingDefaults(current, defaults);
  if (Object.keys(missing).length > 0) {
    await store.set(missing);
  }
  return mergeDefaults(current, defaults);
}

export function generateSecret(): string {
  return randomBytes(32).toString('hex');
}

export async function ensureSecrets(
  store: SettingsStore,
  settings: SettingsTree,
  secret: () => string = generateSecret
): Promise<SettingsTree> {
  if (lookupString(settings, SHARED_SECRET_KEY)) {
    return settings;
  }
  const value = secret();
  await store.set({ [SHARED_SECRET_KEY]: value });
  const updated = cloneTree(settings);
  setPath(updated, SHARED_SECRET_KEY, value);
  return updated;
}

/** Fills secrets the store has not generated yet with empty values, without writing them. */
export function withSecretPlaceholders(settings: SettingsTree): SettingsTree {
  return mergeDefaults(settings, unflattenEntries({ [SHARED_SECRET_KEY]: '' }));
}
