/**
 * Settings tree helpers.
 *
 * The settings tree is the nested `section -> key -> value` mapping kept by
 * snapd. Lookups use dotted paths such as `identity.password`.
 */

export type SettingsScalar = string | number | boolean | null;

export type SettingsValue = SettingsScalar | SettingsTree;

export interface SettingsTree {
  [key: string]: SettingsValue;
}

export type PathLookup =
  | { found: true; value: SettingsValue }
  | { found: false };

export function isSettingsTree(value: SettingsValue | undefined): value is SettingsTree {
  return typeof value === 'object' && value !== null;
}

/**
 * `null`, `""` and an empty mapping count as empty. `false` and `0` were set
 * explicitly and are kept as values.
 */
export function isEmptyValue(value: SettingsValue | undefined): boolean {
  if (value === undefined || value === null || value === '') {
    return true;
  }
  if (isSettingsTree(value)) {
    return Object.keys(value).length === 0;
  }
  return false;
}

export function resolvePath(tree: SettingsTree, path: string): PathLookup {
  const segments = path.split('.');
  let current: SettingsValue = tree;
  for (const segment of segments) {
    if (!isSettingsTree(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return { found: false };
    }
    current = current[segment];
  }
  return { found: true, value: current };
}

export function lookupString(tree: SettingsTree, path: string): string | undefined {
  const lookup = resolvePath(tree, path);
  if (!lookup.found || isEmptyValue(lookup.value) || isSettingsTree(lookup.value)) {
    return undefined;
  }
  return String(lookup.value);
}

export function lookupBoolean(tree: SettingsTree, path: string): boolean {
  const lookup = resolvePath(tree, path);
  if (!lookup.found) {
    return false;
  }
  if (typeof lookup.value === 'string') {
    return lookup.value.trim().toLowerCase() === 'true';
  }
  return lookup.value === true;
}

export function flattenTree(tree: SettingsTree, prefix = ''): Record<string, SettingsScalar> {
  const flat: Record<string, SettingsScalar> = {};
  for (const [key, value] of Object.entries(tree)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isSettingsTree(value)) {
      Object.assign(flat, flattenTree(value, path));
    } else {
      flat[path] = value;
    }
  }
  return flat;
}

export function setPath(tree: SettingsTree, path: string, value: SettingsValue): void {
  const segments = path.split('.');
  const last = segments.pop();
  if (last === undefined || last === '') {
    return;
  }
  let current = tree;
  for (const segment of segments) {
    const next = current[segment];
    if (isSettingsTree(next)) {
      current = next;
    } else {
      const created: SettingsTree = {};
      current[segment] = created;
      current = created;
    }
  }
  current[last] = value;
}

export function unflattenEntries(entries: Record<string, SettingsScalar>): SettingsTree {
  const tree: SettingsTree = {};
  for (const [path, value] of Object.entries(entries)) {
    setPath(tree, path, value);
  }
  return tree;
}

export function cloneTree(tree: SettingsTree): SettingsTree {
  const copy: SettingsTree = {};
  for (const [key, value] of Object.entries(tree)) {
    copy[key] = isSettingsTree(value) ? cloneTree(value) : value;
  }
  return copy;
}

/** Dotted keys of `defaults` that `tree` does not have at all. */
export function missingDefaults(tree: SettingsTree, defaults: SettingsTree): Record<string, SettingsScalar> {
  const missing: Record<string, SettingsScalar> = {};
  for (const [path, value] of Object.entries(flattenTree(defaults))) {
    if (!resolvePath(tree, path).found) {
      missing[path] = value;
    }
  }
  return missing;
}

export function mergeDefaults(tree: SettingsTree, defaults: SettingsTree): SettingsTree {
  const merged = cloneTree(tree);
  for (const [path, value] of Object.entries(missingDefaults(tree, defaults))) {
    setPath(merged, path, value);
  }
  return merged;
}
