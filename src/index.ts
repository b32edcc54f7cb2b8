export * from './core/errors';
export * from './core/settings-tree';
export * from './core/readiness';
export * from './core/templates';
export * from './core/ovsdb';
export * from './core/ovs';
export * from './core/ovn';
export * from './core/service-manager';
export * from './config/settings';
export * from './runner/command-runner';
export * from './logging/logger';
export { createHookContext, defaultSettings, PACKAGE_ROOT } from './hooks/context';
export type { HookContext, HookContextOptions, SnapPaths } from './hooks/context';
export { install, createDirectories, prepareSettings, COMMON_DIRECTORIES } from './hooks/install';
export { configure, renderTemplates, resolveVirtType, templateContext } from './hooks/configure';
