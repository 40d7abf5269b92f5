// src/config/modules.ts
// Stage switches so a deployment can turn a matcher family off without
// touching the pipeline. Disabled stages are skipped; order never changes.

export type ModuleName =
  | 'converse'
  | 'keyword'
  | 'statistical'
  | 'common_qa'
  | 'fallback';

export type ModuleFlags = Record<ModuleName, boolean>;

const DEFAULT_FLAGS: ModuleFlags = {
  converse: true,
  keyword: true,
  statistical: true,
  common_qa: true,
  fallback: true,
};

// Use env like MOD_COMMON_QA=0, MOD_FALLBACK=1 to force stages globally.
function envOverride(defaultVal: boolean, envName: string, env: NodeJS.ProcessEnv): boolean {
  const v = env[envName];
  if (v === undefined) return defaultVal;
  return v === '1' || v.toLowerCase() === 'true';
}

export function getModuleFlags(
  overrides: Partial<ModuleFlags> = {},
  env: NodeJS.ProcessEnv = process.env
): ModuleFlags {
  const merged: ModuleFlags = { ...DEFAULT_FLAGS, ...overrides };
  return {
    converse:    envOverride(merged.converse,    'MOD_CONVERSE',    env),
    keyword:     envOverride(merged.keyword,     'MOD_KEYWORD',     env),
    statistical: envOverride(merged.statistical, 'MOD_STATISTICAL', env),
    common_qa:   envOverride(merged.common_qa,   'MOD_COMMON_QA',   env),
    fallback:    envOverride(merged.fallback,    'MOD_FALLBACK',    env),
  };
}

export function isEnabled(flags: ModuleFlags, moduleName: ModuleName): boolean {
  return !!flags[moduleName];
}
