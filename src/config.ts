import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { z } from 'zod';
import { PROVIDERS, type Provider } from './generator/generator.js';
import type { Scope } from './model/scope.js';
import { ConfigError, NotInitializedError } from './errors.js';
import { createLogger } from './utils/logger.js';

const debug = createLogger('config');

export const DATA_DIR = '.lodkeep';

const ModelSettingsSchema = z.object({
  default: z.string().min(1).optional(),
  project: z.string().min(1).optional(),
  package: z.string().min(1).optional(),
  module: z.string().min(1).optional(),
  class: z.string().min(1).optional(),
  function: z.string().min(1).optional(),
}).strict();

export const ConfigSchema = z.object({
  languages: z.array(z.string().min(1)).default(['python', 'typescript', 'javascript', 'go', 'rust']),
  provider: z.enum(PROVIDERS).default('mock'),
  failOnStale: z.boolean().default(false),
  autoUpdate: z.boolean().default(false),
  maxParallelism: z.number().int().min(1).max(64).default(8),
  historyLimit: z.number().int().min(1).max(1000).default(10),
  /** Record a placeholder description when generation fails instead of leaving the entity unknown. */
  placeholderOnFailure: z.boolean().default(false),
  modelSettings: z.record(z.enum(PROVIDERS), ModelSettingsSchema).default({}),
});

export type LodkeepConfig = z.infer<typeof ConfigSchema>;
export type ModelSettings = z.infer<typeof ModelSettingsSchema>;

export interface LodkeepPaths {
  root: string;
  dataDir: string;
  sidecarDir: string;
  configFile: string;
  indexDb: string;
}

export function getPaths(root: string): LodkeepPaths {
  const dataDir = join(root, DATA_DIR);
  return {
    root,
    dataDir,
    sidecarDir: join(dataDir, 'lod'),
    configFile: join(dataDir, 'config.json'),
    indexDb: join(dataDir, 'index.db'),
  };
}

/** Nearest ancestor of `startPath` (inclusive) that contains a `.lodkeep` directory. */
export function findProjectRoot(startPath = process.cwd()): string {
  let current = resolve(startPath);
  for (;;) {
    if (existsSync(join(current, DATA_DIR))) return current;
    const parent = dirname(current);
    if (parent === current) throw new NotInitializedError(startPath);
    current = parent;
  }
}

export function defaultConfig(): LodkeepConfig {
  return ConfigSchema.parse({});
}

/** A missing file yields defaults; a file that is not valid JSON or fails the schema is a ConfigError. */
export function loadConfig(paths: LodkeepPaths): LodkeepConfig {
  if (!existsSync(paths.configFile)) {
    debug('no config at %s, using defaults', paths.configFile);
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(paths.configFile, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`${paths.configFile} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, {
      file: paths.configFile,
    });
  }
  return validateConfig(raw, paths.configFile);
}

export function saveConfig(config: LodkeepConfig, paths: LodkeepPaths): void {
  mkdirSync(dirname(paths.configFile), { recursive: true });
  writeFileSync(paths.configFile, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

export function validateConfig(raw: unknown, source = 'config'): LodkeepConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${source}: ${issues.join('; ')}`, { source, issues });
  }
  return parsed.data;
}

/** The scope's model, else the provider default, else undefined (the generator's own default). */
export function modelForScope(config: LodkeepConfig, provider: Provider, scope?: Scope): string | undefined {
  const settings = config.modelSettings[provider];
  if (!settings) return undefined;
  return (scope && settings[scope]) || settings.default;
}

/**
 * Applies `key=value` as typed on the command line. Dotted keys reach into
 * `modelSettings`, e.g. `modelSettings.anthropic.function=<model>`.
 */
export function setConfigValue(config: LodkeepConfig, key: string, value: string): LodkeepConfig {
  const [head, ...rest] = key.split('.');
  const next: Record<string, unknown> = { ...config };

  if (head === 'modelSettings') {
    const [provider, slot] = rest;
    if (!provider || !slot || rest.length !== 2) {
      throw new ConfigError(`Expected modelSettings.<provider>.<default|scope>, got ${key}`, { key });
    }
    const current: Record<string, unknown> = { ...config.modelSettings };
    const existing = current[provider];
    current[provider] = { ...(typeof existing === 'object' && existing !== null ? existing : {}), [slot]: value };
    next.modelSettings = current;
  } else if (rest.length > 0 || !(head in config)) {
    throw new ConfigError(`Unknown configuration key ${key}`, { key });
  } else if (head === 'languages') {
    next.languages = value.split(',').map(part => part.trim()).filter(Boolean);
  } else {
    next[head] = coerce(value);
  }

  return validateConfig(next, `${key}=${value}`);
}

function coerce(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+$/.test(value)) return Number(value);
  return value;
}
