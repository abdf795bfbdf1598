// Config loader: reads ~/.config/mutmut-mcp/config.yaml (or MUTMUT_MCP_CONFIG) and
// deep-merges it over DEFAULT_CONFIG. Unset keys inherit defaults; a missing or
// broken file yields the defaults so the server still starts.
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { ServerConfig } from '../types/config.js';
import { logger } from '../logger.js';

const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'mutmut-mcp', 'config.yaml');

export const DEFAULT_CONFIG: ServerConfig = {
  executable: 'mutmut',
  timeouts: { run: null, rerun: null, results: 300, survivors: 300, clean: 60, show: 60 },
  env: {},
};

const timeoutSchema = z.number().positive().nullable();

export const ServerConfigSchema = z.object({
  executable: z.string().min(1),
  timeouts: z.object({
    run: timeoutSchema,
    rerun: timeoutSchema,
    results: timeoutSchema,
    survivors: timeoutSchema,
    clean: timeoutSchema,
    show: timeoutSchema,
  }),
  env: z.record(z.string()),
});

export interface ConfigResult {
  config: ServerConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env.MUTMUT_MCP_CONFIG ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.debug({ configPath }, 'No config file found, using defaults');
    return { config: cloneDefaults(), configPath, fromFile: false };
  }

  try {
    const raw = readFileSync(configPath, 'utf-8');
    const parsed: unknown = parseYaml(raw);
    const overrides = isPlainObject(parsed) ? parsed : {};
    const merged = deepMerge(toRecord(DEFAULT_CONFIG), overrides);
    return { config: ServerConfigSchema.parse(merged), configPath, fromFile: true };
  } catch (err) {
    logger.error({ configPath, error: err instanceof Error ? err.message : String(err) }, 'Failed to load config, using defaults');
    return { config: cloneDefaults(), configPath, fromFile: false };
  }
}

function cloneDefaults(): ServerConfig {
  return {
    executable: DEFAULT_CONFIG.executable,
    timeouts: { ...DEFAULT_CONFIG.timeouts },
    env: { ...DEFAULT_CONFIG.env },
  };
}

function toRecord(config: ServerConfig): Record<string, unknown> {
  return { executable: config.executable, timeouts: { ...config.timeouts }, env: { ...config.env } };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
