/**
 * livyscan — Configuration resolution.
 *
 * Resolution order (highest to lowest priority):
 *   1. Explicit flags (--trusted-domain, --no-default-domains, --concurrency)
 *   2. LIVYSCAN_TRUSTED_DOMAINS env var (comma-separated)
 *   3. Project config: <root>/.livyscan/config.json
 *   4. Global config: $XDG_CONFIG_HOME/livyscan/config.json (~/.config by default)
 *   5. Built-in defaults
 *
 * Trusted domains accumulate across layers; scalar settings take the
 * highest layer that sets them.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../types/errors.js';
import { DEFAULT_TRUSTED_DOMAINS } from '../catalog/index.js';

// ─── Types ───────────────────────────────────────────────────────────

export const ConfigFileSchema = z.object({
  trustedDomains: z.array(z.string()).optional(),
  useDefaultDomains: z.boolean().optional(),
  concurrency: z.number().int().min(1).max(64).optional(),
  outputDir: z.string().min(1).optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ConfigFlags {
  trustedDomains?: readonly string[];
  /** false when --no-default-domains was given */
  useDefaultDomains?: boolean;
  concurrency?: number;
}

export interface ResolvedConfig {
  /** Effective trusted patterns, defaults included when enabled */
  trustedDomains: string[];
  useDefaultDomains: boolean;
  concurrency: number;
  outputDir: string;
  /** Config files that contributed, highest priority first */
  sources: string[];
}

export const ENV_TRUSTED_DOMAINS = 'LIVYSCAN_TRUSTED_DOMAINS';

const DEFAULTS = {
  useDefaultDomains: true,
  concurrency: 4,
  outputDir: 'output',
} as const;

const CONFIG_FILE = 'config.json';

// ─── Config file paths ───────────────────────────────────────────────

export function projectConfigPath(root: string): string {
  return join(root, '.livyscan', CONFIG_FILE);
}

export function globalConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, 'livyscan', CONFIG_FILE);
}

// ─── Read helpers ────────────────────────────────────────────────────

/** A missing file is no config; an unreadable or invalid one is fatal. */
export function readConfigFile(path: string): ConfigFile | null {
  if (!existsSync(path)) return null;

  let payload: unknown;
  try {
    payload = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`cannot read config ${path}: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = ConfigFileSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigurationError(`invalid config ${path}: ${where}${issue?.message ?? 'invalid'}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function parseDomainList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

// ─── Unified resolution ──────────────────────────────────────────────

export function resolveConfig(
  root: string,
  flags: ConfigFlags = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  if (flags.concurrency !== undefined && !isValidConcurrency(flags.concurrency)) {
    throw new ConfigurationError(`concurrency must be an integer from 1 to 64, got ${flags.concurrency}`);
  }

  const sources: string[] = [];
  const layers: ConfigFile[] = [];
  for (const path of [projectConfigPath(root), globalConfigPath(env)]) {
    const cfg = readConfigFile(path);
    if (cfg) {
      layers.push(cfg);
      sources.push(path);
    }
  }

  const pick = <K extends keyof ConfigFile>(key: K): ConfigFile[K] =>
    layers.find(l => l[key] !== undefined)?.[key];

  const useDefaultDomains = flags.useDefaultDomains ?? pick('useDefaultDomains') ?? DEFAULTS.useDefaultDomains;

  const trustedDomains = [
    ...(useDefaultDomains ? DEFAULT_TRUSTED_DOMAINS : []),
    ...[...layers].reverse().flatMap(l => l.trustedDomains ?? []),
    ...parseDomainList(env[ENV_TRUSTED_DOMAINS]),
    ...(flags.trustedDomains ?? []),
  ];

  return {
    trustedDomains,
    useDefaultDomains,
    concurrency: flags.concurrency ?? pick('concurrency') ?? DEFAULTS.concurrency,
    outputDir: pick('outputDir') ?? DEFAULTS.outputDir,
    sources,
  };
}

function isValidConcurrency(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= 64;
}
