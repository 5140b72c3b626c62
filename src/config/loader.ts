/**
 * Configuration loading for admission-guard
 *
 * Sources, lowest priority first:
 * 1. Defaults (see schemas.ts)
 * 2. JSON file named by ADMISSION_CONFIG_PATH (rules, exemptions, anything else)
 * 3. Environment variables (ADMISSION_*)
 *
 * String values in the file may reference the environment as `env:VAR_NAME`,
 * which keeps credentials such as a Redis password out of the file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { createRule } from '../rules/rule-matcher.js';
import { normalizeError } from '../utils/utils.js';
import { LimiterConfigSchema } from './schemas.js';
import type { LimiterConfig } from './types.js';

/**
 * Safely parse environment variable as integer with NaN detection
 *
 * @param value Environment variable value
 * @param name Environment variable name (for error messages)
 * @returns Parsed integer or undefined if not provided
 * @throws {ConfigurationError} If value is non-numeric
 */
export function parseEnvInt(value: string | undefined, name: string): number | undefined {
  if (!value) return undefined;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Invalid numeric value for ${name}: "${value}". Expected a valid integer.`);
  }
  return parsed;
}

/**
 * Safely parse environment variable as boolean
 *
 * @throws {ConfigurationError} If value is not 'true', 'false', '1', or '0'
 */
export function parseEnvBool(value: string | undefined, name: string): boolean | undefined {
  if (!value) return undefined;

  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1') return true;
  if (lower === 'false' || lower === '0') return false;

  throw new ConfigurationError(
    `Invalid boolean value for ${name}: "${value}". Expected "true", "false", "1", or "0".`
  );
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates raw configuration and builds the rule set
 *
 * @throws {ConfigurationError} On schema violations or invalid rules
 */
export function resolveLimiterConfig(input: unknown): LimiterConfig {
  const parsed = LimiterConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid limiter configuration: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  const { data } = parsed;
  const { bans } = data;
  if (bans.initialBan > bans.maxBan) {
    throw new ConfigurationError(
      `Invalid limiter configuration: bans.initialBan (${bans.initialBan}s) exceeds bans.maxBan (${bans.maxBan}s)`
    );
  }

  return {
    redisUrl: data.redisUrl,
    rules: Object.entries(data.rules).map(([pattern, rule]) => createRule(pattern, rule)),
    exempt: data.exempt,
    bans: {
      enabled: bans.enabled,
      threshold: bans.threshold,
      initialBanSeconds: bans.initialBan,
      maxBanSeconds: bans.maxBan,
      decaySeconds: bans.decayWindow,
      siteWide: bans.siteWide,
    },
    trustForwardedFor: data.trustForwardedFor,
    failOpen: data.failOpen,
  };
}

/**
 * Resolve env:VAR_NAME references in configuration
 */
function resolveEnvReferences(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    const match = value.match(/^env:([A-Z_][A-Z0-9_]*)$/);
    if (match && match[1]) {
      const resolved = env[match[1]];
      if (resolved === undefined) {
        throw new ConfigurationError(`Environment variable ${match[1]} not found (referenced as env:${match[1]})`);
      }
      return resolved;
    }
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvReferences(item, env));
  }

  if (value && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveEnvReferences(item, env);
    }
    return resolved;
  }

  return value;
}

async function readConfigJson(filePath: string, env: NodeJS.ProcessEnv): Promise<unknown> {
  const absolutePath = path.resolve(filePath);
  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read config file ${absolutePath}: ${normalizeError(error).message}`, {
      cause: error,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigurationError(`Config file ${absolutePath} is not valid JSON: ${normalizeError(error).message}`, {
      cause: error,
    });
  }
  return resolveEnvReferences(json, env);
}

/**
 * Load and resolve a JSON configuration file
 *
 * @throws {ConfigurationError} If the file is missing, unreadable or invalid
 */
export async function loadConfigFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<LimiterConfig> {
  const config = resolveLimiterConfig(await readConfigJson(filePath, env));
  console.log(`[Config] Loaded ${config.rules.length} rule(s) from ${path.resolve(filePath)}`);
  return config;
}

/** File contents the environment layer can merge into */
const FileLayerSchema = z
  .object({ bans: z.record(z.string(), z.unknown()).optional() })
  .passthrough();

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Build configuration from ADMISSION_* environment variables, layered over
 * the file named by ADMISSION_CONFIG_PATH when set
 *
 * @throws {ConfigurationError} On malformed variables or an invalid file
 */
export async function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Promise<LimiterConfig> {
  const configPath = env.ADMISSION_CONFIG_PATH;
  const fileLayer = FileLayerSchema.safeParse(configPath ? await readConfigJson(configPath, env) : {});
  if (!fileLayer.success) {
    throw new ConfigurationError(`Invalid limiter configuration: ${formatIssues(fileLayer.error)}`, {
      cause: fileLayer.error,
    });
  }

  const envLayer = withoutUndefined({
    redisUrl: env.ADMISSION_REDIS_URL || undefined,
    trustForwardedFor: parseEnvBool(env.ADMISSION_TRUST_FORWARDED_FOR, 'ADMISSION_TRUST_FORWARDED_FOR'),
    failOpen: parseEnvBool(env.ADMISSION_FAIL_OPEN, 'ADMISSION_FAIL_OPEN'),
  });
  const banEnvLayer = withoutUndefined({
    enabled: parseEnvBool(env.ADMISSION_BAN_ENABLED, 'ADMISSION_BAN_ENABLED'),
    threshold: parseEnvInt(env.ADMISSION_BAN_THRESHOLD, 'ADMISSION_BAN_THRESHOLD'),
    initialBan: env.ADMISSION_BAN_INITIAL || undefined,
    maxBan: env.ADMISSION_BAN_MAX || undefined,
    decayWindow: env.ADMISSION_BAN_DECAY || undefined,
    siteWide: parseEnvBool(env.ADMISSION_BAN_SITE_WIDE, 'ADMISSION_BAN_SITE_WIDE'),
  });

  const config = resolveLimiterConfig({
    ...fileLayer.data,
    ...envLayer,
    bans: { ...fileLayer.data.bans, ...banEnvLayer },
  });

  console.log(
    `[Config] Loaded ${config.rules.length} rule(s)` + (configPath ? ` from ${path.resolve(configPath)}` : ' (no config file)')
  );
  return config;
}
