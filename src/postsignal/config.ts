/**
 * postsignal - Configuration with Zod Validation
 *
 * Configuration is an explicit immutable value handed to every component.
 * Sources, lowest precedence first: defaults, environment (POSTSIGNAL_*),
 * JSON config file, explicit overrides.
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { deepFreeze } from './freeze.js';
import { logger } from '../logger.js';

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_CRYPTO_KEYWORDS = [
  'bitcoin',
  'btc',
  'ethereum',
  'eth',
  'dogecoin',
  'doge',
  'crypto',
];

export const DEFAULT_STOCK_KEYWORDS = ['tesla', 'tsla', 'stock', 'shares'];

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

const KeywordListSchema = z
  .array(z.string().trim().min(1))
  .transform(words => [...new Set(words.map(word => word.toLowerCase()))]);

export const PatternConfigSchema = z.object({
  // one second is the smallest window
  windowHours: z.number().min(1 / 3600).default(1),
  burstSensitivity: z.number().min(0).default(2),
  minBurstWindows: z.number().int().min(1).default(2),
  trendLookback: z.number().int().min(1).default(10),
  shiftThreshold: z.number().min(0).default(0.5),
  highEngagementPercentile: z.number().min(0).max(100).default(75),
  themeCount: z.number().int().min(1).default(10),
});

export const ConfidenceWeightsSchema = z.object({
  sentimentWeight: z.number().min(0).default(1.0),
  engagementWeight: z.number().min(0).default(0.2),
  burstBoost: z.number().min(0).default(0.15),
  engagementHourBoost: z.number().min(0).default(0.1),
});

export const AnalysisConfigSchema = z
  .object({
    targetHandle: z
      .string()
      .trim()
      .min(1)
      .transform(handle => handle.replace(/^@/, ''))
      .default('elonmusk'),
    limit: z.number().int().positive().default(200),
    minConfidence: z.number().min(0).max(1).default(0.7),
    positiveThreshold: z.number().gt(0).max(1).default(0.3),
    negativeThreshold: z.number().min(-1).lt(0).default(-0.3),
    cryptoKeywords: KeywordListSchema.default(DEFAULT_CRYPTO_KEYWORDS),
    stockKeywords: KeywordListSchema.default(DEFAULT_STOCK_KEYWORDS),
    patterns: PatternConfigSchema.default({}),
    confidence: ConfidenceWeightsSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.negativeThreshold >= config.positiveThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['negativeThreshold'],
        message: 'must be below positiveThreshold',
      });
    }
    if (config.cryptoKeywords.length === 0 && config.stockKeywords.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cryptoKeywords'],
        message: 'at least one crypto or stock keyword is required',
      });
    }
  });

export type AnalysisConfig = Readonly<z.infer<typeof AnalysisConfigSchema>>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
export type PatternConfig = z.infer<typeof PatternConfigSchema>;
export type ConfidenceWeights = z.infer<typeof ConfidenceWeightsSchema>;

// ============================================================================
// CONFIGURATION LOADERS
// ============================================================================

/**
 * Validate raw configuration, throwing ConfigurationError on any issue
 */
export function parseConfig(raw: unknown): AnalysisConfig {
  const result = AnalysisConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    logger.configRejected(issues);
    throw new ConfigurationError('Invalid analysis configuration', issues);
  }
  logger.configLoaded({
    targetHandle: result.data.targetHandle,
    minConfidence: result.data.minConfidence,
    keywordCount: result.data.cryptoKeywords.length + result.data.stockKeywords.length,
  });
  return deepFreeze(result.data);
}

/**
 * Validate configuration without throwing
 * Returns array of error messages
 */
export function validateConfig(config: unknown): string[] {
  const result = AnalysisConfigSchema.safeParse(config);
  if (result.success) return [];
  return formatIssues(result.error);
}

/**
 * Load configuration from environment, with explicit overrides on top
 */
export function loadConfig(
  overrides: AnalysisConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): AnalysisConfig {
  return parseConfig(mergeLayers([readEnvLayer(env), overrides]));
}

/**
 * Load a JSON configuration file; environment values fill the gaps
 */
export function loadConfigFile(
  path: string,
  overrides: AnalysisConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): AnalysisConfig {
  if (!fs.existsSync(path)) {
    throw new ConfigurationError(`Configuration file '${path}' not found`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Configuration file '${path}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Configuration file '${path}' must contain a JSON object`);
  }

  return parseConfig(mergeLayers([readEnvLayer(env), parsed, overrides]));
}

/**
 * Defaults plus overrides, ignoring the environment
 * Useful for tests and synthetic runs
 */
export function createDefaultConfig(overrides: AnalysisConfigInput = {}): AnalysisConfig {
  return parseConfig(overrides);
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function parseNumberEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const val = env[key];
  if (!val) return undefined;
  const num = Number(val);
  return isNaN(num) ? undefined : num;
}

function parseArrayEnv(env: NodeJS.ProcessEnv, key: string): string[] | undefined {
  const val = env[key];
  if (!val) return undefined;
  return val
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

function readEnvLayer(env: NodeJS.ProcessEnv): object {
  return {
    targetHandle: env.POSTSIGNAL_TARGET_HANDLE,
    limit: parseNumberEnv(env, 'POSTSIGNAL_LIMIT'),
    minConfidence: parseNumberEnv(env, 'POSTSIGNAL_MIN_CONFIDENCE'),
    positiveThreshold: parseNumberEnv(env, 'POSTSIGNAL_POSITIVE_THRESHOLD'),
    negativeThreshold: parseNumberEnv(env, 'POSTSIGNAL_NEGATIVE_THRESHOLD'),
    cryptoKeywords: parseArrayEnv(env, 'POSTSIGNAL_CRYPTO_KEYWORDS'),
    stockKeywords: parseArrayEnv(env, 'POSTSIGNAL_STOCK_KEYWORDS'),
    patterns: {
      windowHours: parseNumberEnv(env, 'POSTSIGNAL_WINDOW_HOURS'),
      burstSensitivity: parseNumberEnv(env, 'POSTSIGNAL_BURST_SENSITIVITY'),
      highEngagementPercentile: parseNumberEnv(env, 'POSTSIGNAL_HIGH_ENGAGEMENT_PERCENTILE'),
    },
  };
}

const NESTED_SECTIONS = new Set(['patterns', 'confidence']);

/**
 * Merge configuration layers, later layers winning.
 * Undefined values never mask an earlier layer; nested sections merge per key.
 */
function mergeLayers(layers: object[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  const nested: Record<string, Record<string, unknown>> = {};

  for (const layer of layers) {
    const entries: Array<[string, unknown]> = Object.entries(layer);
    for (const [key, value] of entries) {
      if (value === undefined) continue;
      if (NESTED_SECTIONS.has(key) && isRecord(value)) {
        nested[key] = { ...nested[key], ...removeUndefined(value) };
      } else {
        merged[key] = value;
      }
    }
  }

  return { ...merged, ...nested };
}

function removeUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
