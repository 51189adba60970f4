/**
 * Configuration management for devflow-triage
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { z } from 'zod';
import { logger, initErrorTracking } from './logger.js';
import { parseOrThrow } from './validation.js';

const ClassifierConfigSchema = z.object({
  threshold: z.number().min(0).max(1).default(0.15),
  scoreScale: z.number().positive().default(1),
  maxCategories: z.number().int().min(1).max(20).default(3),
  rulesPath: z.string().optional(),
});

const WorkflowsConfigSchema = z.object({
  definitionsPath: z.string().optional(),
});

const ExecutorConfigSchema = z.object({
  capabilityTimeoutMs: z.number().int().min(1).max(3_600_000).default(120_000),
  capabilityTimeouts: z.record(z.number().int().min(1).max(3_600_000)).default({}),
  maxRetries: z.number().int().min(0).max(10).default(2),
  initialBackoffMs: z.number().int().min(0).max(60_000).default(500),
  maxBackoffMs: z.number().int().min(0).max(300_000).default(10_000),
  backoffMultiplier: z.number().min(1).max(10).default(2),
  backoffJitter: z.number().min(0).max(1).default(0.3),
  maxConcurrentCapabilities: z.number().int().min(1).max(64).default(4),
}).refine((executor) => executor.maxBackoffMs >= executor.initialBackoffMs, {
  message: 'maxBackoffMs must not be below initialBackoffMs',
  path: ['maxBackoffMs'],
});

const OrchestratorConfigSchema = z.object({
  maxInFlightPhases: z.number().int().min(1).max(64).default(4),
  runDeadlineMs: z.number().int().min(1).optional(),
  multiCategoryPolicy: z.enum(['composite', 'independent', 'primary']).default('composite'),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  format: z.enum(['json', 'pretty']).optional(),
  sentryDsn: z.string().optional(),
});

const ConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  classifier: ClassifierConfigSchema.default({}),
  workflows: WorkflowsConfigSchema.default({}),
  executor: ExecutorConfigSchema.default({}),
  orchestrator: OrchestratorConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof ConfigSchema>;
export type ClassifierConfig = EngineConfig['classifier'];
export type ExecutorConfig = EngineConfig['executor'];
export type OrchestratorConfig = EngineConfig['orchestrator'];
export type MultiCategoryPolicy = OrchestratorConfig['multiCategoryPolicy'];

/** Partial overrides as written in a config file */
export type EngineConfigInput = z.input<typeof ConfigSchema>;

const CONFIG_FILE_NAME = 'devflow.config.json';

/**
 * Interpolate environment variables in config values
 */
function interpolateEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
      return process.env[envVar] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map(interpolateEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateEnvVars(value);
    }
    return result;
  }
  return obj;
}

/**
 * Find config file by walking up directories
 */
function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Load and validate configuration
 */
export function loadConfig(configPath?: string): EngineConfig {
  const path = configPath ?? findConfigFile();

  let rawConfig: unknown = {};

  if (path && existsSync(path)) {
    try {
      const content = readFileSync(path, 'utf-8');
      rawConfig = JSON.parse(content);
      logger.debug('Loaded config from file', { path });
    } catch (error) {
      logger.warn('Failed to parse config file, using defaults', {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  } else {
    logger.debug('No config file found, using defaults');
  }

  const result = ConfigSchema.safeParse(interpolateEnvVars(rawConfig));

  if (!result.success) {
    logger.warn('Config validation errors, using defaults', {
      errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
    return ConfigSchema.parse({});
  }

  return result.data;
}

/**
 * Build a configuration from in-code overrides
 */
export function createConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return parseOrThrow(ConfigSchema, overrides, 'configuration');
}

export function getDefaultConfig(): EngineConfig {
  return ConfigSchema.parse({});
}

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): { valid: boolean; errors?: string[] } {
  const result = ConfigSchema.safeParse(config);

  if (result.success) {
    return { valid: true };
  }

  return {
    valid: false,
    errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
  };
}

/**
 * Apply the logging section to the root logger
 *
 * Unset fields leave the LOG_LEVEL / LOG_FORMAT / SENTRY_DSN environment
 * defaults in place.
 */
export function applyLoggingConfig(config: EngineConfig): void {
  if (config.logging.level) {
    logger.setLevel(config.logging.level);
  }
  if (config.logging.format) {
    logger.setFormat(config.logging.format);
  }
  initErrorTracking(config.logging.sentryDsn);
}

let cachedConfig: EngineConfig | null = null;

/**
 * Get the current configuration (cached)
 */
export function getConfig(): EngineConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
