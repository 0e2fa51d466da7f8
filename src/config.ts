/**
 * postlens Configuration
 * Centralized config for the LLM credential and orchestration limits
 */

import chalk from 'chalk';
import { z } from 'zod';
import { ConfigurationError } from './infra/errors.js';
import { DEFAULT_ORCHESTRATOR_CONFIG } from './infra/call-orchestrator.js';

export interface AnnotatorConfig {
  /** Credential for the LLM transport */
  apiKey: string | null;
  /** Consecutive failures on one model before switching */
  retryMaxNum: number;
  /** Delay before retrying after a failed call */
  retryDelayMs: number;
  /** Remote attempts allowed per orchestrated call */
  maxAttempts: number;
  /** Max tokens per reply */
  maxTokens: number;
  /** JSON model catalog; null means the built-in catalog */
  catalogPath: string | null;
}

type Env = Record<string, string | undefined>;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  POSTLENS_RETRY_MAX_NUM: positiveInt(DEFAULT_ORCHESTRATOR_CONFIG.retryMaxNum),
  POSTLENS_RETRY_DELAY_SECONDS: positiveInt(DEFAULT_ORCHESTRATOR_CONFIG.retryDelayMs / 1000),
  POSTLENS_MAX_ATTEMPTS: positiveInt(DEFAULT_ORCHESTRATOR_CONFIG.maxAttempts),
  POSTLENS_MAX_TOKENS: positiveInt(1024),
  POSTLENS_MODEL_CATALOG: z.string().optional(),
});

/**
 * Blank variables count as unset
 */
function readEnv(env: Env): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) cleaned[key] = value;
  }
  return cleaned;
}

function parseEnv(env: Env): { config: AnnotatorConfig | null; errors: string[] } {
  const parsed = EnvSchema.safeParse(readEnv(env));
  if (!parsed.success) {
    return {
      config: null,
      errors: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  const data = parsed.data;
  return {
    config: {
      apiKey: data.ANTHROPIC_API_KEY ?? null,
      retryMaxNum: data.POSTLENS_RETRY_MAX_NUM,
      retryDelayMs: data.POSTLENS_RETRY_DELAY_SECONDS * 1000,
      maxAttempts: data.POSTLENS_MAX_ATTEMPTS,
      maxTokens: data.POSTLENS_MAX_TOKENS,
      catalogPath: data.POSTLENS_MODEL_CATALOG ?? null,
    },
    errors: [],
  };
}

/**
 * Get the current configuration
 */
export function getConfig(env: Env = process.env): AnnotatorConfig {
  const { config, errors } = parseEnv(env);
  if (!config) {
    throw new ConfigurationError('Invalid environment', errors);
  }
  return config;
}

/**
 * Validate configuration and collect warnings
 */
export function validateConfig(env: Env = process.env): { valid: boolean; warnings: string[]; errors: string[] } {
  const { config, errors } = parseEnv(env);
  const warnings: string[] = [];

  if (config) {
    if (!config.apiKey) {
      errors.push('ANTHROPIC_API_KEY required for real LLM calls');
    }
    if (config.retryMaxNum === 1) {
      warnings.push('POSTLENS_RETRY_MAX_NUM=1 switches model on the first failure');
    }
    if (!config.catalogPath) {
      warnings.push('POSTLENS_MODEL_CATALOG not set - using built-in model catalog');
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
  };
}

/**
 * Log current configuration on startup
 */
export function logConfig(env: Env = process.env): void {
  const validation = validateConfig(env);
  const { config } = parseEnv(env);

  console.log(chalk.cyan('\n  postlens configuration'));
  console.log(chalk.gray('  ─────────────────────────────────'));

  if (config) {
    console.log(`  api key:        ${config.apiKey ? chalk.green('configured') : chalk.red('not set')}`);
    console.log(`  retry max num:  ${config.retryMaxNum}`);
    console.log(`  retry delay:    ${config.retryDelayMs / 1000}s`);
    console.log(`  max attempts:   ${config.maxAttempts}`);
    console.log(`  model catalog:  ${config.catalogPath ?? chalk.gray('built-in')}`);
  }

  for (const warning of validation.warnings) {
    console.log(chalk.yellow(`  ⚠ ${warning}`));
  }
  for (const error of validation.errors) {
    console.log(chalk.red(`  ✗ ${error}`));
  }
  console.log('');
}
