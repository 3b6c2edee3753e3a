/**
 * Configuration management for ChargeTrace
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';
import { SEVERITIES } from '../types/severity.js';
import { ConfigurationError } from '../errors/index.js';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const severitySchema = z.enum(SEVERITIES);

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Timeline construction
  timeline: z.object({
    minSeverity: severitySchema.default('INFO'),
    placeholderComponents: z
      .string()
      .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean))
      .default('generic'),
    // Digit runs at least this long collapse to a placeholder in dedup keys
    dedupMinDigitRun: z.coerce.number().int().min(1).default(3),
  }),

  // Silent-period detection
  gaps: z.object({
    thresholdSeconds: z.coerce.number().int().min(0).default(300),
  }),

  // Hourly error histogram
  histogram: z.object({
    spikeFactor: z.coerce.number().positive().default(3),
  }),

  // Fleet mode
  fleet: z.object({
    windowSeconds: z.coerce.number().int().min(0).default(300),
    minSeverity: severitySchema.default('HIGH'),
    maxConcurrency: z.coerce.number().int().min(1).default(4),
    snippetLength: z.coerce.number().int().min(1).default(60),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    timeline: {
      minSeverity: process.env.TIMELINE_MIN_SEVERITY,
      placeholderComponents: process.env.TIMELINE_PLACEHOLDER_COMPONENTS,
      dedupMinDigitRun: process.env.TIMELINE_DEDUP_MIN_DIGIT_RUN,
    },

    gaps: {
      thresholdSeconds: process.env.GAP_THRESHOLD_SECONDS,
    },

    histogram: {
      spikeFactor: process.env.HISTOGRAM_SPIKE_FACTOR,
    },

    fleet: {
      windowSeconds: process.env.FLEET_WINDOW_SECONDS,
      minSeverity: process.env.FLEET_MIN_SEVERITY,
      maxConcurrency: process.env.FLEET_MAX_CONCURRENCY,
      snippetLength: process.env.FLEET_SNIPPET_LENGTH,
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid ChargeTrace configuration', {
      issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    });
  }
  return parsed.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      const issues = error.context.issues;
      return {
        valid: false,
        errors: Array.isArray(issues) ? issues.map(String) : [error.message],
      };
    }
    throw error;
  }
}
