/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { DepotProgressConfig, PartialDepotProgressConfig } from './schema.js';

/**
 * Millisecond duration schema
 */
const durationSchema = z.number().int().min(0);

export const reporterConfigSchema = z.object({
  atomicWrites: z.boolean(),
  debug: z.boolean(),
});

export const watchConfigSchema = z.object({
  pollIntervalMs: z.number().int().min(10).max(60000),
  timeoutMs: durationSchema.optional(),
});

export const simulateConfigSchema = z.object({
  totalBytes: z.number().int().min(0),
  chunkBytes: z.number().int().min(1),
  intervalMs: durationSchema,
});

export const outputConfigSchema = z.object({
  color: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  reporter: reporterConfigSchema,
  watch: watchConfigSchema,
  simulate: simulateConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files)
 */
export const partialConfigSchema = z.object({
  reporter: reporterConfigSchema.partial().optional(),
  watch: watchConfigSchema.partial().optional(),
  simulate: simulateConfigSchema.partial().optional(),
  output: outputConfigSchema.partial().optional(),
});

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): DepotProgressConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialDepotProgressConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
