/**
 * Repair Configuration
 * Centralized configuration for the notebook repairer with environment variable support
 */

import { z } from 'zod';
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from './notebook-repair/src/logger.js';

export interface RepairConfig {
  // Logging
  logLevel: LogLevel;
  logFormat: LogFormat;

  // Safety settings
  maxFileSize: number; // bytes
  validateStructure: boolean;

  // Backups
  backupCollisionLimit: number;
}

const KB = 1024;
const MB = 1024 * KB;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const RepairEnvSchema = z.object({
  NOTEBOOK_REPAIR_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NOTEBOOK_REPAIR_LOG_FORMAT: z.enum(LOG_FORMATS).default('text'),
  NOTEBOOK_REPAIR_MAX_FILE_SIZE: z.coerce
    .number()
    .int()
    .min(KB, 'must be at least 1KB')
    .max(1024 * MB, 'must be at most 1GB')
    .default(200 * MB),
  NOTEBOOK_REPAIR_VALIDATE_STRUCTURE: booleanFlag.default('true'),
  NOTEBOOK_REPAIR_BACKUP_COLLISION_LIMIT: z.coerce.number().int().min(0).max(999).default(99)
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Load and validate repair configuration. Unset and empty variables fall
 * back to their defaults.
 */
export function loadRepairConfig(env: NodeJS.ProcessEnv = process.env): RepairConfig {
  const relevant = Object.fromEntries(
    Object.keys(RepairEnvSchema.shape)
      .map(key => [key, env[key]] as const)
      .filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = RepairEnvSchema.safeParse(relevant);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    logLevel: values.NOTEBOOK_REPAIR_LOG_LEVEL,
    logFormat: values.NOTEBOOK_REPAIR_LOG_FORMAT,
    maxFileSize: values.NOTEBOOK_REPAIR_MAX_FILE_SIZE,
    validateStructure: values.NOTEBOOK_REPAIR_VALIDATE_STRUCTURE,
    backupCollisionLimit: values.NOTEBOOK_REPAIR_BACKUP_COLLISION_LIMIT
  };
}
