/**
 * Configuration for the data interchange pipelines.
 *
 * @module config
 */

import { createLogger, type Logger } from '@quipkeep/core';
import { release } from 'node:os';
import { z } from 'zod';
import { deviceInfoSchema, type DeviceInfo } from './snapshot-schema.js';

export const DEFAULT_MAX_SNAPSHOT_BYTES = 100 * 1024 * 1024;

export const dataInterchangeConfigSchema = z.object({
  /** Version written into exported snapshots */
  appVersion: z.string().min(1).default('1.0.0'),
  /** Largest payload an export may produce */
  maxSnapshotBytes: z.number().int().positive().default(DEFAULT_MAX_SNAPSHOT_BYTES),
  /** Free space the sink must report, as a multiple of the payload size */
  storageSafetyFactor: z.number().min(1).default(2),
  /** Creation-time proximity for likely duplicates against local records */
  likelyDuplicateWindowMs: z.number().int().nonnegative().default(60_000),
  /** How far in the future a creation timestamp may lie before it is flagged */
  futureTimestampToleranceMs: z.number().int().nonnegative().default(86_400_000),
  /** Indent serialized snapshots */
  prettyPrint: z.boolean().default(true),
  /** Device metadata for exports (default: read from the host) */
  deviceInfo: deviceInfoSchema.optional(),
});

/**
 * Options accepted by the pipelines and the service. Every field is
 * optional.
 */
export type DataInterchangeConfig = z.input<typeof dataInterchangeConfigSchema> & {
  logger?: Logger;
};

export type ResolvedDataInterchangeConfig = Omit<
  z.output<typeof dataInterchangeConfigSchema>,
  'deviceInfo'
> & {
  readonly deviceInfo: DeviceInfo;
  readonly logger: Logger;
};

/**
 * Apply defaults and validate.
 *
 * @throws ZodError for out-of-range values
 */
export function resolveConfig(config: DataInterchangeConfig = {}): ResolvedDataInterchangeConfig {
  const { logger, ...rest } = config;
  const parsed = dataInterchangeConfigSchema.parse(rest);

  return {
    ...parsed,
    deviceInfo: parsed.deviceInfo ?? {
      platform: process.platform,
      osVersion: release(),
      appBuild: parsed.appVersion,
    },
    logger: logger ?? createLogger({ module: 'data-interchange' }),
  };
}
