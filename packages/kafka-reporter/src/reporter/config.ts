/**
 * Reporter Configuration
 *
 * Fixed at construction and frozen for the reporter's lifetime.
 */

import { z } from 'zod';
import type { EnvSource } from '@metrics-relay/platform-core';
import { ALL_METRICS, type MetricFilter } from '../metrics/types.js';
import { TIME_UNITS, TimeUnit } from '../metrics/time-unit.js';
import { jsonBufferSerializer, jsonStringSerializer } from '../serialization/json-serializer.js';
import type { MetricsSerializer } from '../serialization/types.js';
import { ReporterConfigError } from '../errors.js';

export const DEFAULT_TOPIC = 'metrics';

export interface ReporterConfig {
  readonly topic: string;
  readonly rateUnit: TimeUnit;
  readonly durationUnit: TimeUnit;
  readonly filter: MetricFilter;
  readonly serializer: MetricsSerializer;
}

export type ReporterOptions = { -readonly [K in keyof ReporterConfig]?: ReporterConfig[K] };

const reporterSettingsSchema = z.object({
  topic: z.string().trim().min(1, 'topic must be a non-empty string'),
  rateUnit: z.enum(TIME_UNITS),
  durationUnit: z.enum(TIME_UNITS),
});

export function resolveReporterConfig(options: ReporterOptions = {}): ReporterConfig {
  const parsed = reporterSettingsSchema.safeParse({
    topic: options.topic ?? DEFAULT_TOPIC,
    rateUnit: options.rateUnit ?? TimeUnit.SECONDS,
    durationUnit: options.durationUnit ?? TimeUnit.MILLISECONDS,
  });

  if (!parsed.success) {
    throw new ReporterConfigError('Invalid reporter configuration', {
      errors: parsed.error.errors.map(err => ({
        field: err.path.join('.'),
        message: err.message,
        code: err.code,
      })),
    });
  }

  return Object.freeze({
    ...parsed.data,
    filter: options.filter ?? ALL_METRICS,
    serializer: options.serializer ?? jsonStringSerializer,
  });
}

const PAYLOAD_SERIALIZERS = {
  string: jsonStringSerializer,
  bytes: jsonBufferSerializer,
} as const;

const reporterEnvSchema = z.object({
  METRICS_TOPIC: z.string().trim().min(1).optional(),
  METRICS_RATE_UNIT: z.enum(TIME_UNITS).optional(),
  METRICS_DURATION_UNIT: z.enum(TIME_UNITS).optional(),
  METRICS_PAYLOAD: z.enum(['string', 'bytes']).optional(),
});

/**
 * Reporter options from METRICS_* variables; unset variables are left to
 * the defaults of resolveReporterConfig.
 */
export function loadReporterOptionsFromEnv(env: EnvSource = process.env): ReporterOptions {
  const parsed = reporterEnvSchema.safeParse({
    METRICS_TOPIC: env.METRICS_TOPIC || undefined,
    METRICS_RATE_UNIT: env.METRICS_RATE_UNIT?.toLowerCase() || undefined,
    METRICS_DURATION_UNIT: env.METRICS_DURATION_UNIT?.toLowerCase() || undefined,
    METRICS_PAYLOAD: env.METRICS_PAYLOAD?.toLowerCase() || undefined,
  });

  if (!parsed.success) {
    throw new ReporterConfigError('Invalid METRICS_* environment', {
      errors: parsed.error.errors.map(err => ({
        field: err.path.join('.'),
        message: err.message,
      })),
    });
  }

  const { METRICS_TOPIC, METRICS_RATE_UNIT, METRICS_DURATION_UNIT, METRICS_PAYLOAD } = parsed.data;
  const options: ReporterOptions = {};
  if (METRICS_TOPIC) options.topic = METRICS_TOPIC;
  if (METRICS_RATE_UNIT) options.rateUnit = METRICS_RATE_UNIT;
  if (METRICS_DURATION_UNIT) options.durationUnit = METRICS_DURATION_UNIT;
  if (METRICS_PAYLOAD) options.serializer = PAYLOAD_SERIALIZERS[METRICS_PAYLOAD];
  return options;
}
