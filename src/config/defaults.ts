/**
 * Engine configuration defaults and environment overrides
 */

import { pipe } from 'fp-ts/function';
import * as E from 'fp-ts/Either';
import type { Either } from 'fp-ts/Either';
import type { EngineConfig } from '../types';
import type { ValidationDetail, ValidationError } from '../types/errors';
import { validationError } from '../types/errors';
import { EngineConfigCodec, validate } from '../types/schemas';
import { defaultRetryPolicy } from '../errors/handler';
import { DEFAULT_CLOCK_SKEW_TOLERANCE_MS } from '../sync/conflict-detector';

export const defaultEngineConfig: EngineConfig = {
  mappings: [],
  strategies: [],
  defaultStrategy: { name: 'timestamp', rules: [] },
  retryPolicy: defaultRetryPolicy,
  batchSize: 100,
  abortThreshold: 0.5,
  recordTimeoutMs: 30000, // 30 seconds
  clockSkewToleranceMs: DEFAULT_CLOCK_SKEW_TOLERANCE_MS,
  sampling: {
    sampleSize: 100,
    severityThreshold: 'low',
  },
};

export type Environment = Readonly<Record<string, string | undefined>>;

export const ENV_VARS = {
  batchSize: 'EHR_SYNC_BATCH_SIZE',
  abortThreshold: 'EHR_SYNC_ABORT_THRESHOLD',
  recordTimeoutMs: 'EHR_SYNC_RECORD_TIMEOUT_MS',
  maxRetries: 'EHR_SYNC_MAX_RETRIES',
  retryDelayMs: 'EHR_SYNC_RETRY_DELAY_MS',
} as const;

export const validateEngineConfig = (config: EngineConfig): Either<ValidationError, EngineConfig> =>
  pipe(
    validate(EngineConfigCodec, 'EngineConfig')(config),
    E.map(() => config),
  );

/**
 * Apply EHR_SYNC_* overrides to a base configuration.
 * Unset variables keep the base value; the result is validated as a whole.
 */
export const loadEngineConfigFromEnv = (
  base: EngineConfig = defaultEngineConfig,
  env: Environment = process.env,
): Either<ValidationError, EngineConfig> => {
  const problems: ValidationDetail[] = [];

  const numberFrom = (name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
      problems.push({ path: name, message: `expected a number, got "${raw}"` });
      return fallback;
    }
    return value;
  };

  const config: EngineConfig = {
    ...base,
    batchSize: numberFrom(ENV_VARS.batchSize, base.batchSize),
    abortThreshold: numberFrom(ENV_VARS.abortThreshold, base.abortThreshold),
    recordTimeoutMs: numberFrom(ENV_VARS.recordTimeoutMs, base.recordTimeoutMs),
    retryPolicy: {
      ...base.retryPolicy,
      maxRetries: numberFrom(ENV_VARS.maxRetries, base.retryPolicy.maxRetries),
      baseDelay: numberFrom(ENV_VARS.retryDelayMs, base.retryPolicy.baseDelay),
    },
  };

  return problems.length > 0
    ? E.left(validationError('Invalid environment configuration', problems))
    : validateEngineConfig(config);
};
