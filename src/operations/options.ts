/**
 * Option validation and default merging
 *
 * Every public entry point takes a plain options object. It is checked
 * against its ArkType schema and merged over the defaults here, so the
 * rest of the code only ever sees fully resolved settings.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { QC_DEFAULTS } from "../formats/fastq/constants";
import type { PoolLogLevel, PoolOptions, QcOptions, ReducerOptions, SeparatorMode } from "../types";
import { PoolSettingsSchema, QcOptionsSchema, ReducerOptionsSchema } from "../types";

/**
 * Chunk processing options with every default applied
 */
export interface ResolvedQcOptions {
  readonly positionLimit: number;
  readonly sampleStride: number;
  readonly gcSampleCap: number;
  readonly qualitySampleCap: number;
  readonly qualitySamplePositions: number;
  readonly separatorMode: SeparatorMode;
  readonly filterMinLength: number;
  readonly filterMaxNPercent: number;
}

/**
 * Reduction options with every default applied
 */
export interface ResolvedReducerOptions {
  readonly combinedSampleCap: number;
  readonly label: string;
}

/**
 * Pool-only options with every default applied
 */
export interface ResolvedPoolSettings {
  readonly concurrency: number;
  readonly maxFailures: number;
  readonly logLevel: PoolLogLevel;
}

export const DEFAULT_QC_OPTIONS: ResolvedQcOptions = {
  positionLimit: QC_DEFAULTS.POSITION_LIMIT,
  sampleStride: QC_DEFAULTS.SAMPLE_STRIDE,
  gcSampleCap: QC_DEFAULTS.GC_SAMPLE_CAP,
  qualitySampleCap: QC_DEFAULTS.QUALITY_SAMPLE_CAP,
  qualitySamplePositions: QC_DEFAULTS.QUALITY_SAMPLE_POSITIONS,
  separatorMode: QC_DEFAULTS.SEPARATOR_MODE,
  filterMinLength: QC_DEFAULTS.FILTER_MIN_LENGTH,
  filterMaxNPercent: QC_DEFAULTS.FILTER_MAX_N_PERCENT,
};

export const DEFAULT_REDUCER_OPTIONS: ResolvedReducerOptions = {
  combinedSampleCap: QC_DEFAULTS.COMBINED_SAMPLE_CAP,
  label: QC_DEFAULTS.COMBINED_LABEL,
};

export const DEFAULT_POOL_SETTINGS: ResolvedPoolSettings = {
  concurrency: 4,
  maxFailures: Number.POSITIVE_INFINITY,
  logLevel: "None",
};

/**
 * Validate chunk processing options and merge them over the defaults
 *
 * @throws {ValidationError} If any option is out of range
 */
export function resolveQcOptions(options: QcOptions = {}): ResolvedQcOptions {
  const validationResult = QcOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(
      `Invalid QC options: ${validationResult.summary}`,
      undefined,
      "Limits, strides and caps must be non-negative integers"
    );
  }

  return {
    positionLimit: options.positionLimit ?? DEFAULT_QC_OPTIONS.positionLimit,
    sampleStride: options.sampleStride ?? DEFAULT_QC_OPTIONS.sampleStride,
    gcSampleCap: options.gcSampleCap ?? DEFAULT_QC_OPTIONS.gcSampleCap,
    qualitySampleCap: options.qualitySampleCap ?? DEFAULT_QC_OPTIONS.qualitySampleCap,
    qualitySamplePositions:
      options.qualitySamplePositions ?? DEFAULT_QC_OPTIONS.qualitySamplePositions,
    separatorMode: options.separatorMode ?? DEFAULT_QC_OPTIONS.separatorMode,
    filterMinLength: options.filterMinLength ?? DEFAULT_QC_OPTIONS.filterMinLength,
    filterMaxNPercent: options.filterMaxNPercent ?? DEFAULT_QC_OPTIONS.filterMaxNPercent,
  };
}

/**
 * Validate reduction options and merge them over the defaults
 *
 * @throws {ValidationError} If any option is out of range
 */
export function resolveReducerOptions(options: ReducerOptions = {}): ResolvedReducerOptions {
  const validationResult = ReducerOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid reducer options: ${validationResult.summary}`);
  }

  return {
    combinedSampleCap: options.combinedSampleCap ?? DEFAULT_REDUCER_OPTIONS.combinedSampleCap,
    label: options.label ?? DEFAULT_REDUCER_OPTIONS.label,
  };
}

/**
 * Validate the pool-only options and merge them over the defaults
 *
 * @throws {ValidationError} If any option is out of range
 */
export function resolvePoolSettings(options: PoolOptions = {}): ResolvedPoolSettings {
  const validationResult = PoolSettingsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid pool options: ${validationResult.summary}`);
  }

  return {
    concurrency: options.concurrency ?? DEFAULT_POOL_SETTINGS.concurrency,
    maxFailures: options.maxFailures ?? DEFAULT_POOL_SETTINGS.maxFailures,
    logLevel: options.logLevel ?? DEFAULT_POOL_SETTINGS.logLevel,
  };
}
