import {
  CODEC_COMPRESSION_RATIOS,
  DEFAULT_COMPRESSION_RATIO,
  DEFAULT_FORMAT_MULTIPLIER,
  FORMAT_MULTIPLIERS,
  TEMP_OVERHEAD_DIVISOR
} from '../config/formats';
import type { SpaceRequirement } from '../types/space';
import type { ConversionParameters } from '../types/task';

export function normalizeName(value: string | undefined): string {
  return (value ?? '').trim().replace(/^\./, '').toLowerCase();
}

/** Looks a normalized name up among the table's own keys, so `constructor` and friends stay unknown. */
export function lookupByName<T>(table: Readonly<Record<string, T>>, name: string | undefined): T | undefined {
  const key = normalizeName(name);
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export function compressionRatio(codec: string | undefined): number {
  return lookupByName(CODEC_COMPRESSION_RATIOS, codec) ?? DEFAULT_COMPRESSION_RATIO;
}

export function formatMultiplier(format: string | undefined): number {
  return lookupByName(FORMAT_MULTIPLIERS, format) ?? DEFAULT_FORMAT_MULTIPLIER;
}

export function estimateOutputSize(sourceSize: number, parameters: ConversionParameters): number {
  return Math.round(sourceSize * compressionRatio(parameters.videoCodec) * formatMultiplier(parameters.outputFormat));
}

export function estimateTempSize(sourceSize: number): number {
  return Math.floor(sourceSize / TEMP_OVERHEAD_DIVISOR);
}

/**
 * Bytes a conversion needs while it runs: the source itself, the estimated
 * output and scratch space. Only used to size admission reservations.
 */
export function calculateRequirement(sourceSize: number, parameters: ConversionParameters): SpaceRequirement {
  const estimatedOutputSize = estimateOutputSize(sourceSize, parameters);
  const tempFileSize = estimateTempSize(sourceSize);

  return {
    originalFileSize: sourceSize,
    estimatedOutputSize,
    tempFileSize,
    totalRequiredSize: sourceSize + estimatedOutputSize + tempFileSize,
    compressionRatio: sourceSize > 0 ? estimatedOutputSize / sourceSize : 0
  };
}
