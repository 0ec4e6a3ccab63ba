import { LanguageModelConfig } from '../../config/language-model-config.type';
import { VavExtractionConfig } from '../../config/vav-extraction-config.type';
import {
  DEFAULT_BOX_ID_PATTERN,
  DEFAULT_INLET_SIZE_PATTERN,
} from './field-patterns.util';

/**
 * Explicit per-run configuration handed to every domain service call.
 */
export interface ExtractionSettings {
  readonly neighborhoodRadius: number;
  readonly recoveryRadius: number;
  readonly cfmRange: { readonly min: number; readonly max: number };
  /** Compiled with the `gi` flags; use with matchAll or search only */
  readonly boxIdPattern: RegExp;
  /** Compiled with the `i` flag, tested against normalized sizes */
  readonly inletSizePattern: RegExp;
  readonly minFieldCount: number;
  readonly estimateInletFromCfm: boolean;
  readonly maxPages: number;
  readonly languageModel: {
    readonly enabled: boolean;
    readonly timeoutMs: number;
    readonly maxConcurrency: number;
  };
}

export type ExtractionSettingsOverrides = {
  neighborhoodRadius?: number;
  recoveryRadius?: number;
  cfmMin?: number;
  cfmMax?: number;
  boxIdPattern?: string;
  inletSizePattern?: string;
  minFieldCount?: number;
  estimateInletFromCfm?: boolean;
  maxPages?: number;
  useLanguageModel?: boolean;
  languageModelTimeoutMs?: number;
  languageModelMaxConcurrency?: number;
};

export const DEFAULT_VAV_EXTRACTION_CONFIG: VavExtractionConfig = {
  neighborhoodRadiusPt: 72,
  recoveryRadiusPt: 144,
  cfmRange: { min: 25, max: 20000 },
  boxIdPattern: DEFAULT_BOX_ID_PATTERN,
  inletSizePattern: DEFAULT_INLET_SIZE_PATTERN,
  minFieldCount: 2,
  estimateInletFromCfm: false,
  maxPages: 500,
};

export const DEFAULT_LANGUAGE_MODEL_CONFIG: LanguageModelConfig = {
  enabled: false,
  baseUrl: 'https://generativelanguage.googleapis.com',
  model: 'gemini-2.0-flash',
  timeoutMs: 15000,
  maxConcurrency: 4,
};

export function createExtractionSettings(
  config: VavExtractionConfig = DEFAULT_VAV_EXTRACTION_CONFIG,
  languageModel: LanguageModelConfig = DEFAULT_LANGUAGE_MODEL_CONFIG,
  overrides: ExtractionSettingsOverrides = {},
): ExtractionSettings {
  const neighborhoodRadius =
    overrides.neighborhoodRadius ?? config.neighborhoodRadiusPt;
  const recoveryRadius =
    overrides.recoveryRadius ??
    (overrides.neighborhoodRadius !== undefined
      ? 2 * overrides.neighborhoodRadius
      : config.recoveryRadiusPt);
  const cfmMin = overrides.cfmMin ?? config.cfmRange.min;
  const cfmMax = overrides.cfmMax ?? config.cfmRange.max;

  if (!(neighborhoodRadius > 0) || !(recoveryRadius >= 0)) {
    throw new RangeError('Neighborhood and recovery radius must be positive');
  }
  if (!(cfmMin < cfmMax)) {
    throw new RangeError(`Invalid CFM range ${cfmMin}-${cfmMax}`);
  }

  return Object.freeze({
    neighborhoodRadius,
    recoveryRadius,
    cfmRange: Object.freeze({ min: cfmMin, max: cfmMax }),
    boxIdPattern: new RegExp(
      overrides.boxIdPattern ?? config.boxIdPattern,
      'gi',
    ),
    inletSizePattern: new RegExp(
      overrides.inletSizePattern ?? config.inletSizePattern,
      'i',
    ),
    minFieldCount: overrides.minFieldCount ?? config.minFieldCount,
    estimateInletFromCfm:
      overrides.estimateInletFromCfm ?? config.estimateInletFromCfm,
    maxPages: overrides.maxPages ?? config.maxPages,
    languageModel: Object.freeze({
      enabled: languageModel.enabled && overrides.useLanguageModel !== false,
      timeoutMs: overrides.languageModelTimeoutMs ?? languageModel.timeoutMs,
      maxConcurrency: Math.max(
        1,
        overrides.languageModelMaxConcurrency ?? languageModel.maxConcurrency,
      ),
    }),
  });
}

export function isPlausibleCfm(
  value: number,
  settings: ExtractionSettings,
): boolean {
  return (
    Number.isFinite(value) &&
    value >= settings.cfmRange.min &&
    value <= settings.cfmRange.max
  );
}

export function containsBoxId(
  text: string,
  settings: ExtractionSettings,
): boolean {
  return text.search(settings.boxIdPattern) >= 0;
}
