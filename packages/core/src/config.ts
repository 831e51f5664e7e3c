/**
 * Engine configuration
 *
 * Page height and scoring weights are passed into the Model at construction;
 * nothing in the engine reads them from module-level state.
 */

import { createError } from "./errors.js";

/** Weights for the fuzzy scorer. All values are non-negative integers. */
export interface ScoringSettings {
  /** Flat credit per matched character */
  letterMatch: number;
  /** Extra credit when a match immediately follows the previous match */
  subsequentBonus: number;
  /** Extra credit when a match falls at a word start */
  wordStartBonus: number;
}

export interface EngineConfig {
  /** Number of completion rows visible at once */
  pageSize: number;
  scoring: ScoringSettings;
  /** How long the interaction loop waits for a key before the next fetch tick */
  fetchPollIntervalMs: number;
}

export interface EngineConfigOverrides {
  pageSize?: number;
  scoring?: Partial<ScoringSettings>;
  fetchPollIntervalMs?: number;
}

export const DEFAULT_SCORING: ScoringSettings = {
  letterMatch: 1,
  wordStartBonus: 2,
  subsequentBonus: 3,
};

export const DEFAULT_CONFIG: EngineConfig = {
  pageSize: 10,
  scoring: DEFAULT_SCORING,
  fetchPollIntervalMs: 10,
};

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws CompletersError with code INVALID_CONFIG
 */
export function resolveConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const config: EngineConfig = {
    pageSize: overrides.pageSize ?? DEFAULT_CONFIG.pageSize,
    scoring: { ...DEFAULT_SCORING, ...overrides.scoring },
    fetchPollIntervalMs: overrides.fetchPollIntervalMs ?? DEFAULT_CONFIG.fetchPollIntervalMs,
  };

  requireInteger("pageSize", config.pageSize, 1);
  requireInteger("fetchPollIntervalMs", config.fetchPollIntervalMs, 1);
  requireInteger("scoring.letterMatch", config.scoring.letterMatch, 0);
  requireInteger("scoring.subsequentBonus", config.scoring.subsequentBonus, 0);
  requireInteger("scoring.wordStartBonus", config.scoring.wordStartBonus, 0);

  return config;
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw createError("INVALID_CONFIG", `${name} must be an integer >= ${min}, got ${value}`);
  }
}
