// progressionEngine.ts
// ============================================================================
// PROGRESSION ENGINE: next set from the last one (RPE autoregulation)
//
// One call = one transition. Classify the set against the target RPE band,
// then decide at the rep-range boundary:
//   too hard   -> lower reps, or lower weight once reps are at the floor
//   too easy   -> add reps, or add weight once reps are at the ceiling
//   in target  -> add reps toward the ceiling; at the ceiling add weight if the
//                 set was manageable (rpe <= band midpoint), else repeat it
// Reps move before load. Every weight change is capped by max jump.
// ============================================================================

import { ConfigError, InputError } from "./middleware/errorHandler.js";
import { jumpFromRpe, repDeltaFromRpe } from "./rpeScaling.js";
import type {
  Action,
  EffectiveParams,
  EffortBand,
  ExerciseConfig,
  ObservedSet,
  Recommendation,
  UserSettings,
} from "./types.js";
import { roundPrecision, roundToIncrement, toKg } from "./utils/units.js";

// ============================================================================
// VALIDATION
// ============================================================================

function isRpe(x: number): boolean {
  return Number.isFinite(x) && x >= 1 && x <= 10;
}

export function validateExerciseConfig(config: ExerciseConfig): void {
  const [repMin, repMax] = config.repRange;
  const [rpeMin, rpeMax] = config.targetRpeRange;
  const repsStep = config.repsStep ?? 1;

  if (!Number.isInteger(repMin) || !Number.isInteger(repMax)) {
    throw new ConfigError(`rep_range must be integers, got [${repMin}, ${repMax}]`, { field: "rep_range" });
  }
  if (repMin > repMax) {
    throw new ConfigError(`Invalid rep_range [${repMin}, ${repMax}]: min > max`, { field: "rep_range" });
  }
  if (!isRpe(rpeMin) || !isRpe(rpeMax)) {
    throw new ConfigError(`target_rpe_range must lie within [1, 10], got [${rpeMin}, ${rpeMax}]`, {
      field: "target_rpe_range",
    });
  }
  if (rpeMin > rpeMax) {
    throw new ConfigError(`Invalid target_rpe_range [${rpeMin}, ${rpeMax}]: min > max`, {
      field: "target_rpe_range",
    });
  }
  if (!Number.isInteger(repsStep) || repsStep <= 0) {
    throw new ConfigError(`reps_step must be a positive integer, got ${repsStep}`, { field: "reps_step" });
  }
}

export function validateObservedSet(observed: ObservedSet): void {
  if (!Number.isInteger(observed.reps) || observed.reps < 0) {
    throw new InputError(`reps must be a non-negative integer, got ${observed.reps}`, { field: "reps" });
  }
  if (!isRpe(observed.rpe)) {
    throw new InputError(`RPE must be between 1 and 10, got ${observed.rpe}`, { field: "rpe" });
  }
  if (!Number.isFinite(observed.weight) || observed.weight <= 0) {
    throw new InputError(`weight must be > 0, got ${observed.weight}`, { field: "weight" });
  }
}

// ============================================================================
// EFFECTIVE PARAMETERS: exercise overrides fall back to unit settings
// ============================================================================

export function resolveEffectiveParams(config: ExerciseConfig, settings: UserSettings): EffectiveParams {
  validateExerciseConfig(config);

  const [repMin, repMax] = config.repRange;
  const [rpeMin, rpeMax] = config.targetRpeRange;
  const unit = settings.unit;

  const increment =
    config.weightIncrementOverride ?? (unit === "lb" ? settings.lbIncrement : settings.kgIncrement);
  const maxJump = config.maxJumpOverride ?? (unit === "lb" ? settings.maxJumpLb : settings.maxJumpKg);

  if (!Number.isFinite(increment) || increment <= 0) {
    throw new ConfigError(`Weight increment must be > 0 ${unit}, got ${increment}`, { field: "increment" });
  }
  if (!Number.isFinite(maxJump) || maxJump <= 0) {
    throw new ConfigError(`Max jump must be > 0 ${unit}, got ${maxJump}`, { field: "max_jump" });
  }

  return {
    unit,
    repMin,
    repMax,
    rpeMin,
    rpeMax,
    midpoint: (rpeMin + rpeMax) / 2,
    increment,
    maxJump,
    repsStep: config.repsStep ?? 1,
    style: settings.progressionStyle ?? "fixed",
  };
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export function classifyEffort(rpe: number, params: Pick<EffectiveParams, "rpeMin" | "rpeMax">): EffortBand {
  if (rpe > params.rpeMax) return "too_hard";
  if (rpe < params.rpeMin) return "too_easy";
  return "in_target";
}

// ============================================================================
// STEP SIZES
// ============================================================================

function weightIncrease(rpe: number, p: EffectiveParams): number {
  if (p.style === "rpe_scaled") {
    const scaled = roundToIncrement(jumpFromRpe(rpe, p.unit), p.increment);
    return Math.min(p.maxJump, Math.max(p.increment, scaled));
  }
  return Math.min(p.increment, p.maxJump);
}

function weightDecrease(p: EffectiveParams): number {
  return Math.min(p.increment, p.maxJump);
}

function repsIncrease(rpe: number, p: EffectiveParams): number {
  if (p.style === "rpe_scaled") return Math.max(p.repsStep, repDeltaFromRpe(rpe));
  return p.repsStep;
}

// ============================================================================
// DECISION TABLE
// ============================================================================

type Decision = {
  action: Action;
  weight: number;
  reps: number;
  reason: string;
};

type BandRule = (set: ObservedSet, p: EffectiveParams) => Decision;

const fmt = (n: number) => n.toFixed(1);

const addReps = (set: ObservedSet, p: EffectiveParams, reason: string): Decision => ({
  action: "add_reps",
  weight: set.weight,
  reps: Math.min(p.repMax, set.reps + repsIncrease(set.rpe, p)),
  reason,
});

const addWeight = (set: ObservedSet, p: EffectiveParams, reason: string): Decision => ({
  action: "add_weight",
  weight: set.weight + weightIncrease(set.rpe, p),
  reps: p.repMin,
  reason,
});

const BAND_RULES: Record<EffortBand, BandRule> = {
  too_hard: (set, p) => {
    if (set.reps <= p.repMin) {
      return {
        action: "lower_weight",
        weight: Math.max(0, set.weight - weightDecrease(p)),
        reps: p.repMin,
        reason: `RPE ${fmt(set.rpe)} > ${fmt(p.rpeMax)} at low reps; reduce weight.`,
      };
    }
    return {
      action: "lower_reps",
      weight: set.weight,
      reps: Math.max(p.repMin, set.reps - p.repsStep),
      reason: `RPE ${fmt(set.rpe)} > ${fmt(p.rpeMax)}; reduce reps slightly.`,
    };
  },

  too_easy: (set, p) => {
    if (set.reps >= p.repMax) {
      return addWeight(
        set,
        p,
        `RPE ${fmt(set.rpe)} < ${fmt(p.rpeMin)} and reps capped; add weight and reset reps to ${p.repMin}.`
      );
    }
    return addReps(set, p, `RPE ${fmt(set.rpe)} < ${fmt(p.rpeMin)}; add reps.`);
  },

  in_target: (set, p) => {
    if (set.reps < p.repMax) {
      return addReps(set, p, `RPE ${fmt(set.rpe)} in target; add reps toward ${p.repMax}.`);
    }
    if (set.rpe <= p.midpoint) {
      return addWeight(
        set,
        p,
        `At rep cap with manageable RPE (${fmt(set.rpe)}); add weight and reset reps to ${p.repMin}.`
      );
    }
    return {
      action: "stay",
      weight: set.weight,
      reps: set.reps,
      reason: `At rep cap but RPE (${fmt(set.rpe)}) is on the hard side; repeat to solidify.`,
    };
  },
};

// ============================================================================
// ENTRYPOINT
// ============================================================================

export function recommend(
  observed: ObservedSet,
  config: ExerciseConfig,
  settings: UserSettings,
  options: { debug?: boolean } = {}
): Recommendation {
  const params = resolveEffectiveParams(config, settings);
  validateObservedSet(observed);

  const band = classifyEffort(observed.rpe, params);
  const decision = BAND_RULES[band](observed, params);
  const nextSet = { weight: roundPrecision(decision.weight), reps: decision.reps };

  const recommendation: Recommendation = {
    action: decision.action,
    nextSet,
    unit: params.unit,
    explanation: decision.reason,
  };

  if (options.debug) {
    recommendation.debug = {
      inputs: { ...observed, weightKg: toKg(observed.weight, params.unit) },
      params,
      band,
      outputs: { ...nextSet, weightKg: toKg(nextSet.weight, params.unit) },
    };
  }

  return recommendation;
}
