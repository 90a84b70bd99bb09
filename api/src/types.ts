export type Unit = "lb" | "kg";
export const UNITS = ["lb", "kg"] as const satisfies readonly Unit[];

export type Action = "add_weight" | "add_reps" | "stay" | "lower_weight" | "lower_reps";
export const ACTIONS = [
  "add_weight",
  "add_reps",
  "stay",
  "lower_weight",
  "lower_reps",
] as const satisfies readonly Action[];

// Where the observed RPE sits relative to the target band
export type EffortBand = "too_hard" | "too_easy" | "in_target";

// fixed: one increment / one reps step at a time
// rpe_scaled: bigger jumps the easier the set felt (still capped by max jump)
export type ProgressionStyle = "fixed" | "rpe_scaled";
export const PROGRESSION_STYLES = ["fixed", "rpe_scaled"] as const satisfies readonly ProgressionStyle[];

export interface ExerciseConfig {
  name: string;
  repRange: [number, number];            // [repMin, repMax], inclusive
  targetRpeRange: [number, number];      // [rpeMin, rpeMax], inclusive
  weightIncrementOverride?: number | null; // in settings.unit
  maxJumpOverride?: number | null;         // in settings.unit
  repsStep?: number;                     // default 1
}

export interface UserSettings {
  unit: Unit;
  // total-weight increments, not per side
  lbIncrement: number;
  kgIncrement: number;
  maxJumpLb: number;
  maxJumpKg: number;
  progressionStyle?: ProgressionStyle;
}

export interface ObservedSet {
  weight: number; // in settings.unit
  reps: number;
  rpe: number;    // 1-10
}

export interface NextSet {
  weight: number;
  reps: number;
}

export interface EffectiveParams {
  unit: Unit;
  repMin: number;
  repMax: number;
  rpeMin: number;
  rpeMax: number;
  midpoint: number;
  increment: number;
  maxJump: number;
  repsStep: number;
  style: ProgressionStyle;
}

export interface RecommendationDebug {
  inputs: ObservedSet & { weightKg: number };
  params: EffectiveParams;
  band: EffortBand;
  outputs: NextSet & { weightKg: number };
}

export interface Recommendation {
  action: Action;
  nextSet: NextSet;
  unit: Unit;
  explanation: string;
  debug?: RecommendationDebug;
}

export const DEFAULT_TARGET_RPE_RANGE: [number, number] = [7, 9];

export const DEFAULT_SETTINGS: UserSettings = {
  unit: "lb",
  lbIncrement: 2.5,
  kgIncrement: 1.25,
  maxJumpLb: 10,
  maxJumpKg: 5,
  progressionStyle: "fixed",
};
