// presets.ts
// Starter exercise configs. Increment and max jump are stored as overrides in the
// unit of the settings they were built for.

import { DEFAULT_SETTINGS, DEFAULT_TARGET_RPE_RANGE, type ExerciseConfig, type UserSettings } from "./types.js";
import { exerciseIncrementHint } from "./utils/increments.js";

export function makeExercise(
  name: string,
  repRange: [number, number],
  targetRpeRange: [number, number] = DEFAULT_TARGET_RPE_RANGE,
  settings: UserSettings = DEFAULT_SETTINGS
): ExerciseConfig {
  const hint = exerciseIncrementHint(name, settings.unit);
  return {
    name,
    repRange: [repRange[0], repRange[1]],
    targetRpeRange: [targetRpeRange[0], targetRpeRange[1]],
    weightIncrementOverride: hint.increment,
    maxJumpOverride: hint.maxJump,
    repsStep: 1,
  };
}

const PRESET_REP_RANGES: Record<string, [number, number]> = {
  bench_press: [5, 8],
  overhead_press: [5, 8],
  barbell_row: [6, 10],
  squat: [5, 8],
  deadlift: [3, 6],
};

export function commonPresets(settings: UserSettings = DEFAULT_SETTINGS): Record<string, ExerciseConfig> {
  const presets: Record<string, ExerciseConfig> = {};
  for (const [name, repRange] of Object.entries(PRESET_REP_RANGES)) {
    presets[name] = makeExercise(name, repRange, DEFAULT_TARGET_RPE_RANGE, settings);
  }
  return presets;
}
