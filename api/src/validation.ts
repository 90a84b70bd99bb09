// Validation with zod. Schemas check shape and types only: range invariants
// (rep_min <= rep_max, RPE in 1..10, ...) are the engine's and surface as
// ConfigError / InputError.
import { z } from "zod";
import {
  PROGRESSION_STYLES,
  UNITS,
  type Action,
  type ExerciseConfig,
  type ObservedSet,
  type Recommendation,
  type RecommendationDebug,
  type Unit,
  type UserSettings,
} from "./types.js";

const finite = () => z.number().finite();

export const ExercisePayloadSchema = z.object({
  name: z.string().min(1),
  rep_range: z.tuple([finite(), finite()]),
  target_rpe_range: z.tuple([finite(), finite()]).optional(),
  weight_increment_override: finite().nullable().optional(),
  max_jump_override: finite().nullable().optional(),
  reps_step: finite().optional(),
});

export const SettingsPayloadSchema = z.object({
  unit: z.enum(UNITS).optional(),
  lb_increment: finite().optional(),
  kg_increment: finite().optional(),
  max_jump_lb: finite().optional(),
  max_jump_kg: finite().optional(),
  progression_style: z.enum(PROGRESSION_STYLES).optional(),
});

export const LastSetPayloadSchema = z.object({
  weight: finite(),
  reps: finite(),
  rpe: finite(),
});

export const RecommendRequestSchema = z.object({
  exercise: ExercisePayloadSchema,
  settings: SettingsPayloadSchema.optional(),
  last_set: LastSetPayloadSchema,
  debug: z.boolean().optional(),
});

export const PresetsQuerySchema = z.object({
  unit: z.enum(UNITS).optional(),
});

export type ExercisePayload = z.infer<typeof ExercisePayloadSchema>;
export type SettingsPayload = z.infer<typeof SettingsPayloadSchema>;
export type RecommendRequest = z.infer<typeof RecommendRequestSchema>;

export type RecommendResponse = {
  action: Action;
  next_set: { weight: number; reps: number };
  unit: Unit;
  explanation: string;
  debug?: RecommendationDebug;
};

export function validate<T>(
  schema: z.ZodSchema<T>,
  data: unknown
): { success: true; data: T } | { success: false; error: string } {
  try {
    const validated = schema.parse(data);
    return { success: true, data: validated };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        success: false,
        error: error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; "),
      };
    }
    return { success: false, error: "Validation failed" };
  }
}

// ============================================================================
// PAYLOAD <-> ENGINE
// ============================================================================

export function toExerciseConfig(payload: ExercisePayload, fallbackRpeRange: [number, number]): ExerciseConfig {
  const rpeRange = payload.target_rpe_range ?? fallbackRpeRange;
  return {
    name: payload.name,
    repRange: [payload.rep_range[0], payload.rep_range[1]],
    targetRpeRange: [rpeRange[0], rpeRange[1]],
    weightIncrementOverride: payload.weight_increment_override ?? null,
    maxJumpOverride: payload.max_jump_override ?? null,
    repsStep: payload.reps_step ?? 1,
  };
}

export function toUserSettings(payload: SettingsPayload | undefined, defaults: UserSettings): UserSettings {
  return {
    unit: payload?.unit ?? defaults.unit,
    lbIncrement: payload?.lb_increment ?? defaults.lbIncrement,
    kgIncrement: payload?.kg_increment ?? defaults.kgIncrement,
    maxJumpLb: payload?.max_jump_lb ?? defaults.maxJumpLb,
    maxJumpKg: payload?.max_jump_kg ?? defaults.maxJumpKg,
    progressionStyle: payload?.progression_style ?? defaults.progressionStyle,
  };
}

export function toEngineInputs(
  req: RecommendRequest,
  defaults: UserSettings,
  fallbackRpeRange: [number, number]
): { observed: ObservedSet; exercise: ExerciseConfig; settings: UserSettings; debug: boolean } {
  return {
    observed: { weight: req.last_set.weight, reps: req.last_set.reps, rpe: req.last_set.rpe },
    exercise: toExerciseConfig(req.exercise, fallbackRpeRange),
    settings: toUserSettings(req.settings, defaults),
    debug: req.debug ?? false,
  };
}

export function toExercisePayload(config: ExerciseConfig): ExercisePayload {
  return {
    name: config.name,
    rep_range: [config.repRange[0], config.repRange[1]],
    target_rpe_range: [config.targetRpeRange[0], config.targetRpeRange[1]],
    weight_increment_override: config.weightIncrementOverride ?? null,
    max_jump_override: config.maxJumpOverride ?? null,
    reps_step: config.repsStep ?? 1,
  };
}

export function toRecommendResponse(rec: Recommendation): RecommendResponse {
  const response: RecommendResponse = {
    action: rec.action,
    next_set: { weight: rec.nextSet.weight, reps: rec.nextSet.reps },
    unit: rec.unit,
    explanation: rec.explanation,
  };
  if (rec.debug) response.debug = rec.debug;
  return response;
}
