import { Router } from "express";
import { config } from "./config.js";
import { AppError, asyncHandler } from "./middleware/errorHandler.js";
import { commonPresets } from "./presets.js";
import { recommend as recommendNextSet } from "./progressionEngine.js";
import { DEFAULT_TARGET_RPE_RANGE, type UserSettings } from "./types.js";
import {
  PresetsQuerySchema,
  RecommendRequestSchema,
  toEngineInputs,
  toExercisePayload,
  toRecommendResponse,
  validate,
  type ExercisePayload,
  type RecommendResponse,
} from "./validation.js";

export const recommend = Router();

export function handleRecommend(body: unknown, defaults: UserSettings = config.defaults): RecommendResponse {
  const v = validate(RecommendRequestSchema, body);
  if (!v.success) throw new AppError(v.error, 400, { code: "validation_error" });

  const { observed, exercise, settings, debug } = toEngineInputs(v.data, defaults, DEFAULT_TARGET_RPE_RANGE);
  const rec = recommendNextSet(observed, exercise, settings, { debug });

  if (config.debugEngine) {
    console.log(
      `[recommend] ${exercise.name}: ${observed.weight}x${observed.reps}@${observed.rpe} -> ${rec.action} ${rec.nextSet.weight}x${rec.nextSet.reps} ${rec.unit}`
    );
  }

  return toRecommendResponse(rec);
}

export function handlePresets(
  query: unknown,
  defaults: UserSettings = config.defaults
): { unit: UserSettings["unit"]; presets: Record<string, ExercisePayload> } {
  const v = validate(PresetsQuerySchema, query);
  if (!v.success) throw new AppError(v.error, 400, { code: "validation_error" });

  const settings: UserSettings = { ...defaults, unit: v.data.unit ?? defaults.unit };
  const presets: Record<string, ExercisePayload> = {};
  for (const [key, exercise] of Object.entries(commonPresets(settings))) {
    presets[key] = toExercisePayload(exercise);
  }
  return { unit: settings.unit, presets };
}

recommend.post(
  "/recommend",
  asyncHandler(async (req, res) => {
    res.json(handleRecommend(req.body));
  })
);

recommend.get(
  "/presets",
  asyncHandler(async (req, res) => {
    res.json(handlePresets(req.query));
  })
);
