import { AppError, ConfigError, InputError } from "./middleware/errorHandler.js";
import { handlePresets, handleRecommend } from "./recommend.js";
import { DEFAULT_SETTINGS } from "./types.js";

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected an error");
}

const exercise = { name: "bench_press", rep_range: [5, 8], target_rpe_range: [7, 9] };

describe("handleRecommend", () => {
  it("returns the next set in the response shape", () => {
    const res = handleRecommend(
      {
        exercise,
        settings: { unit: "lb", lb_increment: 2.5, kg_increment: 1.25, max_jump_lb: 10, max_jump_kg: 5 },
        last_set: { weight: 185, reps: 8, rpe: 7.5 },
      },
      DEFAULT_SETTINGS
    );
    expect(res).toEqual({
      action: "add_weight",
      next_set: { weight: 187.5, reps: 5 },
      unit: "lb",
      explanation: "At rep cap with manageable RPE (7.5); add weight and reset reps to 5.",
    });
  });

  it("applies overrides from the payload", () => {
    const res = handleRecommend(
      {
        exercise: { ...exercise, weight_increment_override: 20, max_jump_override: 10 },
        last_set: { weight: 185, reps: 8, rpe: 6 },
      },
      DEFAULT_SETTINGS
    );
    expect(res.next_set).toEqual({ weight: 195, reps: 5 });
  });

  it("uses default settings when the payload has none", () => {
    const res = handleRecommend(
      { exercise, last_set: { weight: 100, reps: 6, rpe: 7.5 } },
      { ...DEFAULT_SETTINGS, unit: "kg" }
    );
    expect(res.unit).toBe("kg");
    expect(res.next_set).toEqual({ weight: 100, reps: 7 });
  });

  it("includes debug details on request", () => {
    const res = handleRecommend({ exercise, last_set: { weight: 185, reps: 5, rpe: 9.5 }, debug: true }, DEFAULT_SETTINGS);
    expect(res.action).toBe("lower_weight");
    expect(res.debug?.band).toBe("too_hard");
  });

  it("rejects a malformed body as a validation error", () => {
    const err = caught(() => handleRecommend({ exercise }, DEFAULT_SETTINGS));
    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({ statusCode: 400, code: "validation_error", message: "last_set: Required" });
  });

  it("surfaces config errors", () => {
    const err = caught(() =>
      handleRecommend(
        { exercise: { name: "bench_press", rep_range: [8, 5] }, last_set: { weight: 185, reps: 8, rpe: 8 } },
        DEFAULT_SETTINGS
      )
    );
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ statusCode: 422, code: "config_error" });
  });

  it("surfaces input errors", () => {
    const err = caught(() => handleRecommend({ exercise, last_set: { weight: 185, reps: 8, rpe: 11 } }, DEFAULT_SETTINGS));
    expect(err).toBeInstanceOf(InputError);
    expect(err).toMatchObject({ statusCode: 400, code: "input_error" });
  });
});

describe("handlePresets", () => {
  it("builds presets for the requested unit", () => {
    const res = handlePresets({ unit: "kg" }, DEFAULT_SETTINGS);
    expect(res.unit).toBe("kg");
    expect(res.presets.squat).toEqual({
      name: "squat",
      rep_range: [5, 8],
      target_rpe_range: [7, 9],
      weight_increment_override: 2.5,
      max_jump_override: 7.5,
      reps_step: 1,
    });
  });

  it("falls back to the default unit", () => {
    const res = handlePresets({}, DEFAULT_SETTINGS);
    expect(res.unit).toBe("lb");
    expect(res.presets.bench_press.weight_increment_override).toBe(2.5);
  });

  it("rejects an unknown unit", () => {
    const err = caught(() => handlePresets({ unit: "stone" }, DEFAULT_SETTINGS));
    expect(err).toMatchObject({ statusCode: 400, code: "validation_error" });
  });
});
