import { commonPresets, makeExercise } from "./presets.js";
import { DEFAULT_SETTINGS, type UserSettings } from "./types.js";

const kg: UserSettings = { ...DEFAULT_SETTINGS, unit: "kg" };

describe("presets", () => {
  it("stores lb increments and jumps as overrides", () => {
    const presets = commonPresets(DEFAULT_SETTINGS);

    expect(presets.bench_press.weightIncrementOverride).toBe(2.5);
    expect(presets.bench_press.maxJumpOverride).toBe(10);
    expect(presets.squat.weightIncrementOverride).toBe(5);
    expect(presets.squat.maxJumpOverride).toBe(15);
    expect(presets.deadlift.weightIncrementOverride).toBe(5);
    expect(presets.deadlift.maxJumpOverride).toBe(15);
  });

  it("uses kg equivalents for kg settings", () => {
    const squat = makeExercise("squat", [5, 8], [7, 9], kg);
    const bench = makeExercise("bench_press", [5, 8], [7, 9], kg);

    expect(squat.weightIncrementOverride).toBe(2.5);
    expect(squat.maxJumpOverride).toBe(7.5);
    expect(bench.weightIncrementOverride).toBe(1.25);
    expect(bench.maxJumpOverride).toBe(5);
  });

  it("lists the starter lifts with their rep ranges", () => {
    const presets = commonPresets();
    expect(Object.keys(presets)).toEqual(["bench_press", "overhead_press", "barbell_row", "squat", "deadlift"]);
    expect(presets.barbell_row.repRange).toEqual([6, 10]);
    expect(presets.deadlift.repRange).toEqual([3, 6]);
  });

  it("defaults the target RPE band and reps step", () => {
    const ex = makeExercise("curl", [10, 15]);
    expect(ex).toEqual({
      name: "curl",
      repRange: [10, 15],
      targetRpeRange: [7, 9],
      weightIncrementOverride: 2.5,
      maxJumpOverride: 10,
      repsStep: 1,
    });
  });
});
