// simulateProgression.ts
// ============================================================================
// SIMULATION: a deterministic lifter following the recommendations
//
// Each recommendation becomes the next set; the lifter's RPE is derived from
// an estimated 1RM (Epley) that grows a little after productive sessions.
// ============================================================================

import { makeExercise } from "../src/presets.js";
import { recommend } from "../src/progressionEngine.js";
import { DEFAULT_SETTINGS, type ObservedSet, type UserSettings } from "../src/types.js";
import { formatWeight } from "../src/utils/units.js";

type SimConfig = {
  weeks: number;
  sessionsPerWeek: number;
  setsPerSession: number;
  exerciseName: string;
  repRange: [number, number];
  startWeight: number;
  startReps: number;
  startE1rm: number;
  fatiguePerSet: number;   // RPE added per set already done in the session
  gainPerSession: number;  // fraction of e1RM gained after a productive session
};

const SIM: SimConfig = {
  weeks: 8,
  sessionsPerWeek: 2,
  setsPerSession: 3,
  exerciseName: "bench_press",
  repRange: [5, 8],
  startWeight: 185,
  startReps: 5,
  startE1rm: 235,
  fatiguePerSet: 0.25,
  gainPerSession: 0.006,
};

function rpeFor(weight: number, reps: number, e1rm: number, setIndex: number, sim: SimConfig): number {
  const maxReps = Math.max(0, 30 * (e1rm / weight - 1));
  const rir = maxReps - reps;
  const raw = 10 - rir + setIndex * sim.fatiguePerSet;
  return Math.round(Math.max(1, Math.min(10, raw)) * 2) / 2;
}

function simulate(sim: SimConfig, settings: UserSettings) {
  const exercise = makeExercise(sim.exerciseName, sim.repRange, [7, 9], settings);
  let e1rm = sim.startE1rm;
  let next = { weight: sim.startWeight, reps: sim.startReps };

  console.log(`\n🏋️  ${sim.exerciseName} ${sim.repRange[0]}-${sim.repRange[1]} reps, target RPE 7-9`);
  console.log("=".repeat(60));

  for (let week = 1; week <= sim.weeks; week++) {
    for (let session = 1; session <= sim.sessionsPerWeek; session++) {
      let productive = 0;
      for (let setIndex = 0; setIndex < sim.setsPerSession; setIndex++) {
        const observed: ObservedSet = {
          weight: next.weight,
          reps: next.reps,
          rpe: rpeFor(next.weight, next.reps, e1rm, setIndex, sim),
        };
        const rec = recommend(observed, exercise, settings);
        if (observed.rpe >= 7 && observed.rpe <= 9) productive++;

        console.log(
          `W${week} S${session} set ${setIndex + 1}: ${formatWeight(observed.weight, settings.unit)} x ${observed.reps} @ ${observed.rpe}` +
            ` -> ${rec.action} (${formatWeight(rec.nextSet.weight, rec.unit)} x ${rec.nextSet.reps})`
        );
        next = rec.nextSet;
      }
      if (productive >= Math.ceil(sim.setsPerSession / 2)) e1rm *= 1 + sim.gainPerSession;
    }
  }

  console.log("=".repeat(60));
  console.log(`Final prescription: ${formatWeight(next.weight, settings.unit)} x ${next.reps}`);
  console.log(`Simulated e1RM: ${formatWeight(e1rm, settings.unit)}`);
}

simulate(SIM, DEFAULT_SETTINGS);
simulate({ ...SIM, exerciseName: "squat", startWeight: 225, startE1rm: 285 }, { ...DEFAULT_SETTINGS, progressionStyle: "rpe_scaled" });
