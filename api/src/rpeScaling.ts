// rpeScaling.ts
// ============================================================================
// RPE SCALING: how far to move when the "rpe_scaled" progression style is on
//
// RPE 1-3   -> +10 .. +5 lb
// RPE 4-7   -> +5 .. +2.5 lb
// RPE 7-9   -> +2.5 .. +0.5 lb
// RPE 9-10  -> +0.5 .. 0 lb
// ============================================================================

import type { Unit } from "./types.js";
import { toKg } from "./utils/units.js";

function clampRpe(rpe: number): number {
  return Math.max(1, Math.min(10, rpe));
}

/**
 * Continuous load jump in pounds for a set of the given RPE.
 * The caller snaps it to the plate increment and caps it by max jump.
 */
export function jumpFromRpeLb(rpe: number): number {
  const r = clampRpe(rpe);

  if (r <= 3) return 12.5 - 2.5 * r;            // 1 -> 10, 3 -> 5
  if (r <= 7) return 5 + (r - 4) * (-2.5 / 3);  // 4 -> 5, 7 -> 2.5
  if (r <= 9) return 2.5 - (r - 7);             // 7 -> 2.5, 9 -> 0.5
  return Math.max(0, 0.5 * (10 - r));           // 9 -> 0.5, 10 -> 0
}

export function jumpFromRpe(rpe: number, unit: Unit): number {
  const jumpLb = jumpFromRpeLb(rpe);
  return unit === "kg" ? toKg(jumpLb, "lb") : jumpLb;
}

// Reps the lifter likely had left in the tank, as a reps step.
export function repDeltaFromRpe(rpe: number): number {
  const r = clampRpe(rpe);
  if (r <= 4) return 3;
  if (r <= 7) return 2;
  if (r <= 8.5) return 1;
  if (r <= 9.5) return 0;
  return -1;
}
