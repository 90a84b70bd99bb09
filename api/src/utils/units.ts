import type { Unit } from "../types.js";

export const LB_PER_KG = 2.2046226218;

export function toKg(weight: number, unit: Unit): number {
  return unit === "lb" ? weight / LB_PER_KG : weight;
}

export function fromKg(weightKg: number, unit: Unit): number {
  return unit === "lb" ? weightKg * LB_PER_KG : weightKg;
}

export function convertWeight(weight: number, from: Unit, to: Unit): number {
  if (from === to) return weight;
  return fromKg(toKg(weight, from), to);
}

export function roundToIncrement(x: number, inc: number): number {
  const step = Math.max(1e-9, inc);
  return Math.round(x / step) * step;
}

export function clampInt(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

// 185 + 2.5 stays 187.5, 60.1 - 2.5 does not turn into 57.599999999999994
export function roundPrecision(x: number, digits = 6): number {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

/**
 * Nearest 0.5 lb / 0.25 kg. Display only, the engine never rounds through this.
 */
export function normalizeDisplayWeight(weight: number, unit: Unit): number {
  if (unit === "lb") return Math.round(weight * 2) / 2;
  return Math.round(weight * 4) / 4;
}

export function formatWeight(weight: number, unit: Unit): string {
  return `${normalizeDisplayWeight(weight, unit)} ${unit}`;
}
