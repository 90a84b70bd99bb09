import type { Unit } from "../types.js";

export type IncrementHint = { increment: number; maxJump: number };
type Rule = { id: string; re: RegExp; hint: Record<Unit, IncrementHint> };

const RX = (s: string, flags = "i") => new RegExp(s, flags);

// Heavy lower-body lifts take bigger plates and tolerate bigger jumps
export const INCREMENT_RULES: Rule[] = [
  {
    id: "lower_body_heavy",
    re: RX("(dead|squat)"),
    hint: { lb: { increment: 5, maxJump: 15 }, kg: { increment: 2.5, maxJump: 7.5 } },
  },
];

export const DEFAULT_INCREMENT: Record<Unit, IncrementHint> = {
  lb: { increment: 2.5, maxJump: 10 },
  kg: { increment: 1.25, maxJump: 5 },
};

export function exerciseIncrementHint(name: string, unit: Unit): IncrementHint {
  const s = String(name || "").toLowerCase();
  for (const r of INCREMENT_RULES) if (r.re.test(s)) return r.hint[unit];
  return DEFAULT_INCREMENT[unit];
}
