// api/src/config.ts
import dotenv from "dotenv";
import { z } from "zod";
import type { NodeEnv } from "./middleware/errorHandler.js";
import { PROGRESSION_STYLES, UNITS, type UserSettings } from "./types.js";

dotenv.config();

const positive = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(Number)
    .refine((n) => Number.isFinite(n) && n > 0, { message: "must be a positive number" });

const EnvSchema = z.object({
  PORT: z.string().default("8080").transform((s) => parseInt(s, 10)),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  CORS_ORIGIN: z.string().optional(),
  DEFAULT_UNIT: z.enum(UNITS).default("lb"),
  LB_INCREMENT: positive("2.5"),
  KG_INCREMENT: positive("1.25"),
  MAX_JUMP_LB: positive("10"),
  MAX_JUMP_KG: positive("5"),
  PROGRESSION_STYLE: z.enum(PROGRESSION_STYLES).default("fixed"),
  DEBUG_ENGINE: z.string().optional(),
});

export interface Config {
  port: number;
  nodeEnv: NodeEnv;
  // true reflects the request origin
  corsOrigin: string[] | true;
  defaults: UserSettings;
  debugEngine: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    corsOrigin: e.CORS_ORIGIN ? e.CORS_ORIGIN.split(",").map((s) => s.trim()) : true,
    defaults: {
      unit: e.DEFAULT_UNIT,
      lbIncrement: e.LB_INCREMENT,
      kgIncrement: e.KG_INCREMENT,
      maxJumpLb: e.MAX_JUMP_LB,
      maxJumpKg: e.MAX_JUMP_KG,
      progressionStyle: e.PROGRESSION_STYLE,
    },
    debugEngine: e.DEBUG_ENGINE === "true",
  };
}

export const config = loadConfig();
