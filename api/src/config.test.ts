import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const cfg = loadConfig({});
    expect(cfg.port).toBe(8080);
    expect(cfg.nodeEnv).toBe("development");
    expect(cfg.corsOrigin).toBe(true);
    expect(cfg.debugEngine).toBe(false);
    expect(cfg.defaults).toEqual({
      unit: "lb",
      lbIncrement: 2.5,
      kgIncrement: 1.25,
      maxJumpLb: 10,
      maxJumpKg: 5,
      progressionStyle: "fixed",
    });
  });

  it("reads overrides from the environment", () => {
    const cfg = loadConfig({
      PORT: "3000",
      NODE_ENV: "production",
      CORS_ORIGIN: "http://a.test, http://b.test",
      DEFAULT_UNIT: "kg",
      KG_INCREMENT: "2.5",
      PROGRESSION_STYLE: "rpe_scaled",
      DEBUG_ENGINE: "true",
    });
    expect(cfg.port).toBe(3000);
    expect(cfg.nodeEnv).toBe("production");
    expect(cfg.corsOrigin).toEqual(["http://a.test", "http://b.test"]);
    expect(cfg.defaults.unit).toBe("kg");
    expect(cfg.defaults.kgIncrement).toBe(2.5);
    expect(cfg.defaults.progressionStyle).toBe("rpe_scaled");
    expect(cfg.debugEngine).toBe(true);
  });

  it("rejects a non-positive increment", () => {
    expect(() => loadConfig({ LB_INCREMENT: "abc" })).toThrow(
      "Invalid environment configuration: LB_INCREMENT: must be a positive number"
    );
    expect(() => loadConfig({ MAX_JUMP_KG: "0" })).toThrow("MAX_JUMP_KG: must be a positive number");
  });

  it("rejects an unknown unit", () => {
    expect(() => loadConfig({ DEFAULT_UNIT: "stone" })).toThrow("DEFAULT_UNIT");
  });
});
