/**
 * Configuration Tests
 */

import { defineConfig, env, LOG_LEVEL_VARIABLE, resolveLogLevel } from "../config";

class Blog {}

describe("config", () => {
  const original = process.env[LOG_LEVEL_VARIABLE];

  afterEach(() => {
    if (original === undefined) {
      delete process.env[LOG_LEVEL_VARIABLE];
    } else {
      process.env[LOG_LEVEL_VARIABLE] = original;
    }
  });

  // ===========================================================================
  // defineConfig
  // ===========================================================================
  describe("defineConfig", () => {
    it("should return valid options unchanged", () => {
      const options = { entities: [Blog], conventions: "document" as const };

      expect(defineConfig(options)).toBe(options);
    });

    it("should require at least one entity", () => {
      expect(() => defineConfig({ entities: [] })).toThrow("ModelBuilderOptions.entities is required");
    });

    it("should require a positive integer depth", () => {
      expect(() => defineConfig({ entities: [Blog], maxConventionDepth: 0 })).toThrow(
        "ModelBuilderOptions.maxConventionDepth must be a positive integer; got 0."
      );
      expect(() => defineConfig({ entities: [Blog], maxConventionDepth: 2.5 })).toThrow(
        "got 2.5"
      );
    });
  });

  // ===========================================================================
  // env
  // ===========================================================================
  describe("env", () => {
    it("should read a set variable", () => {
      process.env[LOG_LEVEL_VARIABLE] = "debug";

      expect(env(LOG_LEVEL_VARIABLE)).toBe("debug");
    });

    it("should fall back to the default when unset", () => {
      delete process.env[LOG_LEVEL_VARIABLE];

      expect(env(LOG_LEVEL_VARIABLE, "warn")).toBe("warn");
    });

    it("should throw when unset without a default", () => {
      delete process.env[LOG_LEVEL_VARIABLE];

      expect(() => env(LOG_LEVEL_VARIABLE)).toThrow(
        `Missing required environment variable: ${LOG_LEVEL_VARIABLE}`
      );
    });
  });

  // ===========================================================================
  // resolveLogLevel
  // ===========================================================================
  describe("resolveLogLevel", () => {
    it("should be silent unless logging is on", () => {
      expect(resolveLogLevel({})).toBe("silent");
      expect(resolveLogLevel({ logging: false })).toBe("silent");
    });

    it("should use an explicit level as given", () => {
      expect(resolveLogLevel({ logging: "debug" })).toBe("debug");
    });

    it("should read the environment when logging is true", () => {
      delete process.env[LOG_LEVEL_VARIABLE];
      expect(resolveLogLevel({ logging: true })).toBe("warn");

      process.env[LOG_LEVEL_VARIABLE] = "info";
      expect(resolveLogLevel({ logging: true })).toBe("info");
    });

    it("should reject an unknown level in the environment", () => {
      process.env[LOG_LEVEL_VARIABLE] = "loud";

      expect(() => resolveLogLevel({ logging: true })).toThrow("got 'loud'");
    });
  });
});
