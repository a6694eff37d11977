/**
 * Configuration Source Tests
 */

import { ConfigurationSource, max, overrides, overridesStrictly } from "../configuration-source";

describe("ConfigurationSource", () => {
  it("should order Convention below DataAnnotation below Explicit", () => {
    expect(ConfigurationSource.Convention).toBeLessThan(ConfigurationSource.DataAnnotation);
    expect(ConfigurationSource.DataAnnotation).toBeLessThan(ConfigurationSource.Explicit);
  });

  describe("overrides", () => {
    it("should let equal or higher sources win", () => {
      expect(overrides(ConfigurationSource.DataAnnotation, ConfigurationSource.DataAnnotation)).toBe(true);
      expect(overrides(ConfigurationSource.Explicit, ConfigurationSource.Convention)).toBe(true);
      expect(overrides(ConfigurationSource.Convention, ConfigurationSource.DataAnnotation)).toBe(false);
    });

    it("should treat an unset fact as always overridable", () => {
      expect(overrides(ConfigurationSource.Convention, undefined)).toBe(true);
      expect(overrides(undefined, undefined)).toBe(true);
      expect(overrides(undefined, ConfigurationSource.Convention)).toBe(false);
    });
  });

  describe("overridesStrictly", () => {
    it("should require a strictly higher source", () => {
      expect(overridesStrictly(ConfigurationSource.Explicit, ConfigurationSource.DataAnnotation)).toBe(true);
      expect(overridesStrictly(ConfigurationSource.Explicit, ConfigurationSource.Explicit)).toBe(false);
      expect(overridesStrictly(ConfigurationSource.Convention, undefined)).toBe(true);
      expect(overridesStrictly(undefined, undefined)).toBe(false);
    });
  });

  describe("max", () => {
    it("should pick the higher source and skip unset ones", () => {
      expect(max(ConfigurationSource.Convention, ConfigurationSource.Explicit)).toBe(ConfigurationSource.Explicit);
      expect(max(undefined, ConfigurationSource.DataAnnotation)).toBe(ConfigurationSource.DataAnnotation);
      expect(max(ConfigurationSource.Convention, undefined)).toBe(ConfigurationSource.Convention);
      expect(max(undefined, undefined)).toBeUndefined();
    });
  });
});
