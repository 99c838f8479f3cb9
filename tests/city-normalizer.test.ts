import { describe, it, expect } from "vitest";
import { normalizeCityName, lookupCity, CITY_DIRECTORY } from "../src/cities/normalizer.js";

describe("normalizeCityName", () => {
  it("trims and title-cases", () => {
    expect(normalizeCityName("  new york ")).toBe("New York");
    expect(normalizeCityName("CHICAGO")).toBe("Chicago");
  });

  it("capitalizes each alphabetic run", () => {
    expect(normalizeCityName("WINSTON-salem")).toBe("Winston-Salem");
    expect(normalizeCityName("st. louis")).toBe("St. Louis");
  });

  it("maps empty or absent input to Unknown", () => {
    expect(normalizeCityName("")).toBe("Unknown");
    expect(normalizeCityName("   ")).toBe("Unknown");
    expect(normalizeCityName(null)).toBe("Unknown");
    expect(normalizeCityName(undefined)).toBe("Unknown");
  });
});

describe("lookupCity", () => {
  it("returns directory metadata", () => {
    expect(lookupCity("Chicago")).toEqual({ timezone: "America/Chicago", lat: 41.8781, lon: -87.6298 });
    expect(lookupCity("Seattle").timezone).toBe("America/Los_Angeles");
  });

  it("returns Unknown and null coordinates for other cities", () => {
    expect(lookupCity("Atlantis")).toEqual({ timezone: "Unknown", lat: null, lon: null });
    expect(lookupCity("toString")).toEqual({ timezone: "Unknown", lat: null, lon: null });
  });

  it("hands out copies", () => {
    const meta = lookupCity("Phoenix");
    meta.timezone = "changed";
    expect(CITY_DIRECTORY["Phoenix"].timezone).toBe("America/Phoenix");
  });
});
