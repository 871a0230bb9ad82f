import { EARTH_RADIUS_KM } from "../constants";
import { BODY_PROFILES } from "./body-profiles";
import { bodyVisibilityDiameterKm, visibilityDiameterKm } from "./visibility";

describe("visibilityDiameterKm", () => {
  it("is zero for a satellite on the surface at 0° elevation", () => {
    expect(visibilityDiameterKm(0, 0)).toBe(0);
  });

  it("returns 0 when cos(α) exceeds 1", () => {
    // cos(10°) · 6779 / 6371 ≈ 1.048
    expect(visibilityDiameterKm(408, 10)).toBe(0);
    // cos(0°) · r / R = r / R > 1 for any positive altitude
    expect(visibilityDiameterKm(400, 0)).toBe(0);
  });

  it("returns 0 for NaN inputs", () => {
    expect(visibilityDiameterKm(NaN, 10)).toBe(0);
    expect(visibilityDiameterKm(400, NaN)).toBe(0);
  });

  it("matches a hand-computed value at 60° from the surface", () => {
    // cos(α) = cos(60°) = 0.5 → α = π/3 → 2 · R · π/3 ≈ 13343.3 km
    expect(visibilityDiameterKm(0, 60)).toBeCloseTo(2 * EARTH_RADIUS_KM * Math.PI / 3, 6);
  });

  it("approaches half a great circle at 90° elevation", () => {
    // cos(90°) ≈ 0, so α ≈ π/2 and the diameter ≈ π · R
    expect(visibilityDiameterKm(400, 90)).toBeCloseTo(Math.PI * EARTH_RADIUS_KM, 6);
  });

  it("is positive just inside the feasible region", () => {
    // cos(20°) · 6779 / 6371 ≈ 0.99987
    const expected = 2 * EARTH_RADIUS_KM * Math.acos(Math.cos(20 * Math.PI / 180) * 6779 / 6371);
    const d = visibilityDiameterKm(408, 20);
    expect(d).toBeGreaterThan(0);
    expect(d).toBeCloseTo(expected, 6);
  });
});

describe("bodyVisibilityDiameterKm", () => {
  it("uses the body's nominal altitude", () => {
    const hst = BODY_PROFILES.hst;
    expect(bodyVisibilityDiameterKm(hst, 45)).toBe(visibilityDiameterKm(hst.nominalAltitudeKm, 45));
  });
});
