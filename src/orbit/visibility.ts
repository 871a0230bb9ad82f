import { DEG_TO_RAD, EARTH_RADIUS_KM } from "../constants";
import type { OrbitingBodyProfile } from "../types/orbit-types";

/**
 * Diameter in km of the ground circle from which a satellite at altitudeKm
 * is seen at least minElevationDeg above the horizon.
 *
 * cosα = cos(ε) · (R + h) / R,  diameter = 2 · R · α
 *
 * Returns 0 unless cosα <= 1 (no ground point sees the satellite that
 * high, or the inputs are NaN).
 */
export function visibilityDiameterKm(altitudeKm: number, minElevationDeg: number): number {
  const satRadiusKm = EARTH_RADIUS_KM + altitudeKm;
  const elevation = minElevationDeg * DEG_TO_RAD;

  const cosAlpha = Math.cos(elevation) * satRadiusKm / EARTH_RADIUS_KM;
  if (!(cosAlpha <= 1)) return 0;

  const alpha = Math.acos(cosAlpha);
  const arcDistanceKm = EARTH_RADIUS_KM * alpha;
  return 2 * arcDistanceKm;
}

/** Visibility diameter at the body's nominal altitude. */
export function bodyVisibilityDiameterKm(profile: OrbitingBodyProfile, minElevationDeg: number): number {
  return visibilityDiameterKm(profile.nominalAltitudeKm, minElevationDeg);
}
