import { DEG_TO_RAD } from "../constants";
import type { OrbitingBodyProfile } from "../types/orbit-types";

/**
 * First stage of the inclination correction. Grows with |latitude|.
 *
 * base = π / multiplier + |lat|·(π/180) / inclination
 *
 * An empirically tuned shaping term; keep the constants and the order of
 * operations as they are or the ring's visual behavior changes.
 */
export function exponentBase(profile: OrbitingBodyProfile, absLatDeg: number): number {
  return Math.PI / profile.correctionMultiplier + absLatDeg * DEG_TO_RAD / profile.inclinationRadians;
}

/**
 * Power for the latitude band containing absLatDeg.
 *
 * Scans thresholds in ascending order and takes the first band whose
 * threshold is >= absLatDeg, so a threshold belongs to the band below it.
 * Past the last threshold the final power applies.
 */
export function bandPower(profile: OrbitingBodyProfile, absLatDeg: number): number {
  const { latitudeThresholds: thresholds, correctionPowers: powers } = profile;
  for (let i = 0; i < thresholds.length; i++) {
    if (absLatDeg <= thresholds[i]) {
      return powers[i];
    }
  }
  return powers[powers.length - 1];
}

/** Second stage: exponentBase raised to the band power. */
export function correctionExponent(profile: OrbitingBodyProfile, latitudeDeg: number): number {
  const absLat = Math.abs(latitudeDeg);
  return Math.pow(exponentBase(profile, absLat), bandPower(profile, absLat));
}

/**
 * Nominal inclination raised to the correction exponent for this latitude.
 * Depends only on |latitudeDeg|. The heading factor is applied by the caller.
 */
export function correctedInclination(profile: OrbitingBodyProfile, latitudeDeg: number): number {
  return Math.pow(profile.inclinationRadians, correctionExponent(profile, latitudeDeg));
}
