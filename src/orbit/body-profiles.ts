import {
  DEG_TO_RAD, EARTH_RADIUS_KM, GLOBE_RADIUS, MAX_LATITUDE_DEG,
  ISS_TRACK_COLOR, TSS_TRACK_COLOR, HST_TRACK_COLOR,
} from "../constants";
import type { BodyId, OrbitingBodyProfile } from "../types/orbit-types";

export interface BodyProfileInput {
  id: BodyId;
  displayName: string;
  inclinationDeg: number;
  correctionMultiplier: number;
  latitudeThresholds: number[];
  correctionPowers: number[];
  nominalAltitudeKm: number;
  ringColor: number;
}

/** Ring radius in scene units for an orbit at the given altitude above a globe of radius GLOBE_RADIUS. */
export function ringRadiusForAltitude(altitudeKm: number): number {
  return GLOBE_RADIUS * (EARTH_RADIUS_KM + altitudeKm) / EARTH_RADIUS_KM;
}

/**
 * Validates the input and returns a frozen profile.
 *
 * Throws if the multiplier or inclination is zero or not finite, if the
 * thresholds are empty, out of [0, 90] or not strictly ascending, or if
 * there is not exactly one more power than there are thresholds.
 */
export function createBodyProfile(input: BodyProfileInput): OrbitingBodyProfile {
  const { id, latitudeThresholds: thresholds, correctionPowers: powers } = input;
  const fail = (reason: string): never => {
    throw new Error(`Invalid orbiting body profile "${id}": ${reason}`);
  };

  if (!Number.isFinite(input.correctionMultiplier) || input.correctionMultiplier === 0) {
    fail(`correction multiplier must be finite and non-zero, got ${input.correctionMultiplier}`);
  }
  const inclinationRadians = input.inclinationDeg * DEG_TO_RAD;
  if (!Number.isFinite(inclinationRadians) || inclinationRadians === 0) {
    fail(`inclination must be finite and non-zero, got ${input.inclinationDeg}°`);
  }
  if (thresholds.length === 0) {
    fail("at least one latitude threshold is required");
  }
  for (let i = 0; i < thresholds.length; i++) {
    const t = thresholds[i];
    if (!Number.isFinite(t) || t < 0 || t > MAX_LATITUDE_DEG) {
      fail(`latitude threshold ${t} is outside [0, ${MAX_LATITUDE_DEG}]`);
    }
    if (i > 0 && t <= thresholds[i - 1]) {
      fail(`latitude thresholds must be strictly ascending (${thresholds[i - 1]} then ${t})`);
    }
  }
  if (powers.length !== thresholds.length + 1) {
    fail(`expected ${thresholds.length + 1} correction powers, got ${powers.length}`);
  }
  for (const p of powers) {
    if (!Number.isFinite(p)) fail(`correction power ${p} is not finite`);
  }
  if (!Number.isFinite(input.nominalAltitudeKm) || input.nominalAltitudeKm < 0) {
    fail(`nominal altitude must be a non-negative number of km, got ${input.nominalAltitudeKm}`);
  }

  return Object.freeze({
    id,
    displayName: input.displayName,
    inclinationRadians,
    correctionMultiplier: input.correctionMultiplier,
    latitudeThresholds: Object.freeze([...thresholds]),
    correctionPowers: Object.freeze([...powers]),
    nominalAltitudeKm: input.nominalAltitudeKm,
    ringRadiusScene: ringRadiusForAltitude(input.nominalAltitudeKm),
    ringColor: input.ringColor,
  });
}

export const BODY_IDS: readonly BodyId[] = ["iss", "tss", "hst"];

// Thresholds and powers are tuned by eye against the rendered globe so the
// ring keeps its apparent inclination as the sub-point moves toward the
// body's maximum latitude.
export const BODY_PROFILES: Readonly<Record<BodyId, OrbitingBodyProfile>> = Object.freeze({
  iss: createBodyProfile({
    id: "iss",
    displayName: "International Space Station",
    inclinationDeg: 51.6,
    correctionMultiplier: 3,
    latitudeThresholds: [12, 17, 25, 33, 40, 45, 49, 51],
    correctionPowers: [0.80, 0.85, 1.00, 1.25, 1.60, 2.00, 2.50, 3.20, 4.00],
    nominalAltitudeKm: 420,
    ringColor: ISS_TRACK_COLOR,
  }),
  tss: createBodyProfile({
    id: "tss",
    displayName: "Tiangong Space Station",
    inclinationDeg: 41.5,
    correctionMultiplier: 2.8,
    latitudeThresholds: [15, 20, 25, 30, 35, 38, 40, 41, 41.5],
    correctionPowers: [0.75, 0.85, 1.00, 1.20, 1.45, 1.70, 2.00, 2.30, 2.50, 2.80],
    nominalAltitudeKm: 390,
    ringColor: TSS_TRACK_COLOR,
  }),
  hst: createBodyProfile({
    id: "hst",
    displayName: "Hubble Space Telescope",
    inclinationDeg: 28.5,
    correctionMultiplier: 3.4,
    latitudeThresholds: [10, 15, 18, 20, 22, 24, 26, 27],
    correctionPowers: [0.35, 0.50, 0.65, 0.80, 1.00, 1.30, 1.75, 2.10, 3.00],
    nominalAltitudeKm: 535,
    ringColor: HST_TRACK_COLOR,
  }),
});

export function isBodyId(value: string): value is BodyId {
  return BODY_IDS.some((id) => id === value);
}

/** Looks up a body's profile. Unknown identities are rejected here, before any per-frame math. */
export function getBodyProfile(id: string): OrbitingBodyProfile {
  if (!isBodyId(id)) {
    throw new Error(`Unknown orbiting body: ${id}`);
  }
  return BODY_PROFILES[id];
}
