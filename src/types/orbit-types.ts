import type * as THREE from "three";

/** Closed set of orbiting bodies that have an orbit track. */
export type BodyId = "iss" | "tss" | "hst";

/** +1 when the ground track is heading toward increasing latitude, -1 toward decreasing. */
export type HeadingFactor = 1 | -1;

export interface OrbitingBodyProfile {
  readonly id: BodyId;
  readonly displayName: string;
  /** Nominal orbital inclination. */
  readonly inclinationRadians: number;
  /** Divisor of π in the correction exponent base. Never zero. */
  readonly correctionMultiplier: number;
  /** Strictly ascending band breakpoints in degrees of |latitude|, within [0, 90]. */
  readonly latitudeThresholds: readonly number[];
  /** One power per band: latitudeThresholds.length + 1 entries. */
  readonly correctionPowers: readonly number[];
  readonly nominalAltitudeKm: number;
  /** Ring radius in scene units, for the mesh builder. */
  readonly ringRadiusScene: number;
  /** 0xRRGGBB ring color, for the mesh builder. */
  readonly ringColor: number;
}

/** Per-frame sub-point of an orbiting body. */
export interface GeodeticSample {
  latitudeDeg: number;
  longitudeDeg: number;
  headingFactor: HeadingFactor;
}

export interface OrbitOffsets {
  longitudeOffsetRadians: number;
  latitudeOffsetRadians: number;
}

/**
 * Pure rotation, no translation. Orients a ring that lies in its local XZ
 * plane with its axis along +Y.
 */
export type OrientationTransform = THREE.Matrix4;
