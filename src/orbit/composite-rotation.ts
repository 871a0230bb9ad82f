import * as THREE from "three";
import { DEG_TO_RAD, SCENE_AXIS_OFFSET_DEG } from "../constants";
import type { OrbitOffsets, OrientationTransform } from "../types/orbit-types";

/**
 * Longitude and latitude rotations for a sub-point, in radians.
 * Longitude is shifted by -180° and latitude by +180° to line up with the
 * globe's scene axes; the asymmetry is intentional.
 */
export function orbitOffsets(latitudeDeg: number, longitudeDeg: number): OrbitOffsets {
  return {
    longitudeOffsetRadians: (longitudeDeg - SCENE_AXIS_OFFSET_DEG) * DEG_TO_RAD,
    latitudeOffsetRadians: (latitudeDeg + SCENE_AXIS_OFFSET_DEG) * DEG_TO_RAD,
  };
}

// Temporary rotations reused across calls to avoid per-frame allocations.
const _inclinationRot = new THREE.Matrix4();
const _longitudeRot = new THREE.Matrix4();
const _latitudeRot = new THREE.Matrix4();

/**
 * Build the ring orientation from
 *   R1 = rotation about Z by the corrected inclination
 *   R2 = rotation about Y by the longitude offset
 *   R3 = rotation about X by the latitude offset
 *
 * The ring is tilted by R1 first, then turned by R3, then by R2. Written
 * for row vectors that is R1 · (R3 · R2); three.js multiplies column
 * vectors, so the matrix here is R2 · R3 · R1. Rotations do not commute;
 * do not reorder.
 *
 * The ring mesh must lie in its local XZ plane with its axis along +Y
 * (rotate a THREE.TorusGeometry by π/2 about X).
 *
 * @param out  Matrix4 to write the result into. Its previous contents are
 *             discarded. A new matrix is allocated when omitted.
 */
export function composite(
  correctedInclinationRadians: number,
  longitudeOffsetRadians: number,
  latitudeOffsetRadians: number,
  out: OrientationTransform = new THREE.Matrix4(),
): OrientationTransform {
  _inclinationRot.makeRotationZ(correctedInclinationRadians);
  _longitudeRot.makeRotationY(longitudeOffsetRadians);
  _latitudeRot.makeRotationX(latitudeOffsetRadians);

  return out.multiplyMatrices(_longitudeRot, _latitudeRot).multiply(_inclinationRot);
}
