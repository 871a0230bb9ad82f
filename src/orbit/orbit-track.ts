import type * as THREE from "three";
import { correctedInclination } from "./orientation-correction";
import { composite, orbitOffsets } from "./composite-rotation";
import type {
  GeodeticSample, HeadingFactor, OrbitingBodyProfile, OrientationTransform,
} from "../types/orbit-types";

/** +1 while latitude holds or increases between samples, -1 while it decreases. */
export function headingFactorFromLatitudes(previousLatDeg: number, currentLatDeg: number): HeadingFactor {
  return currentLatDeg >= previousLatDeg ? 1 : -1;
}

/**
 * Orientation of a body's orbit track for the current frame: a ring at the
 * body's corrected inclination, turned to pass over its sub-point.
 */
export function orbitTrackTransform(
  profile: OrbitingBodyProfile,
  sample: GeodeticSample,
  out?: OrientationTransform,
): OrientationTransform {
  const { longitudeOffsetRadians, latitudeOffsetRadians } = orbitOffsets(sample.latitudeDeg, sample.longitudeDeg);
  const inclination = correctedInclination(profile, sample.latitudeDeg) * sample.headingFactor;
  return composite(inclination, longitudeOffsetRadians, latitudeOffsetRadians, out);
}

/**
 * Replace the node's local transform with the given orientation. The node's
 * ring must lie in its local XZ plane with its axis along +Y; three.js's
 * TorusGeometry lies in XY, so rotate it by π/2 about X first. Auto-update
 * is switched off so three.js does not rebuild the matrix from
 * position/quaternion/scale on the next render.
 */
export function applyOrbitTrackTransform(node: THREE.Object3D, transform: OrientationTransform): void {
  node.matrixAutoUpdate = false;
  node.matrix.copy(transform);
  node.matrixWorldNeedsUpdate = true;
}
