export type {
  BodyId, HeadingFactor, OrbitingBodyProfile, GeodeticSample, OrbitOffsets, OrientationTransform,
} from "./types/orbit-types";
export {
  BODY_IDS, BODY_PROFILES, createBodyProfile, getBodyProfile, isBodyId, ringRadiusForAltitude,
} from "./orbit/body-profiles";
export type { BodyProfileInput } from "./orbit/body-profiles";
export { exponentBase, bandPower, correctionExponent, correctedInclination } from "./orbit/orientation-correction";
export { orbitOffsets, composite } from "./orbit/composite-rotation";
export { latLonToPosition } from "./orbit/globe-math";
export { visibilityDiameterKm, bodyVisibilityDiameterKm } from "./orbit/visibility";
export { headingFactorFromLatitudes, orbitTrackTransform, applyOrbitTrackTransform } from "./orbit/orbit-track";
