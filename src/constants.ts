// ── Units ──

/** Degrees to radians. */
export const DEG_TO_RAD = Math.PI / 180;

// ── Earth ──

/** Earth's mean radius in kilometers. */
export const EARTH_RADIUS_KM = 6371;

/** Largest latitude magnitude in degrees; band thresholds must lie within [0, MAX_LATITUDE_DEG]. */
export const MAX_LATITUDE_DEG = 90;

// ── Scene ──

/** Globe sphere radius in scene units. Ring radii are scaled relative to this. */
export const GLOBE_RADIUS = 1;

/**
 * Offset in degrees bridging geodetic coordinates to the globe's scene axes.
 * Added to latitude and subtracted from longitude before building rotations.
 */
export const SCENE_AXIS_OFFSET_DEG = 180;

// ── Orbit track colors ──

/** ISS orbit track color (red). */
export const ISS_TRACK_COLOR = 0xd02a2a;

/** Tiangong orbit track color (gold). */
export const TSS_TRACK_COLOR = 0xe0b040;

/** Hubble orbit track color (blue). */
export const HST_TRACK_COLOR = 0x4a8fd8;
