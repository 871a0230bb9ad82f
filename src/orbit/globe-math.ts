import { DEG_TO_RAD } from "../constants";

/**
 * Convert (lat, lon) in degrees to (x, y, z) on a sphere of given radius.
 * Y-up convention: Y = north pole, X/Z = equatorial plane.
 */
export function latLonToPosition(
  latDeg: number,
  lonDeg: number,
  radius: number,
): [number, number, number] {
  const lat = latDeg * DEG_TO_RAD;
  const lon = lonDeg * DEG_TO_RAD;
  const cosLat = Math.cos(lat);
  return [
    radius * cosLat * Math.cos(lon),
    radius * Math.sin(lat),
    -radius * cosLat * Math.sin(lon),
  ];
}
