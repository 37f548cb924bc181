/**
 * Skyhand Agent — Geodesy
 *
 * WGS-84 conversions between geodetic coordinates, ECEF and a local NED
 * frame anchored at a reference fix. Used to move orbit centres between
 * the local frame the operator speaks in and the global frame the
 * autopilot expects.
 */

export type Vec3 = [x: number, y: number, z: number];

/** Degrees and metres above mean sea level. */
export interface GeoPoint {
  latitude: number;
  longitude: number;
  altitude: number;
}

/** Metres, "down" positive toward the ground. */
export interface NedPoint {
  north: number;
  east: number;
  down: number;
}

export interface NedBasis {
  north: Vec3;
  east: Vec3;
  down: Vec3;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const WGS84_A = 6378137.0;
export const WGS84_F = 1 / 298.257223563;
export const WGS84_B = WGS84_A * (1 - WGS84_F);
export const WGS84_E2 = WGS84_F * (2 - WGS84_F);
export const WGS84_EP2 = WGS84_E2 / (1 - WGS84_E2);

export const DEG2RAD = Math.PI / 180;
export const RAD2DEG = 180 / Math.PI;

// ---------------------------------------------------------------------------
// Geodetic <-> ECEF
// ---------------------------------------------------------------------------

export const geodeticToEcef = (point: GeoPoint): Vec3 => {
  const lat = point.latitude * DEG2RAD;
  const lon = point.longitude * DEG2RAD;
  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);
  const n = WGS84_A / Math.sqrt(1 - WGS84_E2 * sinLat * sinLat);
  return [
    (n + point.altitude) * cosLat * Math.cos(lon),
    (n + point.altitude) * cosLat * Math.sin(lon),
    (n * (1 - WGS84_E2) + point.altitude) * sinLat,
  ];
};

/** Bowring's closed form; sub-millimetre near the surface. */
export const ecefToGeodetic = ([x, y, z]: Vec3): GeoPoint => {
  const p = Math.hypot(x, y);
  if (p < 1e-6) {
    return {
      latitude: z >= 0 ? 90 : -90,
      longitude: 0,
      altitude: Math.abs(z) - WGS84_B,
    };
  }
  const theta = Math.atan2(z * WGS84_A, p * WGS84_B);
  const sinTheta = Math.sin(theta);
  const cosTheta = Math.cos(theta);
  const lat = Math.atan2(
    z + WGS84_EP2 * WGS84_B * sinTheta * sinTheta * sinTheta,
    p - WGS84_E2 * WGS84_A * cosTheta * cosTheta * cosTheta,
  );
  const lon = Math.atan2(y, x);
  const sinLat = Math.sin(lat);
  const n = WGS84_A / Math.sqrt(1 - WGS84_E2 * sinLat * sinLat);
  return {
    latitude: lat * RAD2DEG,
    longitude: lon * RAD2DEG,
    altitude: p / Math.cos(lat) - n,
  };
};

export const nedBasisAt = (point: GeoPoint): NedBasis => {
  const lat = point.latitude * DEG2RAD;
  const lon = point.longitude * DEG2RAD;
  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);
  const sinLon = Math.sin(lon);
  const cosLon = Math.cos(lon);
  return {
    north: [-sinLat * cosLon, -sinLat * sinLon, cosLat],
    east: [-sinLon, cosLon, 0],
    down: [-cosLat * cosLon, -cosLat * sinLon, -sinLat],
  };
};

const dot = (a: Vec3, b: Vec3): number => a[0] * b[0] + a[1] * b[1] + a[2] * b[2];

// ---------------------------------------------------------------------------
// Local NED <-> geodetic
// ---------------------------------------------------------------------------

/** Offset of `point` from `reference`, expressed in the reference's NED frame. */
export function geodeticToNed(point: GeoPoint, reference: GeoPoint): NedPoint {
  const origin = geodeticToEcef(reference);
  const target = geodeticToEcef(point);
  const delta: Vec3 = [target[0] - origin[0], target[1] - origin[1], target[2] - origin[2]];
  const basis = nedBasisAt(reference);
  return {
    north: dot(delta, basis.north),
    east: dot(delta, basis.east),
    down: dot(delta, basis.down),
  };
}

/** Geodetic position of a NED offset from `reference`. */
export function nedToGeodetic(offset: NedPoint, reference: GeoPoint): GeoPoint {
  const origin = geodeticToEcef(reference);
  const basis = nedBasisAt(reference);
  const axis = (i: 0 | 1 | 2): number =>
    origin[i] +
    offset.north * basis.north[i] +
    offset.east * basis.east[i] +
    offset.down * basis.down[i];
  return ecefToGeodetic([axis(0), axis(1), axis(2)]);
}

// ---------------------------------------------------------------------------
// Distances
// ---------------------------------------------------------------------------

export function nedDistance(a: NedPoint, b: NedPoint): number {
  return Math.hypot(a.north - b.north, a.east - b.east, a.down - b.down);
}

export function horizontalDistance(a: NedPoint, b: NedPoint): number {
  return Math.hypot(a.north - b.north, a.east - b.east);
}

export function addNed(a: NedPoint, b: NedPoint): NedPoint {
  return { north: a.north + b.north, east: a.east + b.east, down: a.down + b.down };
}

export function subtractNed(a: NedPoint, b: NedPoint): NedPoint {
  return { north: a.north - b.north, east: a.east - b.east, down: a.down - b.down };
}
