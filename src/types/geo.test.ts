import { describe, it, expect } from 'vitest';
import {
  ecefToGeodetic,
  geodeticToEcef,
  geodeticToNed,
  horizontalDistance,
  nedDistance,
  nedToGeodetic,
  WGS84_A,
  type GeoPoint,
} from './geo.js';

const REFERENCE: GeoPoint = { latitude: 47.397742, longitude: 8.545594, altitude: 488.0 };

describe('geodetic <-> ECEF', () => {
  it('places the equator/prime meridian on the x axis', () => {
    const [x, y, z] = geodeticToEcef({ latitude: 0, longitude: 0, altitude: 0 });
    expect(x).toBeCloseTo(WGS84_A, 6);
    expect(y).toBeCloseTo(0, 6);
    expect(z).toBeCloseTo(0, 6);
  });

  it('round-trips a point near the surface', () => {
    const back = ecefToGeodetic(geodeticToEcef(REFERENCE));
    expect(back.latitude).toBeCloseTo(REFERENCE.latitude, 7);
    expect(back.longitude).toBeCloseTo(REFERENCE.longitude, 7);
    expect(back.altitude).toBeCloseTo(REFERENCE.altitude, 2);
  });
});

describe('local NED <-> geodetic', () => {
  it('maps the reference itself to the origin', () => {
    const ned = geodeticToNed(REFERENCE, REFERENCE);
    expect(ned.north).toBeCloseTo(0, 6);
    expect(ned.east).toBeCloseTo(0, 6);
    expect(ned.down).toBeCloseTo(0, 6);
  });

  it('round-trips local offsets through the global frame', () => {
    const offsets = [
      { north: 25, east: -40, down: -12 },
      { north: -300, east: 150, down: -60 },
      { north: 0.5, east: 0.25, down: 0 },
    ];
    for (const offset of offsets) {
      const back = geodeticToNed(nedToGeodetic(offset, REFERENCE), REFERENCE);
      expect(Math.abs(back.north - offset.north)).toBeLessThan(1e-3);
      expect(Math.abs(back.east - offset.east)).toBeLessThan(1e-3);
      expect(Math.abs(back.down - offset.down)).toBeLessThan(1e-3);
    }
  });

  it('moves north with increasing latitude and up with negative down', () => {
    const point = nedToGeodetic({ north: 100, east: 0, down: -10 }, REFERENCE);
    expect(point.latitude).toBeGreaterThan(REFERENCE.latitude);
    expect(point.longitude).toBeCloseTo(REFERENCE.longitude, 6);
    expect(point.altitude).toBeCloseTo(REFERENCE.altitude + 10, 2);
  });
});

describe('distances', () => {
  it('computes 3D and horizontal distance', () => {
    const a = { north: 0, east: 0, down: 0 };
    const b = { north: 3, east: 4, down: -12 };
    expect(nedDistance(a, b)).toBe(13);
    expect(horizontalDistance(a, b)).toBe(5);
  });
});
