import { describe, it, expect, vi, afterEach } from 'vitest';
import { OrbitCommand, orbitPeriodS } from './orbit.js';
import { airborneAt, makeCommandHarness } from './testing.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('orbitPeriodS', () => {
  it('is circumference over speed', () => {
    expect(orbitPeriodS(10, 2)).toBeCloseTo(31.4159, 3);
    expect(orbitPeriodS(10, -2)).toBeCloseTo(31.4159, 3);
  });
});

describe('OrbitCommand — parameter checks', () => {
  it('rejects more than one duration mode before any backend call', async () => {
    const { sim, ctx } = await makeCommandHarness(airborneAt(10));
    const readSpy = vi.spyOn(ctx.telemetry, 'read');
    const result = await new OrbitCommand({ duration: 10, loops: 2 }).run(ctx);

    expect(result.code).toBe('validation');
    expect(result.message).toBe('Only one of duration, loops or continuous may be given');
    expect(readSpy).not.toHaveBeenCalled();
    expect(sim.calls.orbit).toBe(0);
  });

  it('rejects loops together with continuous', async () => {
    const { ctx } = await makeCommandHarness(airborneAt(10));
    const result = await new OrbitCommand({ loops: 1, continuous: true }).run(ctx);

    expect(result.message).toBe('Only one of duration, loops or continuous may be given');
  });

  it('rejects half a centre pair', async () => {
    const { ctx } = await makeCommandHarness(airborneAt(10));
    const result = await new OrbitCommand({ center_north: 5 }).run(ctx);

    expect(result.code).toBe('validation');
    expect(result.message).toBe('center_north and center_east must be given together');
  });

  it('rejects a centre given in both frames', async () => {
    const { ctx } = await makeCommandHarness(airborneAt(10));
    const result = await new OrbitCommand({ center_north: 5, center_east: 5, center_lat: 47.4, center_lon: 8.5 }).run(
      ctx,
    );

    expect(result.message).toBe('Give the orbit centre in one frame only');
  });

  it('rejects a non-positive radius and a near-zero speed', async () => {
    const { ctx } = await makeCommandHarness(airborneAt(10));

    const flat = await new OrbitCommand({ radius: 0 }).run(ctx);
    expect(flat.message).toBe('Orbit radius must be positive, got 0m');

    const slow = await new OrbitCommand({ velocity: 0.05 }).run(ctx);
    expect(slow.message).toBe('Orbit velocity too slow: 0.05m/s (min 0.1)');
  });

  it('rejects an unknown yaw behaviour', async () => {
    const { ctx } = await makeCommandHarness(airborneAt(10));
    const result = await new OrbitCommand({ yaw_behavior: 'spin' }).run(ctx);

    expect(result.message).toBe('Invalid yaw behaviour: spin');
  });

  it('rejects a loop count that cannot finish within the timeout', async () => {
    const { ctx } = await makeCommandHarness(airborneAt(10));
    const result = await new OrbitCommand({ radius: 50, velocity: 1, loops: 10, timeout: 120 }).run(ctx);

    expect(result.code).toBe('validation');
    expect(result.message).toBe('Orbit needs 3142s but the timeout is 120s');
  });

  it('requires a flying vehicle', async () => {
    const { sim, ctx } = await makeCommandHarness();
    const result = await new OrbitCommand({ duration: 1 }).run(ctx);

    expect(result.code).toBe('bad_state');
    expect(result.message).toBe('Cannot orbit: vehicle is disarmed, not flying');
    expect(sim.calls.orbit).toBe(0);
  });
});

describe('OrbitCommand — execution', () => {
  it('orbits for a fixed duration, then holds', async () => {
    const { sim, ctx } = await makeCommandHarness(airborneAt(10));
    const orbitSpy = vi.spyOn(ctx.backend, 'orbit');
    const result = await new OrbitCommand({ radius: 5, velocity: 2, duration: 0.1 }).run(ctx);

    expect(result.success).toBe(true);
    expect(result.message).toBe('Orbit complete (0.1s elapsed)');
    expect(sim.calls.orbit).toBe(1);
    expect(sim.calls.hold).toBe(1);
    expect(sim.vehicle.mode).toBe('hold');

    const request = orbitSpy.mock.calls[0][0];
    expect(request.radius).toBe(5);
    expect(request.velocity).toBe(2);
    expect(request.yawBehavior).toBe('face_center');
    expect(request.center.frame).toBe('global');
    if (request.center.frame === 'global') {
      expect(request.center.point.latitude).toBeCloseTo(47.397742, 6);
      expect(request.center.point.longitude).toBeCloseTo(8.545594, 6);
      expect(request.center.point.altitude).toBeCloseTo(498, 6);
    }
  });

  it('converts a local centre to global coordinates when the backend needs them', async () => {
    const { ctx } = await makeCommandHarness(airborneAt(10));
    const orbitSpy = vi.spyOn(ctx.backend, 'orbit');
    await new OrbitCommand({ center_north: 100, center_east: 0, altitude: 20, duration: 0.05 }).run(ctx);

    const { center } = orbitSpy.mock.calls[0][0];
    expect(center.frame).toBe('global');
    if (center.frame === 'global') {
      expect(center.point.latitude).toBeCloseTo(47.398641, 5);
      expect(center.point.longitude).toBeCloseTo(8.545594, 6);
      expect(center.point.altitude).toBeCloseTo(508, 2);
    }
  });

  it('passes a local centre through when the backend takes local coordinates', async () => {
    const { ctx } = await makeCommandHarness({ ...airborneAt(10), requiresGlobalOrbitCenter: false });
    const orbitSpy = vi.spyOn(ctx.backend, 'orbit');
    await new OrbitCommand({ center_north: 3, center_east: 4, duration: 0.05 }).run(ctx);

    expect(orbitSpy.mock.calls[0][0].center).toEqual({ frame: 'local', point: { north: 3, east: 4, down: -10 } });
  });

  it('ends a continuous orbit at the timeout with success', async () => {
    const { sim, ctx } = await makeCommandHarness(airborneAt(10));
    const result = await new OrbitCommand({ continuous: true, timeout: 0.1 }).run(ctx);

    expect(result.success).toBe(true);
    expect(result.message).toBe('Continuous orbit ended after 0.1s');
    expect(sim.calls.hold).toBe(1);
  });

  it('aborts when the emergency latch is set mid-orbit', async () => {
    const { sim, backend, ctx } = await makeCommandHarness(airborneAt(10));
    setTimeout(() => backend.latchEmergency('test'), 30);
    const result = await new OrbitCommand({ duration: 5 }).run(ctx);

    expect(result.success).toBe(false);
    expect(result.code).toBe('bad_state');
    expect(result.message).toBe('Orbit aborted: vehicle emergency');
    expect(sim.calls.hold).toBe(0);
  });
});
