import { describe, it, expect, vi, afterEach } from 'vitest';
import { TakeoffCommand } from './takeoff.js';
import { airborneAt, makeCommandHarness } from './testing.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('TakeoffCommand', () => {
  it('arms a disarmed vehicle (hold first) and climbs', async () => {
    const { sim, ctx } = await makeCommandHarness();
    const result = await new TakeoffCommand({ altitude: 5, altitude_tolerance: 1, timeout: 5 }).run(ctx);

    expect(result.success).toBe(true);
    expect(result.message).toBe('Takeoff complete (reached 5.0m of 5m)');
    expect(sim.calls.hold).toBe(1);
    expect(sim.calls.arm).toBe(1);
    expect(sim.calls.takeoff).toBe(1);
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('accepts 92% of the target as reached', async () => {
    const { ctx } = await makeCommandHarness({ altitudeCeiling: 9.2 });
    const result = await new TakeoffCommand({ altitude: 10, altitude_tolerance: 0.9, timeout: 5 }).run(ctx);

    expect(result.success).toBe(true);
    expect(result.message).toBe('Takeoff complete (reached 9.2m of 10m)');
    expect(result.data).toEqual({ targetAltitude: 10, altitude: 9.2, toleranceMet: true });
  });

  it('reports partial success once the grace period has passed', async () => {
    const { ctx } = await makeCommandHarness({ altitudeCeiling: 5 }, { takeoffGraceMs: 100 });
    const result = await new TakeoffCommand({ altitude: 10, altitude_tolerance: 0.9, timeout: 5 }).run(ctx);

    expect(result.success).toBe(true);
    expect(result.message).toBe('Takeoff partially complete (reached 5.0m of 10m)');
    expect(result.data).toEqual({ targetAltitude: 10, altitude: 5, partial: true });
  });

  it('treats an airborne vehicle as already done', async () => {
    const { sim, ctx } = await makeCommandHarness(airborneAt(6));
    const result = await new TakeoffCommand({ altitude: 10 }).run(ctx);

    expect(result.success).toBe(true);
    expect(result.message).toBe('Vehicle already airborne');
    expect(result.data).toEqual({ alreadyAirborne: true, altitude: 6 });
    expect(sim.calls.takeoff).toBe(0);
  });

  it('times out with the best altitude reached', async () => {
    const { ctx } = await makeCommandHarness({ frozen: true });
    const result = await new TakeoffCommand({ altitude: 10, timeout: 0.1 }).run(ctx);

    expect(result.success).toBe(false);
    expect(result.code).toBe('timeout');
    expect(result.message).toBe('Takeoff timed out: reached 0.0m of 10m');
    expect(result.data).toEqual({ targetAltitude: 10, bestAltitude: 0 });
  });

  it('fails fast when disconnected', async () => {
    const { sim, backend, ctx } = await makeCommandHarness();
    await backend.disconnect();
    const result = await new TakeoffCommand({ altitude: 10 }).run(ctx);

    expect(result.code).toBe('connection');
    expect(result.message).toBe('Cannot take off: vehicle disconnected');
    expect(sim.calls.arm).toBe(0);
  });

  it('refuses to take off with the emergency latch set', async () => {
    const { backend, ctx } = await makeCommandHarness();
    backend.latchEmergency('test');
    const result = await new TakeoffCommand({ altitude: 10 }).run(ctx);

    expect(result.code).toBe('bad_state');
    expect(result.message).toBe('Cannot take off: emergency latched');
  });

  it('maps a backend rejection to a backend failure', async () => {
    const { ctx } = await makeCommandHarness({ failures: { takeoff: 'motor fault' } });
    const result = await new TakeoffCommand({ altitude: 10 }).run(ctx);

    expect(result.success).toBe(false);
    expect(result.code).toBe('backend');
    expect(result.error).toBe('takeoff failed: motor fault');
  });

  it('returns a cancelled result when aborted mid-climb', async () => {
    const { controller, ctx } = await makeCommandHarness({ frozen: true });
    setTimeout(() => controller.abort(), 30);
    const result = await new TakeoffCommand({ altitude: 10, timeout: 5 }).run(ctx);

    expect(result.code).toBe('cancelled');
    expect(result.message).toBe('takeoff was cancelled');
  });
});
