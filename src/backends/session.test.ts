import { describe, it, expect, vi, afterEach } from 'vitest';
import { SessionBackend } from './session.js';
import { SimFlightSession, type SimSessionConfig } from './sim-session.js';
import { delay } from '../core/async.js';
import { BackendError, ConnectionError } from '../types/errors.js';

function makeBackend(config: Partial<SimSessionConfig> = {}, actionTimeoutMs = 1_000) {
  const sim = new SimFlightSession({ climbRate: 100, descentRate: 100, ...config });
  const backend = new SessionBackend(sim, { droneId: 'test-drone', timing: { actionTimeoutMs } });
  return { sim, backend };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('SessionBackend — lifecycle', () => {
  it('reports disconnected before connect', async () => {
    const { backend } = makeBackend();
    const telemetry = await backend.getTelemetry();
    expect(backend.connected).toBe(false);
    expect(telemetry.state).toBe('disconnected');
    expect(telemetry.connected).toBe(false);
    expect(telemetry.droneId).toBe('test-drone');
    expect(await backend.isArmed()).toBe(false);
    expect(await backend.getFlightMode()).toBe('unknown');
  });

  it('is disarmed after connect', async () => {
    const { backend } = makeBackend();
    await backend.connect('sim://');
    expect(backend.connected).toBe(true);
    expect(await backend.getState()).toBe('disarmed');
    await backend.disconnect();
    expect(await backend.getState()).toBe('disconnected');
  });

  it('refuses actions while disconnected', async () => {
    const { backend } = makeBackend();
    await expect(backend.arm()).rejects.toBeInstanceOf(ConnectionError);
    await expect(backend.arm()).rejects.toThrow('arm: vehicle not connected');
  });
});

describe('SessionBackend — flight', () => {
  it('walks disarmed → armed → flying → disarmed', async () => {
    const { backend } = makeBackend();
    await backend.connect('sim://');

    await backend.arm();
    expect(await backend.getState()).toBe('armed');

    await backend.takeoff(5);
    await delay(80);
    const airborne = await backend.getTelemetry();
    expect(airborne.state).toBe('flying');
    expect(airborne.position.altitudeRelative).toBe(5);
    expect(airborne.health.gpsOk).toBe(true);

    await backend.land();
    await delay(80);
    expect(await backend.getState()).toBe('disarmed');
  });

  it('reports taking_off while climbing', async () => {
    const { backend } = makeBackend({ climbRate: 0.5 });
    await backend.connect('sim://');
    await backend.arm();
    await backend.takeoff(20);
    expect(await backend.getState()).toBe('taking_off');
  });
});

describe('SessionBackend — errors', () => {
  it('wraps session failures in BackendError', async () => {
    const { backend } = makeBackend({ failures: { arm: 'preflight check failed' } });
    await backend.connect('sim://');
    const err = await backend.arm().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendError);
    expect(err).toHaveProperty('message', 'arm failed: preflight check failed');
  });

  it('bounds every action by the action timeout', async () => {
    const { sim, backend } = makeBackend({}, 20);
    await backend.connect('sim://');
    vi.spyOn(sim, 'hold').mockReturnValue(new Promise<void>(() => undefined));
    await expect(backend.holdPosition()).rejects.toThrow('hold did not complete within 20ms');
  });
});

describe('SessionBackend — emergency latch', () => {
  it('latches, holds and clears', async () => {
    const { sim, backend } = makeBackend();
    await backend.connect('sim://');

    await backend.emergencyStop();
    expect(sim.calls.hold).toBe(1);
    expect(backend.emergencyReason).toBe('emergency stop requested');
    expect(await backend.getState()).toBe('emergency');

    backend.clearEmergency();
    expect(backend.emergencyReason).toBeNull();
    expect(await backend.getState()).toBe('disarmed');
  });

  it('records the latch reason', () => {
    const { backend } = makeBackend();
    backend.latchEmergency('failsafe failed');
    expect(backend.emergencyReason).toBe('failsafe failed');
  });
});
