import { describe, it, expect } from 'vitest';
import { createBackend, resolveBackendKind } from './factory.js';
import { MavlinkBackend } from './mavlink.js';
import { RestBridgeBackend } from './rest-bridge.js';
import { SessionBackend } from './session.js';
import { SimFlightSession } from './sim-session.js';
import { ConfigurationError } from '../types/errors.js';

describe('resolveBackendKind', () => {
  it('picks the adapter from the scheme on auto', () => {
    expect(resolveBackendKind('auto', 'udp://:14540')).toBe('mavlink');
    expect(resolveBackendKind('auto', 'serial:///dev/ttyACM0')).toBe('mavlink');
    expect(resolveBackendKind('auto', 'http://localhost:8088')).toBe('rest');
    expect(resolveBackendKind('auto', 'sim://')).toBe('session');
  });

  it('keeps an explicit choice', () => {
    expect(resolveBackendKind('rest', 'udp://:14540')).toBe('rest');
  });
});

describe('createBackend', () => {
  it('builds a simulated session for sim://', () => {
    const backend = createBackend({ droneId: 'd1', connectionString: 'sim://', backend: 'auto' });
    expect(backend).toBeInstanceOf(SessionBackend);
    expect(backend.kind).toBe('session');
    expect(backend.droneId).toBe('d1');
  });

  it('uses an injected session for other endpoints', () => {
    const backend = createBackend({
      droneId: 'd1',
      connectionString: 'udp://:14540',
      backend: 'session',
      session: new SimFlightSession(),
    });
    expect(backend).toBeInstanceOf(SessionBackend);
  });

  it('refuses the session adapter without a session', () => {
    expect(() => createBackend({ droneId: 'd1', connectionString: 'udp://:14540', backend: 'session' })).toThrow(
      ConfigurationError,
    );
  });

  it('builds the protocol adapters', () => {
    expect(createBackend({ droneId: 'd1', connectionString: 'tcp://10.0.0.2:5760', backend: 'auto' })).toBeInstanceOf(
      MavlinkBackend,
    );
    expect(createBackend({ droneId: 'd1', connectionString: 'https://bridge.local', backend: 'auto' })).toBeInstanceOf(
      RestBridgeBackend,
    );
  });
});
