/**
 * Skyhand Agent — Backend Factory
 *
 * Picks the adapter for a connection string. 'auto' goes by scheme:
 * http(s) → REST bridge, sim → simulated session, anything else → raw
 * MAVLink.
 */

import type { AxiosInstance } from 'axios';
import type { BackendKind, ProtocolTiming } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { ConfigurationError } from '../types/errors.js';
import type { VehicleBackend } from './backend.js';
import { backendKindFor, parseConnectionString } from './connection-string.js';
import type { MavlinkLink } from './mavlink-link.js';
import { MavlinkBackend } from './mavlink.js';
import { RestBridgeBackend } from './rest-bridge.js';
import { SessionBackend, type FlightSession } from './session.js';
import { SimFlightSession } from './sim-session.js';

export interface BackendFactoryOptions {
  droneId: string;
  connectionString: string;
  backend: BackendKind | 'auto';
  timing?: Partial<ProtocolTiming>;
  logger?: Logger;
  /** Session for the session adapter; sim:// gets a SimFlightSession when omitted */
  session?: FlightSession;
  link?: MavlinkLink;
  httpClient?: AxiosInstance;
}

export function resolveBackendKind(backend: BackendKind | 'auto', connectionString: string): BackendKind {
  return backend === 'auto' ? backendKindFor(parseConnectionString(connectionString)) : backend;
}

export function createBackend(options: BackendFactoryOptions): VehicleBackend {
  const kind = resolveBackendKind(options.backend, options.connectionString);
  const base = { droneId: options.droneId, timing: options.timing, logger: options.logger?.child(kind) };

  switch (kind) {
    case 'session': {
      const endpoint = parseConnectionString(options.connectionString);
      const session = options.session ?? (endpoint.scheme === 'sim' ? new SimFlightSession() : null);
      if (!session) {
        throw new ConfigurationError(
          `session backend needs a FlightSession for ${options.connectionString}; only sim:// has a built-in one`,
        );
      }
      return new SessionBackend(session, base);
    }
    case 'mavlink':
      return new MavlinkBackend({ ...base, link: options.link });
    case 'rest':
      return new RestBridgeBackend({ ...base, httpClient: options.httpClient });
  }
}
