/**
 * Skyhand Agent — Connection Strings
 *
 *   udp://[host]:port        listen for the vehicle on a local UDP port
 *   tcp://host:port          connect to a TCP MAVLink endpoint
 *   serial:///dev/ttyX[:baud] open a serial port (default 57600 baud)
 *   http(s)://host[:port]    REST bridge base URL
 *   sim://[name]             in-process simulated session
 */

import { ConnectionError } from '../types/errors.js';
import type { BackendKind } from '../core/config.js';

export type Endpoint =
  | { scheme: 'udp'; host: string; port: number }
  | { scheme: 'tcp'; host: string; port: number }
  | { scheme: 'serial'; path: string; baudRate: number }
  | { scheme: 'http'; baseUrl: string }
  | { scheme: 'sim'; name: string };

export const DEFAULT_SERIAL_BAUD = 57600;

function parsePort(raw: string | undefined, source: string): number {
  const port = Number(raw);
  if (!raw || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConnectionError(`invalid port in "${source}"`);
  }
  return port;
}

function splitHostPort(rest: string, source: string): { host: string; port: number } {
  const idx = rest.lastIndexOf(':');
  if (idx < 0) throw new ConnectionError(`missing port in "${source}"`);
  return { host: rest.slice(0, idx), port: parsePort(rest.slice(idx + 1), source) };
}

export function parseConnectionString(source: string): Endpoint {
  const match = /^([a-z]+):\/\/(.*)$/i.exec(source.trim());
  if (!match) throw new ConnectionError(`unsupported connection string "${source}"`);
  const scheme = (match[1] ?? '').toLowerCase();
  const rest = match[2] ?? '';

  switch (scheme) {
    case 'udp': {
      const { host, port } = splitHostPort(rest, source);
      return { scheme: 'udp', host: host || '0.0.0.0', port };
    }
    case 'tcp': {
      const { host, port } = splitHostPort(rest, source);
      if (!host) throw new ConnectionError(`missing host in "${source}"`);
      return { scheme: 'tcp', host, port };
    }
    case 'serial': {
      const baudMatch = /^(.*):(\d+)$/.exec(rest);
      const path = baudMatch ? (baudMatch[1] ?? '') : rest;
      const baudRate = baudMatch ? Number(baudMatch[2]) : DEFAULT_SERIAL_BAUD;
      if (!path) throw new ConnectionError(`missing device path in "${source}"`);
      return { scheme: 'serial', path, baudRate };
    }
    case 'http':
    case 'https':
      if (!rest) throw new ConnectionError(`missing host in "${source}"`);
      return { scheme: 'http', baseUrl: source.trim().replace(/\/+$/, '') };
    case 'sim':
      return { scheme: 'sim', name: rest || 'default' };
    default:
      throw new ConnectionError(`unsupported scheme "${scheme}" in "${source}"`);
  }
}

/** Adapter that serves an endpoint when none is configured explicitly. */
export function backendKindFor(endpoint: Endpoint): BackendKind {
  switch (endpoint.scheme) {
    case 'http':
      return 'rest';
    case 'sim':
      return 'session';
    default:
      return 'mavlink';
  }
}
