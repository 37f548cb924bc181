/**
 * Skyhand Agent — Vehicle State Machine
 *
 * The operational state is never set directly. It is derived on every
 * query from the link status, the armed flag, the flight mode and the
 * airborne signal. The transition table below lists which derived changes
 * are expected; anything else is logged by the telemetry poller.
 *
 * Rules:
 *  - * → disconnected (link loss or explicit disconnect) is always valid
 *  - * → emergency is always valid
 *  - taking_off / flying / landing are entered only from armed
 *  - every state can reach a grounded state
 */

import { DRONE_STATES, type DroneState, type FlightMode } from './models.js';

// ---------------------------------------------------------------------------
// Derivation
// ---------------------------------------------------------------------------

/** Raw signals a backend reports. */
export interface StateSignals {
  /** Protocol link is up */
  connected: boolean;
  /** At least one vehicle status report has been received on this link */
  statusReceived: boolean;
  armed: boolean;
  flightMode: FlightMode;
  inAir: boolean;
  /** Emergency latched by the agent */
  emergency: boolean;
}

export function deriveDroneState(signals: StateSignals): DroneState {
  if (!signals.connected) return 'disconnected';
  if (signals.emergency) return 'emergency';
  if (!signals.statusReceived) return 'connected';
  if (!signals.armed) return 'disarmed';
  if (signals.flightMode === 'takeoff') return 'taking_off';
  if (signals.flightMode === 'land' && signals.inAir) return 'landing';
  if (signals.inAir) return 'flying';
  return 'armed';
}

/** States in which the vehicle is on the ground. */
export const GROUNDED_STATES: readonly DroneState[] = ['connected', 'disarmed', 'armed'];

/** States only reachable once the vehicle has been armed. */
export const FLIGHT_STATES: readonly DroneState[] = ['taking_off', 'flying', 'landing'];

export function isGrounded(state: DroneState): boolean {
  return GROUNDED_STATES.includes(state);
}

export function isInFlight(state: DroneState): boolean {
  return FLIGHT_STATES.includes(state);
}

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

export interface StateTransitionRule {
  /** Source state, or '*' for any */
  from: DroneState | '*';
  /** Target state */
  to: DroneState;
  valid: boolean;
  reason?: string;
}

/**
 * Specific rules override wildcards. A pair with no rule is invalid.
 */
export const STATE_TRANSITION_RULES: readonly StateTransitionRule[] = [
  { from: '*', to: 'disconnected', valid: true, reason: 'Link lost or closed' },
  { from: '*', to: 'emergency', valid: true, reason: 'Emergency latched' },

  // Link establishment
  { from: 'disconnected', to: 'connected', valid: true },
  { from: 'disconnected', to: 'disarmed', valid: true },
  { from: 'disconnected', to: 'armed', valid: true },
  { from: 'connected', to: 'disarmed', valid: true },
  { from: 'connected', to: 'armed', valid: true },

  // Ground handling
  { from: 'disarmed', to: 'armed', valid: true },
  { from: 'armed', to: 'disarmed', valid: true },

  // Entering flight
  { from: 'armed', to: 'taking_off', valid: true },
  { from: 'armed', to: 'flying', valid: true },
  { from: 'armed', to: 'landing', valid: true },
  { from: 'disarmed', to: 'taking_off', valid: false, reason: 'Must arm before taking off' },
  { from: 'disarmed', to: 'flying', valid: false, reason: 'Must arm before flying' },

  // In flight
  { from: 'taking_off', to: 'flying', valid: true, reason: 'Takeoff completed' },
  { from: 'taking_off', to: 'landing', valid: true },
  { from: 'taking_off', to: 'armed', valid: true, reason: 'Takeoff aborted on the ground' },
  { from: 'flying', to: 'landing', valid: true },
  { from: 'flying', to: 'armed', valid: true, reason: 'Touchdown outside land mode' },
  { from: 'landing', to: 'flying', valid: true, reason: 'Landing aborted' },
  { from: 'landing', to: 'armed', valid: true, reason: 'Touchdown' },
  { from: 'landing', to: 'disarmed', valid: true, reason: 'Touchdown with auto-disarm' },
  { from: 'flying', to: 'disarmed', valid: false, reason: 'Disarmed in the air' },

  // Recovery
  { from: 'emergency', to: 'disarmed', valid: true, reason: 'Emergency cleared' },
  { from: 'emergency', to: 'armed', valid: true, reason: 'Emergency cleared' },
  { from: 'emergency', to: 'flying', valid: true, reason: 'Emergency cleared in the air' },
] as const;

export function findStateTransitionRule(
  from: DroneState,
  to: DroneState,
): StateTransitionRule | null {
  const exact = STATE_TRANSITION_RULES.find((r) => r.from === from && r.to === to);
  if (exact) return exact;
  return STATE_TRANSITION_RULES.find((r) => r.from === '*' && r.to === to) ?? null;
}

/** Self-transitions are always valid. */
export function isStateTransitionValid(from: DroneState, to: DroneState): boolean {
  if (from === to) return true;
  const rule = findStateTransitionRule(from, to);
  return rule !== null && rule.valid;
}

export function validStatesFrom(from: DroneState): DroneState[] {
  return DRONE_STATES.filter((to) => to !== from && isStateTransitionValid(from, to));
}

export function validStatesTo(to: DroneState): DroneState[] {
  return DRONE_STATES.filter((from) => from !== to && isStateTransitionValid(from, to));
}

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

export interface StateChange {
  from: DroneState;
  to: DroneState;
  valid: boolean;
  at: number;
}

/** Remembers the last observed state and reports changes. */
export class StateTracker {
  private _current: DroneState;
  private _history: StateChange[] = [];

  constructor(initial: DroneState = 'disconnected') {
    this._current = initial;
  }

  get current(): DroneState {
    return this._current;
  }

  /** Most recent changes, oldest first. */
  get history(): readonly StateChange[] {
    return this._history;
  }

  /** Record an observation. Returns the change, or null if the state is unchanged. */
  observe(next: DroneState, at: number = Date.now()): StateChange | null {
    if (next === this._current) return null;
    const change: StateChange = {
      from: this._current,
      to: next,
      valid: isStateTransitionValid(this._current, next),
      at,
    };
    this._current = next;
    this._history.push(change);
    if (this._history.length > 50) this._history.shift();
    return change;
  }
}
