import { STATE_SECTIONS, type StateSection, type VehicleState } from "./types.js";

/** State timestamps are milliseconds since the Unix epoch, UTC. */
export function epochMillisToDateTime(ms: number): Date {
  return new Date(ms);
}

/**
 * Collects the `timestamp` of every state section present in `state` as a
 * Date, keyed by section name.
 */
export function stateTimestamps(state: VehicleState): Partial<Record<StateSection, Date>> {
  const out: Partial<Record<StateSection, Date>> = {};
  for (const section of STATE_SECTIONS) {
    const timestamp = state[section]?.timestamp;
    if (typeof timestamp === "number") {
      out[section] = epochMillisToDateTime(timestamp);
    }
  }
  return out;
}
