import { getClimateState } from "./account.js";
import { executeCommand } from "./dispatcher.js";
import { ValidationError } from "./errors.js";
import type { ApiOptions } from "./http.js";
import type { TokenInput, VehicleRef } from "./refs.js";
import { ChargeLimitSchema, PasswordSchema, ValetPinSchema, toCelsius, validate } from "./validation.js";

// ---------------------------------------------------------------------------
// Doors, lights & horn
// ---------------------------------------------------------------------------

export function lockDoors(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "door_lock", undefined, options);
}

export function unlockDoors(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "door_unlock", undefined, options);
}

export function flashLights(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "flash_lights", undefined, options);
}

export function honkHorn(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "honk_horn", undefined, options);
}

export function wakeUp(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "wake_up", undefined, options);
}

// ---------------------------------------------------------------------------
// Sunroof
// ---------------------------------------------------------------------------

export function ventSunroof(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "sun_roof_control", { state: "vent" }, options);
}

export function closeSunroof(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "sun_roof_control", { state: "close" }, options);
}

// ---------------------------------------------------------------------------
// Charging
// ---------------------------------------------------------------------------

export function openChargePort(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "charge_port_door_open", undefined, options);
}

export function closeChargePort(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "charge_port_door_close", undefined, options);
}

export function startCharging(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "charge_start", undefined, options);
}

export function stopCharging(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "charge_stop", undefined, options);
}

/** Sets the charge limit; `percent` must be a whole number from 50 to 100. */
export async function setChargeLimit(ref: VehicleRef, token: TokenInput, percent: number, options?: ApiOptions): Promise<true> {
  const checked = validate(ChargeLimitSchema, percent, "percent");
  return executeCommand(ref, token, "set_charge_limit", { percent: checked }, options);
}

// ---------------------------------------------------------------------------
// Climate
// ---------------------------------------------------------------------------

export function startClimate(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "auto_conditioning_start", undefined, options);
}

export function stopClimate(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "auto_conditioning_stop", undefined, options);
}

export interface Temperatures {
  driverTemp?: number;
  passengerTemp?: number;
}

/**
 * Sets the driver and passenger temperatures. Each value is Celsius when it
 * is 28 or less and Fahrenheit above that; see {@link toCelsius}.
 *
 * When only one side is given the other keeps its current setting, which
 * costs one read of the climate state before the command is sent.
 */
export async function setTemperatures(ref: VehicleRef, token: TokenInput, temps: Temperatures, options?: ApiOptions): Promise<true> {
  if (temps.driverTemp === undefined && temps.passengerTemp === undefined) {
    throw new ValidationError("driverTemp", "at least one of driverTemp or passengerTemp is required");
  }
  let driver = temps.driverTemp === undefined ? undefined : toCelsius(temps.driverTemp, "driverTemp");
  let passenger = temps.passengerTemp === undefined ? undefined : toCelsius(temps.passengerTemp, "passengerTemp");

  if (driver === undefined || passenger === undefined) {
    const climate = await getClimateState(ref, token, options);
    driver ??= climate.driver_temp_setting;
    passenger ??= climate.passenger_temp_setting;
  }

  return executeCommand(ref, token, "set_temps", { driver_temp: driver, passenger_temp: passenger }, options);
}

// ---------------------------------------------------------------------------
// Valet mode & remote start
// ---------------------------------------------------------------------------

function valetBody(on: boolean, pin: string | undefined): Record<string, string> {
  if (pin === undefined) {
    return { on: String(on) };
  }
  return { on: String(on), password: validate(ValetPinSchema, pin, "pin") };
}

/** Turns valet mode on, optionally with a 4-digit pin ("0000" to "9999"). */
export async function enableValetMode(ref: VehicleRef, token: TokenInput, pin?: string, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "set_valet_mode", valetBody(true, pin), options);
}

export async function disableValetMode(ref: VehicleRef, token: TokenInput, pin?: string, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "set_valet_mode", valetBody(false, pin), options);
}

export function resetValetPin(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<true> {
  return executeCommand(ref, token, "reset_valet_pin", undefined, options);
}

/**
 * Enables keyless driving. Needs the account password itself, not the API
 * token; the body is redacted before it reaches the log.
 */
export async function remoteStart(ref: VehicleRef, token: TokenInput, password: string, options?: ApiOptions): Promise<true> {
  const checked = validate(PasswordSchema, password, "password");
  return executeCommand(ref, token, "remote_start_drive", { password: checked }, options);
}
