export { authenticate, getClimateState, getStateSection, getVehicleState, listVehicles, type AuthOptions } from "./account.js";
export * from "./commands.js";
export { commandPath, executeCommand, type CommandBody } from "./dispatcher.js";
export { CommandRejectedError, OwnerApiError, TransportError, ValidationError } from "./errors.js";
export { DEFAULT_API_BASE, DEFAULT_AUTH_BASE, type ApiOptions, type FetchLike } from "./http.js";
export { accessTokenOf, vehicleIdOf, type TokenInput, type VehicleId, type VehicleRef } from "./refs.js";
export { epochMillisToDateTime, stateTimestamps } from "./time.js";
export { toCelsius } from "./validation.js";
export type {
  ClientCredentials,
  ClimateState,
  Credential,
  StateSection,
  StateSectionData,
  TokenResponse,
  VehicleState,
  VehicleSummary,
} from "./types.js";
