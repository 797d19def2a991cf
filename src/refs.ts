/** API-internal vehicle id. The string form is the API's `id_s`. Not `vehicle_id`, not the VIN. */
export type VehicleId = number | string;

/**
 * A bare id, or any record carrying one (such as a vehicle summary). The
 * record's `id_s` wins over `id`: ids past 2^53 lose digits as JSON numbers.
 */
export type VehicleRef = VehicleId | { id: VehicleId; id_s?: string };

/** A bare bearer token, or a token response carrying one. */
export type TokenInput = string | { access_token: string };

export function vehicleIdOf(ref: VehicleRef): VehicleId {
  return typeof ref === "object" ? ref.id_s ?? ref.id : ref;
}

export function accessTokenOf(token: TokenInput): string {
  return typeof token === "object" ? token.access_token : token;
}

export function vehiclePath(ref: VehicleRef): string {
  return `/vehicles/${encodeURIComponent(String(vehicleIdOf(ref)))}`;
}
