import { z } from "zod";
import type { FetchLike, ApiOptions } from "./http.js";
import { DEFAULT_AUTH_BASE, getEnvelope, ownerRequest, parsePayload } from "./http.js";
import { logger } from "./logger.js";
import { accessTokenOf, vehiclePath, type TokenInput, type VehicleRef } from "./refs.js";
import {
  ClimateStateSchema,
  StateSectionSchema,
  TokenResponseSchema,
  VehicleStateSchema,
  VehicleSummarySchema,
  type ClientCredentials,
  type ClimateState,
  type Credential,
  type StateSection,
  type StateSectionData,
  type TokenResponse,
  type VehicleState,
  type VehicleSummary,
} from "./types.js";
import { PasswordSchema, validate } from "./validation.js";

export interface AuthOptions {
  authBase?: string;
  fetch?: FetchLike;
}

// Sections requested from the combined data endpoint, in this order.
const DATA_QUERY = ["vehicle_summary", "climate_state", "charge_state", "drive_state", "gui_settings", "vehicle_state"].join("&");

/**
 * Exchanges an email and password for a bearer token with the password grant.
 * The token response is returned as the server sent it; nothing tracks its
 * expiry or refreshes it.
 */
export async function authenticate(
  credential: Credential,
  client: ClientCredentials,
  options?: AuthOptions
): Promise<TokenResponse> {
  const email = validate(z.string().min(1, "is required"), credential.email, "email");
  const password = validate(PasswordSchema, credential.password, "password");
  const authBase = (options?.authBase ?? DEFAULT_AUTH_BASE).replace(/\/+$/, "");

  logger.debug("Requesting owner API token", { email, url: `${authBase}/oauth/token` });

  const json = await ownerRequest({
    method: "POST",
    url: `${authBase}/oauth/token`,
    body: {
      form: {
        grant_type: "password",
        client_id: client.clientId,
        client_secret: client.clientSecret,
        email,
        password,
      },
    },
    fetch: options?.fetch,
  });
  return parsePayload(TokenResponseSchema, json, "token");
}

export async function listVehicles(token: TokenInput, options?: ApiOptions): Promise<VehicleSummary[]> {
  const payload = await getEnvelope("/vehicles/", accessTokenOf(token), options);
  return parsePayload(z.array(VehicleSummarySchema), payload, "vehicle list");
}

/** Fetches summary, climate, charge, drive, GUI and vehicle state in one call. */
export async function getVehicleState(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<VehicleState> {
  const payload = await getEnvelope(`${vehiclePath(ref)}/data?${DATA_QUERY}`, accessTokenOf(token), options);
  return parsePayload(VehicleStateSchema, payload, "vehicle state");
}

export async function getStateSection(
  ref: VehicleRef,
  token: TokenInput,
  section: StateSection,
  options?: ApiOptions
): Promise<StateSectionData> {
  const payload = await getEnvelope(`${vehiclePath(ref)}/data_request/${section}`, accessTokenOf(token), options);
  return parsePayload(StateSectionSchema, payload, section);
}

export async function getClimateState(ref: VehicleRef, token: TokenInput, options?: ApiOptions): Promise<ClimateState> {
  const section = await getStateSection(ref, token, "climate_state", options);
  return parsePayload(ClimateStateSchema, section, "climate_state");
}
