/**
 * MCP tools over the owner API client. Every tool is one library call; the
 * server only resolves the vehicle id and the access token first.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { authenticate, getClimateState, getVehicleState, listVehicles } from "./account.js";
import {
  closeChargePort,
  closeSunroof,
  disableValetMode,
  enableValetMode,
  flashLights,
  honkHorn,
  lockDoors,
  openChargePort,
  remoteStart,
  resetValetPin,
  setChargeLimit,
  setTemperatures,
  startCharging,
  startClimate,
  stopCharging,
  stopClimate,
  unlockDoors,
  ventSunroof,
  wakeUp,
} from "./commands.js";
import type { ServerConfig } from "./config.js";
import type { ApiOptions, FetchLike } from "./http.js";
import { logger } from "./logger.js";
import type { TokenInput, VehicleRef } from "./refs.js";
import { stateTimestamps } from "./time.js";

export const SERVER_NAME = "owner-api-remote";
export const SERVER_VERSION = "0.1.0";

export interface ServerOptions {
  fetch?: FetchLike;
}

function asText(data: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }] };
}

type SimpleCommand = (ref: VehicleRef, token: TokenInput, options?: ApiOptions) => Promise<true>;

// tool name, description, library call
const SIMPLE_COMMANDS: ReadonlyArray<readonly [string, string, SimpleCommand]> = [
  ["lock", "Locks the vehicle doors", lockDoors],
  ["unlock", "Unlocks the vehicle doors", unlockDoors],
  ["open_charge_port", "Opens the charge port door", openChargePort],
  ["close_charge_port", "Closes the charge port door", closeChargePort],
  ["vent_sunroof", "Vents the sunroof", ventSunroof],
  ["close_sunroof", "Closes the sunroof", closeSunroof],
  ["flash_lights", "Flashes the vehicle's lights", flashLights],
  ["honk_horn", "Honks the vehicle's horn", honkHorn],
  ["wake_up", "Wakes the vehicle from sleep", wakeUp],
  ["start_charging", "Starts charging the vehicle", startCharging],
  ["stop_charging", "Stops charging the vehicle", stopCharging],
  ["start_climate", "Starts climate control", startClimate],
  ["stop_climate", "Stops climate control", stopClimate],
  ["reset_valet_pin", "Clears the valet mode pin", resetValetPin],
];

export function createServer(config: ServerConfig, options: ServerOptions = {}): McpServer {
  const api: ApiOptions = { apiBase: config.apiBase, fetch: options.fetch };

  let pendingToken: Promise<string> | undefined;

  // A configured token is used as-is; otherwise one password grant per server.
  function accessToken(): Promise<string> {
    const source = config.credentials;
    if (source.kind === "token") {
      return Promise.resolve(source.accessToken);
    }
    pendingToken ??= authenticate(source.credential, source.client, { authBase: config.authBase, fetch: options.fetch })
      .then((token) => {
        logger.info("Obtained owner API token", { expiresIn: token.expires_in });
        return token.access_token;
      })
      .catch((err: unknown) => {
        pendingToken = undefined;
        throw err;
      });
    return pendingToken;
  }

  function vehicleOf(id: string | undefined): string {
    const vehicleId = id || config.defaultVehicleId;
    if (!vehicleId) {
      throw new Error("vehicle_id is required. Provide it as a parameter or set OWNER_API_DEFAULT_VEHICLE_ID.");
    }
    return vehicleId;
  }

  const VehicleIdSchema = z
    .string()
    .optional()
    .describe("API vehicle id (the `id_s` from list_vehicles, not vehicle_id or the VIN). Defaults to OWNER_API_DEFAULT_VEHICLE_ID.");

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // ===================== VEHICLE STATE & DATA =====================

  server.tool(
    "list_vehicles",
    "Lists the vehicles bound to the account",
    {},
    async () => asText(await listVehicles(await accessToken(), api))
  );

  server.tool(
    "get_vehicle_state",
    "Returns summary, climate, charge, drive, GUI and vehicle state in one call, with section timestamps as ISO dates",
    { vehicle_id: VehicleIdSchema },
    async ({ vehicle_id }) => {
      const state = await getVehicleState(vehicleOf(vehicle_id), await accessToken(), api);
      return asText({ ...state, timestamps: stateTimestamps(state) });
    }
  );

  server.tool(
    "get_climate_state",
    "Returns the climate state, including the current temperature settings in Celsius",
    { vehicle_id: VehicleIdSchema },
    async ({ vehicle_id }) => asText(await getClimateState(vehicleOf(vehicle_id), await accessToken(), api))
  );

  // ===================== SIMPLE COMMANDS =====================

  for (const [name, description, run] of SIMPLE_COMMANDS) {
    server.tool(name, description, { vehicle_id: VehicleIdSchema }, async ({ vehicle_id }) => {
      const result = await run(vehicleOf(vehicle_id), await accessToken(), api);
      return asText({ result });
    });
  }

  // ===================== COMMANDS WITH PARAMETERS =====================

  server.tool(
    "set_charge_limit",
    "Sets the charge limit percentage (50-100)",
    {
      vehicle_id: VehicleIdSchema,
      percent: z.number().describe("Charge limit percentage (50-100)"),
    },
    async ({ vehicle_id, percent }) => {
      const result = await setChargeLimit(vehicleOf(vehicle_id), await accessToken(), percent, api);
      return asText({ result });
    }
  );

  server.tool(
    "set_temperatures",
    "Sets driver and passenger temperatures. Values up to 28 are Celsius (15-28, 0.5 steps); higher values are Fahrenheit (59-82). A side left out keeps its current setting.",
    {
      vehicle_id: VehicleIdSchema,
      driver_temp: z.number().optional().describe("Driver temperature"),
      passenger_temp: z.number().optional().describe("Passenger temperature"),
    },
    async ({ vehicle_id, driver_temp, passenger_temp }) => {
      const result = await setTemperatures(
        vehicleOf(vehicle_id),
        await accessToken(),
        { driverTemp: driver_temp, passengerTemp: passenger_temp },
        api
      );
      return asText({ result });
    }
  );

  server.tool(
    "enable_valet_mode",
    "Enables valet mode, optionally protected by a 4-digit pin",
    {
      vehicle_id: VehicleIdSchema,
      pin: z.string().optional().describe("4-digit pin, 0000-9999"),
    },
    async ({ vehicle_id, pin }) => {
      const result = await enableValetMode(vehicleOf(vehicle_id), await accessToken(), pin, api);
      return asText({ result });
    }
  );

  server.tool(
    "disable_valet_mode",
    "Disables valet mode",
    {
      vehicle_id: VehicleIdSchema,
      pin: z.string().optional().describe("4-digit pin, 0000-9999"),
    },
    async ({ vehicle_id, pin }) => {
      const result = await disableValetMode(vehicleOf(vehicle_id), await accessToken(), pin, api);
      return asText({ result });
    }
  );

  server.tool(
    "remote_start",
    "Enables keyless driving. Requires the account password.",
    {
      vehicle_id: VehicleIdSchema,
      password: z.string().describe("Account password (not the API token)"),
    },
    async ({ vehicle_id, password }) => {
      const result = await remoteStart(vehicleOf(vehicle_id), await accessToken(), password, api);
      return asText({ result });
    }
  );

  return server;
}
