import { describe, expect, it } from "vitest";
import { authenticate, getClimateState, getStateSection, getVehicleState, listVehicles } from "../src/account.js";
import { TransportError, ValidationError } from "../src/errors.js";
import { API_BASE, AUTH_BASE, fakeFetch, ok } from "./helpers.js";

const client = { clientId: "test-client-id", clientSecret: "test-client-secret" };

describe("authenticate", () => {
  it("posts a form-encoded password grant and returns the token response as sent", async () => {
    const tokenResponse = {
      access_token: "test-access",
      token_type: "bearer",
      expires_in: 3888000,
      refresh_token: "test-refresh",
      created_at: 1508766510,
    };
    const { fetch, requests } = fakeFetch({ json: tokenResponse });

    const token = await authenticate({ email: "driver@example.com", password: "test-password" }, client, {
      authBase: AUTH_BASE,
      fetch,
    });

    expect(token).toEqual(tokenResponse);
    expect(requests[0].url).toBe("https://auth.test/oauth/token");
    expect(requests[0].method).toBe("POST");
    expect(requests[0].headers.get("content-type")).toBe("application/x-www-form-urlencoded");
    expect(requests[0].headers.get("authorization")).toBeNull();
    expect(Object.fromEntries(new URLSearchParams(requests[0].body))).toEqual({
      grant_type: "password",
      client_id: "test-client-id",
      client_secret: "test-client-secret",
      email: "driver@example.com",
      password: "test-password",
    });
  });

  it("rejects a response without an access token", async () => {
    const { fetch } = fakeFetch({ json: { token_type: "bearer" } });
    await expect(
      authenticate({ email: "driver@example.com", password: "test-password" }, client, { authBase: AUTH_BASE, fetch })
    ).rejects.toBeInstanceOf(TransportError);
  });

  it("reports bad credentials as a transport error with the status", async () => {
    const { fetch } = fakeFetch({ status: 401, text: '{"error":"invalid_grant"}' });
    await expect(
      authenticate({ email: "driver@example.com", password: "wrong" }, client, { authBase: AUTH_BASE, fetch })
    ).rejects.toMatchObject({ name: "TransportError", status: 401 });
  });

  it("requires an email before sending anything", async () => {
    const { fetch, requests } = fakeFetch();
    await expect(authenticate({ email: "", password: "test-password" }, client, { fetch })).rejects.toBeInstanceOf(ValidationError);
    expect(requests).toHaveLength(0);
  });
});

describe("listVehicles", () => {
  it("unwraps the envelope and joins each token list", async () => {
    const { fetch, requests } = fakeFetch(
      ok([
        { id: 12345, id_s: "12345", vehicle_id: 678, vin: "5YJTEST0000000001", display_name: "Volta", state: "online", tokens: ["aa11", "bb22"], option_codes: "MDLS" },
        { id: 23456, vehicle_id: 789, vin: "5YJTEST0000000002", display_name: null, state: "asleep" },
      ])
    );

    const vehicles = await listVehicles({ access_token: "test-token" }, { apiBase: API_BASE, fetch });

    expect(requests[0].url).toBe("https://api.test/api/1/vehicles/");
    expect(requests[0].method).toBe("GET");
    expect(requests[0].headers.get("authorization")).toBe("Bearer test-token");
    expect(vehicles).toEqual([
      { id: 12345, id_s: "12345", vehicle_id: 678, vin: "5YJTEST0000000001", display_name: "Volta", state: "online", tokens: "aa11,bb22", option_codes: "MDLS" },
      { id: 23456, vehicle_id: 789, vin: "5YJTEST0000000002", display_name: null, state: "asleep", tokens: undefined },
    ]);
  });

  it("rejects a payload that is not a list", async () => {
    const { fetch } = fakeFetch(ok({ id: 1 }));
    await expect(listVehicles("test-token", { apiBase: API_BASE, fetch })).rejects.toBeInstanceOf(TransportError);
  });
});

describe("getVehicleState", () => {
  it("requests every state bundle in one call", async () => {
    const { fetch, requests } = fakeFetch(
      ok({
        id: 12345,
        vehicle_id: 678,
        state: "online",
        tokens: ["aa11"],
        climate_state: { driver_temp_setting: 21, passenger_temp_setting: 21, timestamp: 1508766510148 },
        charge_state: { battery_level: 80, charge_limit_soc: 90, timestamp: 1508766510148 },
      })
    );

    const state = await getVehicleState({ id: 12345 }, "test-token", { apiBase: API_BASE, fetch });

    expect(requests[0].url).toBe(
      "https://api.test/api/1/vehicles/12345/data?vehicle_summary&climate_state&charge_state&drive_state&gui_settings&vehicle_state"
    );
    expect(state.tokens).toBe("aa11");
    expect(state.charge_state).toEqual({ battery_level: 80, charge_limit_soc: 90, timestamp: 1508766510148 });
  });
});

describe("state sections", () => {
  it("reads one section from data_request", async () => {
    const { fetch, requests } = fakeFetch(ok({ latitude: 37.4, longitude: -122.1, timestamp: 1 }));
    const drive = await getStateSection(12345, "test-token", "drive_state", { apiBase: API_BASE, fetch });
    expect(requests[0].url).toBe("https://api.test/api/1/vehicles/12345/data_request/drive_state");
    expect(drive).toEqual({ latitude: 37.4, longitude: -122.1, timestamp: 1 });
  });

  it("requires temperature settings in the climate state", async () => {
    const { fetch } = fakeFetch(ok({ inside_temp: 20 }));
    await expect(getClimateState(12345, "test-token", { apiBase: API_BASE, fetch })).rejects.toBeInstanceOf(TransportError);
  });
});
