import { z } from "zod";

// ---------------------------------------------------------------------------
// Authentication
// ---------------------------------------------------------------------------

export interface Credential {
  email: string;
  password: string;
}

/** OAuth client pair issued for the owner API. Always supplied by configuration. */
export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
    refresh_token: z.string().optional(),
    created_at: z.number().optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

// ---------------------------------------------------------------------------
// Vehicles
// ---------------------------------------------------------------------------

const VehicleIdSchema = z.union([z.number(), z.string()]);

const TokenListSchema = z.array(z.string()).nullish();

// The API returns `tokens` as a list; callers get a comma-joined string.
function joinTokens(tokens: string[] | null | undefined): string | undefined {
  return tokens ? tokens.join(",") : undefined;
}

export const VehicleSummarySchema = z
  .object({
    id: VehicleIdSchema,
    id_s: z.string().optional(),
    vehicle_id: z.number().optional(),
    vin: z.string().optional(),
    display_name: z.string().nullish(),
    state: z.string().optional(),
    tokens: TokenListSchema,
  })
  .passthrough()
  .transform(({ tokens, ...rest }) => ({ ...rest, tokens: joinTokens(tokens) }));

export type VehicleSummary = z.output<typeof VehicleSummarySchema>;

export const STATE_SECTIONS = ["climate_state", "charge_state", "drive_state", "gui_settings", "vehicle_state"] as const;

export type StateSection = (typeof STATE_SECTIONS)[number];

export const StateSectionSchema = z
  .object({
    timestamp: z.number().optional(),
  })
  .passthrough();

export const ClimateStateSchema = StateSectionSchema.extend({
  driver_temp_setting: z.number(),
  passenger_temp_setting: z.number(),
  inside_temp: z.number().nullish(),
  outside_temp: z.number().nullish(),
  is_climate_on: z.boolean().optional(),
}).passthrough();

export type ClimateState = z.infer<typeof ClimateStateSchema>;

export type StateSectionData = z.infer<typeof StateSectionSchema>;

export const VehicleStateSchema = z
  .object({
    id: VehicleIdSchema,
    id_s: z.string().optional(),
    vehicle_id: z.number().optional(),
    vin: z.string().optional(),
    display_name: z.string().nullish(),
    state: z.string().optional(),
    tokens: TokenListSchema,
    climate_state: StateSectionSchema.optional(),
    charge_state: StateSectionSchema.optional(),
    drive_state: StateSectionSchema.optional(),
    gui_settings: StateSectionSchema.optional(),
    vehicle_state: StateSectionSchema.optional(),
  })
  .passthrough()
  .transform(({ tokens, ...rest }) => ({ ...rest, tokens: joinTokens(tokens) }));

export type VehicleState = z.output<typeof VehicleStateSchema>;
