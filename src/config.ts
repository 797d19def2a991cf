import { z } from "zod";
import { DEFAULT_API_BASE, DEFAULT_AUTH_BASE } from "./http.js";
import type { ClientCredentials, Credential } from "./types.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------
//
//   OWNER_API_BASE               API base URL (default owner-api /api/1)
//   OWNER_AUTH_BASE              OAuth base URL (default owner-api root)
//   OWNER_API_TOKEN              Bearer token to use as-is
//   OWNER_API_EMAIL              \
//   OWNER_API_PASSWORD            | password grant, used when no token is set
//   OWNER_API_CLIENT_ID           |
//   OWNER_API_CLIENT_SECRET      /
//   OWNER_API_DEFAULT_VEHICLE_ID Vehicle id tools fall back to

export type CredentialSource =
  | { kind: "token"; accessToken: string }
  | { kind: "password"; credential: Credential; client: ClientCredentials };

export interface ServerConfig {
  apiBase: string;
  authBase: string;
  credentials: CredentialSource;
  defaultVehicleId?: string;
}

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

const EnvSchema = z.object({
  OWNER_API_BASE: optionalString.pipe(z.string().url().optional()),
  OWNER_AUTH_BASE: optionalString.pipe(z.string().url().optional()),
  OWNER_API_TOKEN: optionalString,
  OWNER_API_EMAIL: optionalString,
  OWNER_API_PASSWORD: z.string().optional(),
  OWNER_API_CLIENT_ID: optionalString,
  OWNER_API_CLIENT_SECRET: optionalString,
  OWNER_API_DEFAULT_VEHICLE_ID: optionalString,
});

/**
 * Reads the server configuration from the environment. Throws when neither a
 * token nor a complete password-grant set of variables is present.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const vars = parsed.data;

  let credentials: CredentialSource;
  if (vars.OWNER_API_TOKEN) {
    credentials = { kind: "token", accessToken: vars.OWNER_API_TOKEN };
  } else if (vars.OWNER_API_EMAIL && vars.OWNER_API_PASSWORD && vars.OWNER_API_CLIENT_ID && vars.OWNER_API_CLIENT_SECRET) {
    credentials = {
      kind: "password",
      credential: { email: vars.OWNER_API_EMAIL, password: vars.OWNER_API_PASSWORD },
      client: { clientId: vars.OWNER_API_CLIENT_ID, clientSecret: vars.OWNER_API_CLIENT_SECRET },
    };
  } else {
    throw new Error(
      "OWNER_API_TOKEN environment variable is required, or all of " +
      "OWNER_API_EMAIL, OWNER_API_PASSWORD, OWNER_API_CLIENT_ID and OWNER_API_CLIENT_SECRET."
    );
  }

  return {
    apiBase: vars.OWNER_API_BASE ?? DEFAULT_API_BASE,
    authBase: vars.OWNER_AUTH_BASE ?? DEFAULT_AUTH_BASE,
    credentials,
    defaultVehicleId: vars.OWNER_API_DEFAULT_VEHICLE_ID,
  };
}
