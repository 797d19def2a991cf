import fetch, { Response, type RequestInit } from "node-fetch";
import { z } from "zod";
import { TransportError } from "./errors.js";
import { logger } from "./logger.js";

export const DEFAULT_API_BASE = "https://owner-api.teslamotors.com/api/1";
export const DEFAULT_AUTH_BASE = "https://owner-api.teslamotors.com";

/**
 * Anything shaped like node-fetch. Pass your own to add timeouts, agents or
 * an AbortSignal; the library imposes none.
 */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ApiOptions {
  apiBase?: string;
  fetch?: FetchLike;
}

export type RequestBody =
  | { json: Record<string, unknown> }
  | { form: Record<string, string> };

interface OwnerRequestOptions {
  method?: "GET" | "POST";
  url: string;
  token?: string;
  body?: RequestBody;
  fetch?: FetchLike;
}

export function apiBaseOf(options?: ApiOptions): string {
  return (options?.apiBase ?? DEFAULT_API_BASE).replace(/\/+$/, "");
}

/**
 * Sends one request and returns the parsed JSON body. Never retries.
 */
export async function ownerRequest({ method = "GET", url, token, body, fetch: fetchImpl = fetch }: OwnerRequestOptions): Promise<unknown> {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "Accept-Encoding": "gzip,deflate",
  };
  if (token !== undefined) {
    headers.Authorization = `Bearer ${token}`;
  }

  const init: RequestInit = { method, headers };

  if (body && "json" in body) {
    headers["Content-Type"] = "application/json";
    init.body = JSON.stringify(body.json);
  } else if (body) {
    headers["Content-Type"] = "application/x-www-form-urlencoded";
    init.body = new URLSearchParams(body.form).toString();
  }

  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    logger.warn("Request failed before a response arrived", { method, url, error: err });
    throw new TransportError(`${method} ${url} failed: ${detail}`, { cause: err });
  }

  if (!response.ok) {
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Owner API error ${response.status}, body unreadable: ${detail}`, {
        status: response.status,
        cause: err,
      });
    }
    logger.warn("Owner API returned an error status", { method, url, status: response.status });
    throw new TransportError(`Owner API error ${response.status}: ${text}`, {
      status: response.status,
      body: text,
    });
  }

  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Reading the body of ${method} ${url} failed: ${detail}`, {
      status: response.status,
      cause: err,
    });
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new TransportError(`Owner API returned a non-JSON body for ${method} ${url}`, {
      status: response.status,
      body: text,
      cause: err,
    });
  }
}

const EnvelopeSchema = z.object({ response: z.unknown() });

/** The API wraps every payload as `{ "response": ... }`. */
export function unwrapEnvelope(json: unknown): unknown {
  const parsed = EnvelopeSchema.safeParse(json);
  if (!parsed.success || parsed.data.response === undefined) {
    throw new TransportError("Owner API response is missing its \"response\" envelope", {
      body: JSON.stringify(json),
    });
  }
  return parsed.data.response;
}

export async function getEnvelope(path: string, token: string, options?: ApiOptions): Promise<unknown> {
  const json = await ownerRequest({
    url: `${apiBaseOf(options)}${path}`,
    token,
    fetch: options?.fetch,
  });
  return unwrapEnvelope(json);
}

export async function postEnvelope(path: string, token: string, body: RequestBody | undefined, options?: ApiOptions): Promise<unknown> {
  const json = await ownerRequest({
    method: "POST",
    url: `${apiBaseOf(options)}${path}`,
    token,
    body,
    fetch: options?.fetch,
  });
  return unwrapEnvelope(json);
}

/** Turns a zod failure on a response payload into a transport-level error. */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new TransportError(`Unexpected ${what} payload: ${parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"} ${i.message}`).join("; ")}`, {
      body: JSON.stringify(payload),
    });
  }
  return parsed.data;
}
