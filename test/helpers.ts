import { Headers, Response, type RequestInit } from "node-fetch";
import type { FetchLike } from "../src/http.js";

export const API_BASE = "https://api.test/api/1";
export const AUTH_BASE = "https://auth.test";

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
}

export type Reply = { status?: number; json?: unknown; text?: string } | Error;

/** Answers each request with the next reply in order and records what was sent. */
export function fakeFetch(...replies: Reply[]) {
  const requests: RecordedRequest[] = [];
  const queue = [...replies];

  const fetch: FetchLike = async (url: string, init?: RequestInit) => {
    requests.push({
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    });
    const reply = queue.shift();
    if (reply === undefined) {
      throw new Error(`unexpected request to ${url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    const text = reply.text ?? JSON.stringify(reply.json);
    return new Response(text, {
      status: reply.status ?? 200,
      headers: { "Content-Type": "application/json" },
    });
  };

  return { fetch, requests };
}

export function ok(payload: unknown): Reply {
  return { json: { response: payload } };
}

export const accepted: Reply = ok({ result: true, reason: "" });
