import { z } from "zod";
import { CommandRejectedError } from "./errors.js";
import { type ApiOptions, parsePayload, postEnvelope } from "./http.js";
import { logger, redact } from "./logger.js";
import { accessTokenOf, vehicleIdOf, vehiclePath, type TokenInput, type VehicleRef } from "./refs.js";

export type CommandBody = Record<string, unknown>;

const CommandResultSchema = z
  .object({
    result: z.unknown(),
    reason: z.string().nullish(),
  })
  .passthrough();

export function commandPath(ref: VehicleRef, commandName: string): string {
  return `${vehiclePath(ref)}/command/${commandName}`;
}

/**
 * Sends `commandName` to the vehicle and resolves `true` once the API reports
 * `result: true`. Any other result rejects with {@link CommandRejectedError}
 * carrying the API's `reason`; transport failures reject with `TransportError`.
 */
export async function executeCommand(
  ref: VehicleRef,
  token: TokenInput,
  commandName: string,
  body?: CommandBody,
  options?: ApiOptions
): Promise<true> {
  const path = commandPath(ref, commandName);
  logger.debug("Sending vehicle command", {
    vehicleId: vehicleIdOf(ref),
    command: commandName,
    body: body === undefined ? undefined : redact(body),
  });

  const payload = await postEnvelope(path, accessTokenOf(token), body === undefined ? undefined : { json: body }, options);
  const outcome = parsePayload(CommandResultSchema, payload, commandName);

  if (outcome.result === true) {
    return true;
  }

  const reason = outcome.reason || "unknown";
  logger.info("Vehicle command rejected", { vehicleId: vehicleIdOf(ref), command: commandName, reason });
  throw new CommandRejectedError(commandName, reason);
}
