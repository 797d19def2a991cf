import { z } from "zod";
import { ValidationError } from "./errors.js";

export const ChargeLimitSchema = z.number().int("must be a whole percentage").min(50).max(100);

// Four digits, leading zeros kept, so "0000" through "9999".
export const ValetPinSchema = z.string().regex(/^\d{4}$/, "must be a 4-digit pin between 0000 and 9999");

export const PasswordSchema = z.string().min(1, "is required");

/** Parses `value` or throws a {@link ValidationError} naming `field`. */
export function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, field: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(field, parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return parsed.data;
}

export const CELSIUS_MIN = 15;
export const CELSIUS_MAX = 28;
export const FAHRENHEIT_MIN = 59;
export const FAHRENHEIT_MAX = 82;

/**
 * Normalises a cabin temperature to the Celsius value the API takes.
 *
 * Values up to 28 are Celsius in half-degree steps from 15; anything higher
 * is whole-degree Fahrenheit from 59 to 82, rounded to the nearest Celsius
 * degree. The two bands do not overlap, so the value alone decides the unit.
 */
export function toCelsius(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new ValidationError(field, "must be a number");
  }
  if (value <= CELSIUS_MAX) {
    if (value < CELSIUS_MIN || !Number.isInteger(value * 2)) {
      throw new ValidationError(field, `Celsius values must be in 0.5 steps between ${CELSIUS_MIN} and ${CELSIUS_MAX}`);
    }
    return value;
  }
  if (!Number.isInteger(value) || value < FAHRENHEIT_MIN || value > FAHRENHEIT_MAX) {
    throw new ValidationError(field, `Fahrenheit values must be whole degrees between ${FAHRENHEIT_MIN} and ${FAHRENHEIT_MAX}`);
  }
  return Math.round(((value - 32) * 5) / 9);
}
