/**
 * Tool argument validation helpers
 * Each helper reads one field from the raw tool arguments and either returns
 * a typed value or throws InvalidRequestError.
 */

import { InvalidRequestError, JsonObject, JsonValue } from "../api/types.js";

export type ToolArguments = Record<string, unknown>;

interface NumberValidationOptions {
  required?: boolean;
  /** Minimum allowed value (inclusive) */
  min?: number;
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function validateString(args: ToolArguments, field: string, required: true): string;
export function validateString(args: ToolArguments, field: string, required?: boolean): string | undefined;
export function validateString(
  args: ToolArguments,
  field: string,
  required: boolean = true
): string | undefined {
  const value = args[field];
  if (value === undefined || value === null) {
    if (required) {
      throw new InvalidRequestError(`Missing required parameter: ${field}`);
    }
    return undefined;
  }
  if (typeof value !== "string") {
    throw new InvalidRequestError(
      `Invalid parameter '${field}': expected a string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * A string that must contain something other than whitespace, e.g. an ID
 * that ends up in a URL path.
 */
export function validateNonEmptyString(args: ToolArguments, field: string): string {
  const value = validateString(args, field, true);
  if (!value.trim()) {
    throw new InvalidRequestError(`Invalid parameter '${field}': must not be empty`);
  }
  return value;
}

export function validateNumber(args: ToolArguments, field: string, options: NumberValidationOptions & { required: true }): number;
export function validateNumber(args: ToolArguments, field: string, options?: NumberValidationOptions): number | undefined;
export function validateNumber(
  args: ToolArguments,
  field: string,
  options: NumberValidationOptions = {}
): number | undefined {
  const required = options.required ?? true;
  const value = args[field];
  if (value === undefined || value === null) {
    if (required) {
      throw new InvalidRequestError(`Missing required parameter: ${field}`);
    }
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidRequestError(
      `Invalid parameter '${field}': expected a number, got ${typeof value}`
    );
  }
  if (options.min !== undefined && value < options.min) {
    throw new InvalidRequestError(
      `Invalid parameter '${field}': must be >= ${options.min}, got ${value}`
    );
  }
  return value;
}

/**
 * A JSON object whose shape is owned by someone else (e.g. agent input data).
 */
export function validateJsonObject(args: ToolArguments, field: string): JsonObject {
  const value = args[field];
  if (value === undefined || value === null) {
    throw new InvalidRequestError(`Missing required parameter: ${field}`);
  }
  if (!isPlainObject(value)) {
    const actual = Array.isArray(value) ? "array" : typeof value;
    throw new InvalidRequestError(
      `Invalid parameter '${field}': expected an object, got ${actual}`
    );
  }
  const result: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isJsonValue(entry)) {
      throw new InvalidRequestError(
        `Invalid parameter '${field}': value at '${key}' is not JSON-serializable`
      );
    }
    result[key] = entry;
  }
  return result;
}
