import { ValidationError } from "@banking-agent/shared";

export type Fields = Record<string, unknown>;

export function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge query-string and body parameters; body values win. Some feedback
 * endpoints accept either form.
 */
export function collectFields(query: unknown, body: unknown): Fields {
  return { ...(isRecord(query) ? query : {}), ...(isRecord(body) ? body : {}) };
}

export function requireBody(body: unknown): Fields {
  if (!isRecord(body)) {
    throw new ValidationError("Request body must be a JSON object", "INVALID_BODY");
  }
  return body;
}

export function requireString(fields: Fields, name: string): string {
  const value = fields[name];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Missing required parameter: ${name}`);
  }
  return value.trim();
}

export function optionalString(fields: Fields, name: string): string | undefined {
  const value = fields[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ValidationError(`Invalid '${name}' parameter: must be a string`);
  }
  return value.trim() === "" ? undefined : value.trim();
}

export function optionalBoolean(fields: Fields, name: string): boolean | undefined {
  const value = fields[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  throw new ValidationError(`Invalid '${name}' parameter: must be true or false`);
}

export function requireBoolean(fields: Fields, name: string): boolean {
  const value = optionalBoolean(fields, name);
  if (value === undefined) throw new ValidationError(`Missing required parameter: ${name}`);
  return value;
}

export function requireNumber(fields: Fields, name: string): number {
  const value = fields[name];
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number.parseFloat(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`Invalid '${name}' parameter: must be a number`);
  }
  return parsed;
}
