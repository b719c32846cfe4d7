// Validation utilities for benchmon schemas
// This module compiles JSON Schemas (resolved via resolveJsonModule) with Ajv
import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import configSchema from "../../schemas/config.schema.json";
import statusSchema from "../../schemas/status.schema.json";
import type { ServiceConfig } from "../config";
import type { StatusPayload } from "../types";

const ajv = new Ajv({ strict: false, allErrors: true, allowUnionTypes: true });

// Environment values arrive as strings; coerce them and fill in schema defaults.
const configAjv = new Ajv({ strict: false, allErrors: true, coerceTypes: true, useDefaults: true });

export const validateConfigFn: ValidateFunction<ServiceConfig> = configAjv.compile<ServiceConfig>(configSchema);
const validateStatusFn: ValidateFunction<StatusPayload> = ajv.compile<StatusPayload>(statusSchema);

export type ValidationResult = { valid: boolean; errors?: string[] };

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] | undefined {
  if (!errors || errors.length === 0) return undefined;
  return errors.map((e) => {
    const path = e.instancePath.length ? e.instancePath : "(root)";
    const message = e.message ?? JSON.stringify(e);
    return `${path} ${message}`.trim();
  });
}

/**
 * validateStatusPayload
 * Validate an unknown payload against the status polling contract.
 */
export function validateStatusPayload(data: unknown): ValidationResult {
  const valid = Boolean(validateStatusFn(data));
  return { valid, errors: valid ? undefined : formatErrors(validateStatusFn.errors) };
}
