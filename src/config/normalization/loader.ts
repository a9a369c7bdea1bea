/**
 * Normalization configuration loader and validator.
 *
 * Responsible for:
 * - Validating configuration against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import type { ZodIssue } from "zod";
import { NormalizationConfigSchema, type NormalizationConfig } from "./schema.js";
import { DEFAULT_NORMALIZATION_CONFIG } from "./defaults.js";

/**
 * Structured validation error for normalization configuration.
 */
export class NormalizationConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "NormalizationConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Normalization configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load normalization configuration.
 *
 * Partial input is merged over DEFAULT_NORMALIZATION_CONFIG one level deep:
 * a `columns` override replaces only the fields it names.
 *
 * @throws NormalizationConfigError if validation fails
 */
export function loadNormalizationConfig(input: unknown = {}): Readonly<NormalizationConfig> {
  const result = NormalizationConfigSchema.safeParse(mergeWithDefaults(input));

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new NormalizationConfigError(
      `Invalid normalization configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate normalization configuration without loading.
 */
export function validateNormalizationConfig(input: unknown): {
  success: boolean;
  config?: NormalizationConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = NormalizationConfigSchema.safeParse(mergeWithDefaults(input));

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function mergeWithDefaults(input: unknown): unknown {
  if (!isPlainObject(input)) {
    return input;
  }
  const override = input["columns"];
  const columns = isPlainObject(override)
    ? { ...DEFAULT_NORMALIZATION_CONFIG.columns, ...override }
    : override ?? DEFAULT_NORMALIZATION_CONFIG.columns;

  return {
    ...DEFAULT_NORMALIZATION_CONFIG,
    ...input,
    columns,
  };
}
