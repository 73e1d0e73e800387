/**
 * Build configuration loader and validator.
 *
 * Responsible for:
 * - Validating raw configuration against the schema, failing fast
 * - Producing structured, path-qualified error messages
 * - Freezing the result so no stage can alter it mid-build
 */

import type { ZodIssue } from "zod";
import { ConfigError } from "../env.js";
import { BuildConfigSchema, type BuildConfig } from "./schema.js";

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

/**
 * Structured validation error for build configuration.
 */
export class BuildConfigError extends ConfigError {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "BuildConfigError";
    this.issues = issues;
  }

  override format(): string {
    const lines = ["Build configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
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
 * Validate and load build configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen BuildConfig
 * @throws BuildConfigError if validation fails
 */
export function loadBuildConfig(input: unknown): Readonly<BuildConfig> {
  const result = BuildConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new BuildConfigError(
      `Invalid build configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate build configuration without loading.
 */
export function validateBuildConfig(input: unknown): {
  success: boolean;
  config?: BuildConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = BuildConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}
