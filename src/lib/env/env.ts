import * as v from "valibot";

import { type Env, envSchema } from "./schema";

/**
 * Validates environment variables.
 *
 * @throws {v.ValiError} When a variable is missing or malformed
 */
export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => v.parse(envSchema, source);

export const formatEnvIssues = (issues: readonly v.BaseIssue<unknown>[]): string[] =>
  issues.map((issue) => `  - ${v.getDotPath(issue) ?? "(root)"}: ${issue.message}`);

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

/**
 * Returns the validated environment, exiting the process when it is invalid.
 */
export const getEnv = (): Env => {
  if (cachedEnv) {
    return cachedEnv;
  }
  try {
    cachedEnv = parseEnv();
    return cachedEnv;
  } catch (error) {
    if (v.isValiError(error)) {
      console.error("Environment variable validation failed:");
      for (const line of formatEnvIssues(error.issues)) {
        console.error(line);
      }
      process.exit(1);
    }
    throw error;
  }
};

export type { Env } from "./schema";
