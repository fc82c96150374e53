import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { usageError } from "./errors.js";
import type { Logger } from "./logging.js";
import type { Credentials } from "./transport/types.js";

export const ENV_FILE = ".env";

const optionalSetting = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const baseUrlSetting = optionalSetting
  .pipe(z.string().url({ message: "must be a URL such as https://your-domain.atlassian.net" }).optional())
  .transform((value) => value?.replace(/\/+$/, ""));

const EnvSchema = z.object({
  JIRA_BASE_URL: baseUrlSetting,
  JIRA_EMAIL: optionalSetting,
  JIRA_API_TOKEN: optionalSetting,
  JIRA_TEST_MODE: optionalSetting.transform((value) => value === "true"),
});

export interface Config {
  readonly credentials: Readonly<Credentials>;
  readonly testMode: boolean;
}

export type Environment = Record<string, string | undefined>;

/**
 * Builds the configuration once from an environment map. Nothing else in the
 * tool reads process.env. A malformed setting is a UsageError.
 */
export function parseConfig(env: Environment, overrides: { testMode?: boolean } = {}): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const name = String(issue?.path[0] ?? "environment");
    throw usageError(`${name} ${issue?.message ?? "is invalid"} (got '${env[name]?.trim() ?? ""}')`);
  }

  const { JIRA_BASE_URL, JIRA_EMAIL, JIRA_API_TOKEN, JIRA_TEST_MODE } = parsed.data;
  return Object.freeze({
    credentials: Object.freeze({ baseUrl: JIRA_BASE_URL, email: JIRA_EMAIL, apiToken: JIRA_API_TOKEN }),
    testMode: overrides.testMode === true || JIRA_TEST_MODE,
  });
}

/** Names of the environment variables still needed by the live transport. */
export function missingCredentials({ baseUrl, email, apiToken }: Credentials): string[] {
  const required: Array<[string, string | undefined]> = [
    ["JIRA_BASE_URL", baseUrl],
    ["JIRA_EMAIL", email],
    ["JIRA_API_TOKEN", apiToken],
  ];
  return required.filter(([, value]) => !value).map(([name]) => name);
}

export interface LoadConfigOptions {
  env?: Environment;
  cwd?: string;
  testMode?: boolean;
}

/**
 * Merges .env from the working directory under the given environment
 * (variables already set win) and parses the result. process.env itself is
 * left untouched.
 */
export function loadConfig(logger: Logger, options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const envPath = join(options.cwd ?? process.cwd(), ENV_FILE);

  if (!existsSync(envPath)) {
    logger.info("No .env file found, using environment variables");
    return parseConfig(env, options);
  }

  logger.info(`Loading environment variables from ${ENV_FILE}`);
  let fileEnv: Environment = {};
  try {
    fileEnv = dotenv.parse(readFileSync(envPath));
  } catch (error) {
    logger.warn(`Could not read ${ENV_FILE}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig({ ...fileEnv, ...definedOnly(env) }, options);
}

function definedOnly(env: Environment): Environment {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined));
}
