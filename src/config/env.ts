import { z } from "zod";
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_PORT,
  DEFAULT_REFRESH_INTERVAL_MS,
  DEMO_API_KEY,
} from "../utils/constants";
import { formatIssues } from "../utils/validation";

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => {
    if (typeof v === "string" && v.trim().length === 0) return undefined;
    return v;
  }, schema);

const EnvSchema = z.object({
  PORT: emptyToUndefined(z.coerce.number().int().positive().default(DEFAULT_PORT)),
  ACTUAL_HTTP_API_URL: emptyToUndefined(z.string().url().default(DEFAULT_API_BASE_URL)),
  ACTUAL_HTTP_API_KEY: emptyToUndefined(z.string().min(1).default(DEMO_API_KEY)),
  REFRESH_INTERVAL_MS: emptyToUndefined(
    z.coerce.number().int().positive().default(DEFAULT_REFRESH_INTERVAL_MS)
  ),
  // JSON object: group name -> account names
  ACCOUNT_GROUPS: emptyToUndefined(z.string().optional()),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${formatIssues(parsed.error).join("; ")}`);
  }
  return parsed.data;
}

export function isUsingDemoCredentials(env: AppEnv): boolean {
  return env.ACTUAL_HTTP_API_KEY === DEMO_API_KEY;
}

export function warnOnDemoCredentials(env: AppEnv): void {
  if (isUsingDemoCredentials(env)) {
    console.warn("[config] Using demo API key. Set ACTUAL_HTTP_API_KEY environment variable.");
  }
}
