// src/config/env.ts
// Purpose: Parse process environment once into a typed, validated AppConfig.

import { z } from "zod";

export const DEFAULT_CLIENT_SCRIPTS = [
  "https://ajax.googleapis.com/ajax/libs/angularjs/1.8.2/angular.min.js",
  "https://ajax.googleapis.com/ajax/libs/angularjs/1.8.2/angular-route.min.js",
  "https://ajax.googleapis.com/ajax/libs/angularjs/1.8.2/angular-resource.min.js",
] as const;

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DATABASE_PATH: z.string().trim().min(1).default("data/programmers.sqlite"),
  CORS_ORIGIN: z.string().trim().min(1).default("http://localhost:3000"),
  LOG_LEVEL: z
    .enum(["DEBUG", "INFO", "WARN", "ERROR", "SILENT"])
    .default("INFO"),
  XSRF_PROTECTION: booleanFlag.default("true"),
  COOKIE_SECURE: booleanFlag.optional(),
  CLIENT_SCRIPTS: z.string().optional(),
  CLIENT_APP_MODULE: z.string().trim().optional(),
});

export type LogLevelSetting = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export type AppConfig = {
  nodeEnv: "development" | "test" | "production";
  port: number;
  databasePath: string;
  corsOrigin: string;
  logLevel: LogLevelSetting;
  xsrfProtection: boolean;
  cookieSecure: boolean;
  clientScripts: string[];
  /** Set only when CLIENT_SCRIPTS includes a script registering this module. */
  clientAppModule?: string;
};

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

function parseScriptList(raw: string | undefined): string[] {
  if (raw === undefined) return [...DEFAULT_CLIENT_SCRIPTS];

  return raw
    .split(",")
    .map((url) => url.trim())
    .filter(Boolean);
}

export function loadConfig(
  source: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`,
      ),
    );
  }

  const env = parsed.data;

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    databasePath: env.DATABASE_PATH,
    corsOrigin: env.CORS_ORIGIN,
    logLevel: env.LOG_LEVEL,
    xsrfProtection: env.XSRF_PROTECTION,
    cookieSecure: env.COOKIE_SECURE ?? env.NODE_ENV === "production",
    clientScripts: parseScriptList(env.CLIENT_SCRIPTS),
    clientAppModule: env.CLIENT_APP_MODULE || undefined,
  };
}

export const config: AppConfig = loadConfig();
