import dotenv from "dotenv";
import { isValidDatabaseName } from "./database/validation";
import { ConfigError } from "./errors";

export interface ServiceConfig {
  mongodbUri: string;
  databaseName: string;
  port: number;
  syncOnBoot: boolean;
}

const DEFAULT_PORT = 8000;

function required(env: NodeJS.ProcessEnv, variable: string): string {
  const value = env[variable]?.trim();
  if (!value) {
    throw new ConfigError(variable, `${variable} environment variable is required`);
  }
  return value;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_PORT;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError("PORT", `PORT must be an integer between 1 and 65535, got '${raw}'`);
  }
  return port;
}

function parseBoolean(variable: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  switch (raw.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new ConfigError(variable, `${variable} must be true or false, got '${raw}'`);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const databaseName = required(env, "MONGODB_DATABASE");
  if (!isValidDatabaseName(databaseName)) {
    throw new ConfigError(
      "MONGODB_DATABASE",
      `MONGODB_DATABASE '${databaseName}' is not a valid database name`
    );
  }

  return {
    mongodbUri: required(env, "MONGODB_URI"),
    databaseName,
    port: parsePort(env.PORT),
    syncOnBoot: parseBoolean("SYNC_ON_BOOT", env.SYNC_ON_BOOT, true),
  };
}

// Reads .env (if present) into process.env first
export function loadConfigFromEnvironment(): ServiceConfig {
  dotenv.config();
  return loadConfig(process.env);
}
