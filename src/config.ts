import dotenv from "dotenv";
import { ConfigurationError } from "./errors.js";

// Load environment variables from .env file
dotenv.config();

export const DEFAULT_MODEL = "gpt-4o-mini";

export interface Config {
  openaiApiKey: string;
  openaiBaseUrl?: string;
  model: string;
}

function getEnvVar(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(
      `Missing required environment variable: ${name}`
    );
  }
  return value;
}

function getOptionalEnvVar(
  env: NodeJS.ProcessEnv,
  name: string
): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Build the process configuration from environment variables.
 * Throws ConfigurationError when the API key is missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    openaiApiKey: getEnvVar(env, "OPENAI_API_KEY"),
    openaiBaseUrl: getOptionalEnvVar(env, "OPENAI_BASE_URL"),
    model: getOptionalEnvVar(env, "VSTORE_MODEL") ?? DEFAULT_MODEL,
  };
}

export default loadConfig;
