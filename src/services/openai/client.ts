import OpenAI from "openai";
import type { Config } from "../../config.js";

/**
 * Build an OpenAI client from the process configuration.
 * Retries and timeouts are left to the SDK defaults.
 */
export function createClient(config: Config): OpenAI {
  return new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
  });
}

/**
 * Purpose used for every uploaded file
 */
export const FILE_PURPOSE = "assistants";

/**
 * Extra output requested on RAG responses so retrieved chunks come back
 */
export const FILE_SEARCH_RESULTS_INCLUDE = "file_search_call.results";
