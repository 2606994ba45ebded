import { OpenAI } from "openai";

import { env } from "../../config/env";

export class ReviewConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReviewConfigurationError";
  }
}

const cachedClients = new Map<string, OpenAI>();

/**
 * Picks the key sent with the upload over the server's configured key and
 * rejects values that cannot be a single API key.
 */
export const resolveReviewApiKey = (
  provided?: string | null,
  fallback: string | undefined = env.OPENAI_API_KEY,
): string => {
  const candidate = (provided ?? "").trim() || (fallback ?? "").trim();
  if (!candidate) {
    throw new ReviewConfigurationError(
      "Review mode: no API key was provided and OPENAI_API_KEY is not configured.",
    );
  }
  if (/\s/.test(candidate)) {
    throw new ReviewConfigurationError(
      "Review mode: API key must be a single line with no spaces or newlines.",
    );
  }
  return candidate;
};

export const getOpenAIClient = (apiKey: string): OpenAI => {
  const cached = cachedClients.get(apiKey);
  if (cached) {
    return cached;
  }

  const client = new OpenAI({
    apiKey,
    maxRetries: 2,
    timeout: 30_000,
  });
  cachedClients.set(apiKey, client);

  return client;
};
