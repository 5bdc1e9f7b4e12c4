import { InvalidArgumentError } from "../errors.js";

/**
 * Metadata attached to a vector store file or a conversation.
 */
export type Attributes = Record<string, string>;

export const MAX_ATTRIBUTES = 16;
export const MAX_KEY_LENGTH = 64;
export const MAX_VALUE_LENGTH = 512;

/**
 * Parse one `key=value` token. The value may itself contain `=`.
 */
export function parseKeyValue(token: string): [string, string] {
  const eq = token.indexOf("=");
  if (eq === -1) {
    throw new InvalidArgumentError(
      `Expected key=value, got '${token}'`
    );
  }

  const key = token.slice(0, eq).trim();
  const value = token.slice(eq + 1).trim();

  if (!key) {
    throw new InvalidArgumentError(`Missing key in '${token}'`);
  }

  return [key, value];
}

/**
 * Accumulator for repeated `--attr key=value` options. Later keys win.
 */
export function collectAttribute(
  token: string,
  previous: Attributes
): Attributes {
  const [key, value] = parseKeyValue(token);
  return { ...previous, [key]: value };
}

/**
 * Check attributes against the remote limits before anything is sent.
 */
export function validateAttributes(attributes: Attributes): Attributes {
  const keys = Object.keys(attributes);

  if (keys.length > MAX_ATTRIBUTES) {
    throw new InvalidArgumentError(
      `At most ${MAX_ATTRIBUTES} attributes are allowed, got ${keys.length}`
    );
  }

  for (const key of keys) {
    if (key.length > MAX_KEY_LENGTH) {
      throw new InvalidArgumentError(
        `Attribute key '${key.slice(0, 20)}...' exceeds ${MAX_KEY_LENGTH} characters`
      );
    }
    if (attributes[key].length > MAX_VALUE_LENGTH) {
      throw new InvalidArgumentError(
        `Attribute '${key}' value exceeds ${MAX_VALUE_LENGTH} characters`
      );
    }
  }

  return attributes;
}
