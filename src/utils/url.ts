/**
 * Server URL validation and normalization
 *
 * Raw user input becomes an absolute http(s) URL or a typed failure.
 * Nothing here throws.
 */

export type ValidationErrorCode = "EmptyInput" | "InvalidFormat" | "UnsupportedScheme";

export interface ValidationError {
  code: ValidationErrorCode;
  /** User-displayable as-is */
  message: string;
}

export type ValidationResult =
  | { success: true; url: string }
  | { success: false; error: ValidationError };

const ERROR_MESSAGES: Record<ValidationErrorCode, string> = {
  EmptyInput: "Please enter a server URL",
  InvalidFormat: "Please enter a valid URL",
  UnsupportedScheme: "URL must use http or https protocol",
};

const EXPLICIT_SCHEME = /^([a-z][a-z0-9+.-]*):\/\//i;
const DOTTED_QUAD = /^\d+\.\d+\.\d+\.\d+(?:[:/?#]|$)/;
const LOOPBACK = /^(?:localhost|127\.0\.0\.1)(?:[:/?#]|$)/i;

function fail(code: ValidationErrorCode): ValidationResult {
  return { success: false, error: { code, message: ERROR_MESSAGES[code] } };
}

/**
 * Add a scheme when the input has none. Loopback and IPv4 hosts get http,
 * everything else https.
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();

  if (trimmed.startsWith("http://") || trimmed.startsWith("https://")) {
    return trimmed;
  }
  if (LOOPBACK.test(trimmed) || DOTTED_QUAD.test(trimmed)) {
    return `http://${trimmed}`;
  }
  return `https://${trimmed}`;
}

/**
 * Validate user input as a server URL.
 * On success `url` is the normalized string (not re-serialized by the parser).
 */
export function validateUrl(raw: string): ValidationResult {
  const trimmed = raw.trim();
  if (!trimmed) {
    return fail("EmptyInput");
  }

  const scheme = EXPLICIT_SCHEME.exec(trimmed)?.[1]?.toLowerCase();
  if (scheme !== undefined && scheme !== "http" && scheme !== "https") {
    return fail("UnsupportedScheme");
  }

  const normalized = scheme === undefined ? normalizeUrl(trimmed) : trimmed;

  let parsed: URL;
  try {
    parsed = new URL(normalized);
  } catch {
    return fail("InvalidFormat");
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return fail("UnsupportedScheme");
  }
  if (!parsed.hostname) {
    return fail("InvalidFormat");
  }

  return { success: true, url: normalized };
}
