/**
 * Short, human-readable labels for server URLs
 */

const FALLBACK_LENGTH = 20;
const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1"]);
const PRIVATE_PREFIXES = ["192.168.", "10."];

/**
 * Derive a display name from a server URL.
 *
 * - `http://localhost:3000/` and `http://127.0.0.1:3000` -> `localhost:3000`
 * - `http://192.168.1.10:8080` -> `192.168.1.10:8080`
 * - `https://chat.example.com/app` -> `example.com`
 *
 * Input without a host falls back to its first 20 characters.
 */
export function deriveDisplayName(url: string): string {
  const clean = url
    .trim()
    .replace(/^https?:\/\//, "")
    .replace(/\/$/, "");

  const hostPart = clean.split("/")[0] ?? "";
  if (!hostPart) {
    return url.slice(0, FALLBACK_LENGTH);
  }

  const colon = hostPart.indexOf(":");
  const host = colon === -1 ? hostPart : hostPart.slice(0, colon);
  const port = colon === -1 ? "" : hostPart.slice(colon);

  if (LOOPBACK_HOSTS.has(host.toLowerCase())) {
    return `localhost${port}`;
  }
  if (PRIVATE_PREFIXES.some((prefix) => hostPart.startsWith(prefix))) {
    return hostPart;
  }

  const labels = hostPart.split(".");
  if (labels.length >= 2) {
    return labels.slice(-2).join(".");
  }
  return hostPart;
}
