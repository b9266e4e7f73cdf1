import { resolve } from "node:path";
import { pathToFileURL } from "node:url";

const URL_SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;

/**
 * Turns a user supplied location into an absolute URL. Anything that does not
 * start with a scheme is treated as a file path relative to the working
 * directory.
 */
export function toSourceLocation(value: string): URL {
  const trimmed = value.trim();
  if (URL_SCHEME.test(trimmed)) {
    return new URL(trimmed);
  }
  return pathToFileURL(resolve(trimmed));
}

export function resolveLocation(reference: string, base: URL): URL {
  return new URL(reference.trim(), base);
}

export function sanitizePathSegment(name: string | undefined): string {
  if (!name || !name.trim()) {
    return "unnamed";
  }
  return name.replace(/[^\p{L}\p{N}_-]/gu, "");
}

/**
 * Base name for generated files: the first path segment of a network
 * location, or the file name of a local one, cut at the first dot.
 */
export function deriveOutputName(location: URL): string {
  const segments = location.pathname.split("/").filter(Boolean);
  const segment =
    location.protocol === "file:" ? segments[segments.length - 1] : segments[0];
  const name = segment ? decodeURIComponent(segment).split(".")[0] : "";
  return name || "schema";
}
