import { stringify } from "yaml";
import type { OpenApiDocument } from "./OpenApiTypes";

export type OutputFormat = "json" | "yaml";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "yaml"];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Renders a document as indented JSON or as YAML. Shared schema objects are
 * written out in full, never as YAML anchors.
 */
export function serializeOpenApiDocument(
  document: OpenApiDocument,
  format: OutputFormat = "json",
): string {
  if (format === "yaml") {
    return stringify(document, { aliasDuplicateObjects: false });
  }
  return JSON.stringify(document, null, 2);
}
