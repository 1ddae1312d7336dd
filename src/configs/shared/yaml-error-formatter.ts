import type { YamlParseErrorDetail } from "../../utils/yaml-reader.js";

/**
 * Formats the detail portion of a YAML parse error, for error classes that
 * add their own context prefix.
 *
 * - With location: `(line X, column Y): message`
 * - Without location: `message`
 */
export function formatYamlErrorDetail(detail: YamlParseErrorDetail): string {
  const message = detail.reason ?? detail.message ?? "unknown error";
  const hasLocation =
    typeof detail.line === "number" && typeof detail.column === "number";

  if (hasLocation) {
    return `(line ${detail.line}, column ${detail.column}): ${message}`;
  }

  return message;
}
