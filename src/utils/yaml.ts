import type { YAMLException } from "js-yaml";

export function isYamlException(error: unknown): error is YAMLException {
  return (
    Boolean(error) &&
    typeof error === "object" &&
    "name" in (error as Record<string, unknown>) &&
    (error as YAMLException).name === "YAMLException"
  );
}
