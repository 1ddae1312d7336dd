import { load } from "js-yaml";

import { toErrorMessage } from "./errors.js";
import { isYamlException } from "./yaml.js";

export interface YamlParseErrorDetail {
  reason?: string;
  message?: string;
  line?: number;
  column?: number;
  error: unknown;
  isYamlError: boolean;
}

export interface ParseYamlDocumentOptions<TError extends Error> {
  formatError: (detail: YamlParseErrorDetail) => TError;
}

export function parseYamlDocument<TError extends Error>(
  content: string,
  options: ParseYamlDocumentOptions<TError>,
): unknown {
  const { formatError } = options;
  const source = content.trim();

  if (source.length === 0) {
    return {};
  }

  try {
    const document = load(source, { json: false });
    return document ?? {};
  } catch (error) {
    throw formatError(buildYamlParseErrorDetail(error));
  }
}

function buildYamlParseErrorDetail(error: unknown): YamlParseErrorDetail {
  if (isYamlException(error)) {
    const { reason, message, mark } = error;
    return {
      reason: reason ?? undefined,
      message: message ?? undefined,
      line:
        typeof mark?.line === "number" && Number.isFinite(mark.line)
          ? mark.line + 1
          : undefined,
      column:
        typeof mark?.column === "number" && Number.isFinite(mark.column)
          ? mark.column + 1
          : undefined,
      error,
      isYamlError: true,
    };
  }

  return {
    message: toErrorMessage(error),
    error,
    isYamlError: false,
  };
}
