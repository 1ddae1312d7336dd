import {
  formatAlertMessage,
  formatCliOutput,
} from "../utils/output.js";

export interface CommandOutputPayload {
  readonly body?: string | readonly string[];
  readonly warnings?: readonly string[];
  readonly stderr?: string | readonly string[];
  readonly exitCode?: number;
}

export function writeCommandOutput(payload: CommandOutputPayload): void {
  for (const warning of payload.warnings ?? []) {
    process.stderr.write(
      `${formatAlertMessage("Warning", "yellow", warning)}\n`,
    );
  }

  const stderr = normalizeToArray(payload.stderr);
  for (const entry of stderr) {
    process.stderr.write(entry);
  }

  const body = payload.body;
  if (body !== undefined) {
    const normalizedBody = typeof body === "string" ? body : body.join("\n");
    if (normalizedBody.trim().length > 0) {
      process.stdout.write(formatCliOutput(normalizedBody));
    }
  }

  if (typeof payload.exitCode === "number") {
    process.exitCode = payload.exitCode;
  }
}

function normalizeToArray(
  value: string | readonly string[] | undefined,
): readonly string[] {
  if (value === undefined) {
    return [] as const;
  }
  if (typeof value === "string") {
    return [value] as const;
  }
  return value;
}
