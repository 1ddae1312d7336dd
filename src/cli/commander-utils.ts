import type { CommanderError } from "commander";

export const COMMANDER_SELF_RENDERED_CODES: ReadonlySet<string> = new Set([
  "commander.error",
  "commander.excessArguments",
  "commander.help",
  "commander.helpDisplayed",
  "commander.invalidArgument",
  "commander.missingArgument",
  "commander.missingMandatoryOptionValue",
  "commander.optionMissingArgument",
  "commander.unknownOption",
  "commander.version",
]);

export function commanderAlreadyRendered(error: CommanderError): boolean {
  if (!error.code) {
    return false;
  }

  if (COMMANDER_SELF_RENDERED_CODES.has(error.code)) {
    return true;
  }

  return (
    error.code.startsWith("commander.") && error.message.startsWith("error:")
  );
}

/**
 * Collects a repeatable option into an array.
 */
export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
