import { basename } from "node:path";

export type LinePatcher = (line: string) => string;

const BITFIELD_PATTERN = /^\s+(?:\/\*.*?\*\/\s*)?:\s*(\d+)\s*([;,])/u;
const INCLUDE_PATTERN = /^#include\s+(?:"(.*)"|<(.*)?>)\s*$/u;
const DEFINE_PATTERN = /^#define\s+(\S+)\s+(\d+)\s*$/u;
const ARRAY_PRODUCT_PATTERN = /\[(\d+)\*(\d+)\]/gu;
const SHIFT_ASSIGNMENT_PATTERN = /=\s*(\d+)<<(\d+)/gu;

export const DISABLED_INCLUDE_MARKER = "//PATCH//" as const;
export const DEFAULT_DROP_MARKERS: readonly string[] = ["__compile_check"];

/**
 * Hands out placeholder member names for anonymous bitfields. One namer is
 * used per file so numbering restarts at zero.
 */
export class BitfieldNamer {
  private counter = 0;

  next(): string {
    const name = `__unused_bitfield_${this.counter}__`;
    this.counter += 1;
    return name;
  }
}

export function createBitfieldPatcher(namer: BitfieldNamer): LinePatcher {
  return (line) => {
    const match = BITFIELD_PATTERN.exec(line);
    if (!match) {
      return line;
    }
    const [, bits, terminator] = match;
    return `${namer.next()}: ${bits}${terminator}`;
  };
}

/** Comments out angle-bracket includes that fall outside `keepPrefix`. */
export function createIncludePatcher(keepPrefix: string): LinePatcher {
  return (line) => {
    const match = INCLUDE_PATTERN.exec(line);
    if (!match) {
      return line;
    }
    const systemHeader = match[2];
    if (systemHeader && !systemHeader.startsWith(keepPrefix)) {
      return `${DISABLED_INCLUDE_MARKER}${line}`;
    }
    return line;
  };
}

export const patchDefine: LinePatcher = (line) => {
  const match = DEFINE_PATTERN.exec(line);
  if (!match) {
    return line;
  }
  return `const int ${match[1]} = ${match[2]};`;
};

export interface DropPatcherOptions {
  markers?: readonly string[];
  prefixes?: readonly string[];
}

/**
 * Prefix of the preload callback prototypes, e.g. `extern int
 * engpreload_on_` for `ENGPreload.h`. The declaration parser cannot take them.
 */
export function preloadCallbackPrefix(preloadHeader: string): string {
  return `extern int ${basename(preloadHeader, ".h").toLowerCase()}_on_`;
}

export function createDropPatcher(options: DropPatcherOptions = {}): LinePatcher {
  const { markers = DEFAULT_DROP_MARKERS, prefixes = [] } = options;
  return (line) => {
    if (markers.some((marker) => line.includes(marker))) {
      return "";
    }
    if (prefixes.some((prefix) => line.startsWith(prefix))) {
      return "";
    }
    return line;
  };
}

/**
 * Evaluates the constant expressions FFI declaration parsers reject:
 * `[a*b]` array sizes and `= a<<b` initializers.
 */
export function foldArithmetic(code: string): string {
  return code
    .replace(ARRAY_PRODUCT_PATTERN, (_match, left: string, right: string) => {
      return `[${(BigInt(left) * BigInt(right)).toString()}]`;
    })
    .replace(
      SHIFT_ASSIGNMENT_PATTERN,
      (_match, value: string, shift: string) => {
        return `= ${(BigInt(value) << BigInt(shift)).toString()}`;
      },
    );
}

export function patchLines(code: string, patcher: LinePatcher): string {
  const hasTrailingNewline = code.endsWith("\n");
  const lines = code.split(/\r?\n/u);
  if (hasTrailingNewline) {
    lines.pop();
  }
  const patched = lines.map((line) => patcher(line)).join("\n");
  return hasTrailingNewline ? `${patched}\n` : patched;
}

export function patchBitfields(code: string): string {
  return patchLines(code, createBitfieldPatcher(new BitfieldNamer()));
}
