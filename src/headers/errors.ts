import { HintedError, type HintedErrorOptions } from "../utils/errors.js";

export class HeaderPreparationError extends HintedError {
  constructor(message: string, options: HintedErrorOptions = {}) {
    super(message, options);
    this.name = "HeaderPreparationError";
  }
}

export class HeaderSourceMissingError extends HeaderPreparationError {
  constructor(public readonly sourcePath: string) {
    super(`Header source not found: ${sourcePath}`, {
      hintLines: [
        "Install the instrumentation engine's development headers or pass --include-dir.",
      ],
    });
    this.name = "HeaderSourceMissingError";
  }
}

export class OutputOverlapsSourceError extends HeaderPreparationError {
  constructor(
    public readonly outDir: string,
    public readonly includeDir: string,
  ) {
    super(`Output directory ${outDir} contains the header sources.`, {
      detailLines: [`Include directory: ${includeDir}`],
      hintLines: ["Pass an --out directory outside the include directory."],
    });
    this.name = "OutputOverlapsSourceError";
  }
}

export class PreprocessorError extends HeaderPreparationError {
  constructor(
    public readonly compiler: string,
    public readonly exitCode: number,
    stderr: string,
    public readonly signal: NodeJS.Signals | null = null,
  ) {
    const detailLines = stderr
      .split("\n")
      .map((line) => line.trimEnd())
      .filter((line) => line.length > 0);
    super(
      signal
        ? `Preprocessor "${compiler}" was terminated by ${signal}.`
        : `Preprocessor "${compiler}" exited with code ${exitCode}.`,
      { detailLines },
    );
    this.name = "PreprocessorError";
  }
}
