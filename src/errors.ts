export const EXIT_OK = 0;
export const EXIT_CONFIG = 2;
export const EXIT_FATAL = 3;

export class ScanError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

// Bad flags, missing inputs or an unusable keyword file. Raised before any PDF is opened.
export class ConfigError extends ScanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, EXIT_CONFIG, options);
  }
}

// Recorded on the file's report entry; never ends the run.
export class UnreadableFileError extends ScanError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, EXIT_FATAL, options);
    this.filePath = filePath;
  }
}

export class OutputWriteError extends ScanError {
  readonly outputPath: string;

  constructor(outputPath: string, options?: { cause?: unknown }) {
    super(
      `Cannot write output to ${outputPath}: ${describeError(options?.cause)}`,
      EXIT_FATAL,
      options
    );
    this.outputPath = outputPath;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "unknown error";
};
