import { Logger } from "./logger.util";
import type {
  ApiError,
  InputError,
  OutputError,
  SpecificError,
  StructuralError,
} from "@/types";

/**
 * Raised when the export is not well-formed markup at all. Nothing is produced.
 */
export class StructuralParseError extends Error {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, line?: number, column?: number) {
    super(line !== undefined ? `${message} (line ${line}, column ${column ?? 0})` : message);
    this.name = "StructuralParseError";
    this.line = line;
    this.column = column;
  }
}

export class ErrorHandler {
  private static logger: Logger | undefined;

  static initialize(context: string): void {
    this.logger = new Logger({ context });
  }

  static createStructuralError(error: StructuralParseError): StructuralError {
    return {
      success: false,
      error: "Export is not well-formed XML",
      code: "STRUCTURAL_ERROR",
      details: {
        line: error.line,
        column: error.column,
        message: error.message,
      },
    };
  }

  static createInputError(path: string, message: string): InputError {
    return {
      success: false,
      error: `Cannot read input file: ${path}`,
      code: "INPUT_ERROR",
      details: { path, message },
    };
  }

  static createOutputError(path: string, message: string): OutputError {
    return {
      success: false,
      error: `Cannot write output file: ${path}`,
      code: "OUTPUT_ERROR",
      details: { path, message },
    };
  }

  static logError(error: Error | SpecificError, context?: string): void {
    const logger = this.logger ?? new Logger({ context: "ErrorHandler" });
    if (error instanceof Error) {
      logger.error(`Error in ${context || "unknown context"}: ${error.message}`, {
        stack: error.stack,
      });
    } else {
      logger.error(`Error in ${context || "unknown context"}: ${error.error}`, error.details);
    }
  }

  static handleUnexpectedError(error: unknown, context?: string): ApiError {
    const errorMessage =
      error instanceof Error ? error.message : "Unknown error occurred";
    this.logError(error instanceof Error ? error : new Error(String(error)), context);

    return {
      success: false,
      error: "Conversion failed",
      code: "INTERNAL_ERROR",
      details: { originalError: errorMessage },
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
