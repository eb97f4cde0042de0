/**
 * Error Handler Utilities
 *
 * The encoders never fail; the only failure domain is the device boundary
 * (enumeration, connect, write), reported as a single PrinterError kind.
 */

export enum PrinterErrorCode {
  CONNECTION_FAILED = 'CONNECTION_FAILED',
}

export interface PrinterErrorOptions {
  code?: PrinterErrorCode;
  cause?: unknown;
  recoverable?: boolean;
}

/**
 * Connection or transport failure at the device boundary.
 * Carries a human-readable message and the underlying cause.
 */
export class PrinterError extends Error {
  readonly code: PrinterErrorCode;
  readonly recoverable: boolean;
  readonly timestamp: string;

  constructor(message: string, options: PrinterErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'PrinterError';
    this.code = options.code ?? PrinterErrorCode.CONNECTION_FAILED;
    this.recoverable = options.recoverable ?? true;
    this.timestamp = new Date().toISOString();
  }

  toString(): string {
    return `PrinterError: ${this.message}`;
  }
}

export class ErrorFactory {
  static connection(message: string, cause?: unknown): PrinterError {
    return new PrinterError(message, {
      code: PrinterErrorCode.CONNECTION_FAILED,
      cause,
      recoverable: true,
    });
  }

  /**
   * Wrap an arbitrary thrown value, prefixing the operation that failed.
   * PrinterErrors pass through unchanged.
   */
  static wrap(operation: string, error: unknown): PrinterError {
    if (isPrinterError(error)) {
      return error;
    }
    return this.connection(`${operation}: ${getErrorMessage(error)}`, error);
  }
}

export function isPrinterError(error: unknown): error is PrinterError {
  return error instanceof PrinterError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
