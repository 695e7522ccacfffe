/**
 * Error taxonomy
 * Only ScanError is fatal; everything else is caught per file (or, for the
 * registry, degraded to an empty registry).
 */

export class Any2mdError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "Any2mdError";
  }
}

export class ScanError extends Any2mdError {
  constructor(
    readonly directory: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot scan '${directory}': ${message}`, options);
    this.name = "ScanError";
  }
}

export class FingerprintError extends Any2mdError {
  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot fingerprint '${path}': ${message}`, options);
    this.name = "FingerprintError";
  }
}

export class ConversionError extends Any2mdError {
  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot convert '${path}': ${message}`, options);
    this.name = "ConversionError";
  }
}

export class WriteError extends Any2mdError {
  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot write '${path}': ${message}`, options);
    this.name = "WriteError";
  }
}

export class RegistryCorruptError extends Any2mdError {
  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Registry '${path}' is unreadable: ${message}`, options);
    this.name = "RegistryCorruptError";
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
