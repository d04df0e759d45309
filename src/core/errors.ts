/**
 * Device error taxonomy.
 *
 * Every error raised by the device layer extends DeviceError and carries a
 * stable `code`, so tool surfaces can classify failures without string
 * matching.
 */

export type DeviceErrorCode =
  | "NOT_CONNECTED"
  | "NOT_SUPPORTED"
  | "VALIDATION_FAILED"
  | "PROFILE_INVALID"
  | "COMMUNICATION_FAILED"
  | "CONNECTION_FAILED"
  | "DEVICE_NOT_FOUND"
  | "SELECTION_FAILED"
  | "INVALID_FILTER";

export class DeviceError extends Error {
  public readonly code: DeviceErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: DeviceErrorCode,
    options?: { details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DeviceError";
    this.code = code;
    this.details = options?.details;
  }
}

/** Operation attempted before connect() or after disconnect(). */
export class NotConnectedError extends DeviceError {
  constructor(message = "Device not connected") {
    super(message, "NOT_CONNECTED");
    this.name = "NotConnectedError";
  }
}

/** Capability flag is false for the requested operation. */
export class NotSupportedError extends DeviceError {
  constructor(message: string) {
    super(message, "NOT_SUPPORTED");
    this.name = "NotSupportedError";
  }
}

/** Argument outside a device-declared range (preset slot, group, mode). */
export class ValidationError extends DeviceError {
  constructor(
    message: string,
    code: DeviceErrorCode = "VALIDATION_FAILED",
    details?: Record<string, unknown>,
  ) {
    super(message, code, { details });
    this.name = "ValidationError";
  }
}

export type ProfileViolationField = "filterCount" | "pregain" | "type" | "gain" | "freq" | "q";

export interface ProfileViolation {
  field: ProfileViolationField;
  /** Index of the offending filter; absent for profile-level violations. */
  filterIndex?: number;
}

/** Profile violates the target device's capability envelope. */
export class ProfileValidationError extends ValidationError {
  public readonly violation: ProfileViolation;

  constructor(message: string, violation: ProfileViolation) {
    super(message, "PROFILE_INVALID", { ...violation });
    this.name = "ProfileValidationError";
    this.violation = violation;
  }
}

/** Timeout or malformed/short response from the transport. */
export class CommunicationError extends DeviceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "COMMUNICATION_FAILED", { details });
    this.name = "CommunicationError";
  }
}

/** Opening the transport path failed. */
export class ConnectionError extends DeviceError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONNECTION_FAILED", { cause });
    this.name = "ConnectionError";
  }
}

/** Discovery found no matching device. */
export class DeviceNotFoundError extends DeviceError {
  constructor(message = "No DSP devices found. Connect a device and try again.") {
    super(message, "DEVICE_NOT_FOUND");
    this.name = "DeviceNotFoundError";
  }
}

export interface SelectionCandidate {
  id: number;
  product: string;
  handler: string;
}

/** Ambiguous or out-of-range device selection. */
export class DeviceSelectionError extends DeviceError {
  public readonly candidates: readonly SelectionCandidate[];

  constructor(message: string, candidates: readonly SelectionCandidate[]) {
    super(message, "SELECTION_FAILED", { details: { candidates } });
    this.name = "DeviceSelectionError";
    this.candidates = candidates;
  }
}

/** FilterDefinition construction rejected its input. */
export class InvalidFilterError extends DeviceError {
  constructor(message: string) {
    super(message, "INVALID_FILTER");
    this.name = "InvalidFilterError";
  }
}
