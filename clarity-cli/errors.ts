/**
 * Base error class for all Clarity errors
 */
export class ClarityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClarityError";
    Object.setPrototypeOf(this, ClarityError.prototype);
  }
}

/**
 * Thrown when enumeration returns no device at the requested index
 */
export class DeviceNotFoundError extends ClarityError {
  constructor(message: string = "Device not found") {
    super(message);
    this.name = "DeviceNotFoundError";
    Object.setPrototypeOf(this, DeviceNotFoundError.prototype);
  }
}

/**
 * Base class for I/O failures on the HID handle. The session stays open.
 */
export class TransportError extends ClarityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export class TransportWriteError extends TransportError {
  constructor(message: string = "Write failed", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportWriteError";
    Object.setPrototypeOf(this, TransportWriteError.prototype);
  }
}

export class TransportReadError extends TransportError {
  constructor(message: string = "Read failed", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportReadError";
    Object.setPrototypeOf(this, TransportReadError.prototype);
  }
}

/**
 * Thrown when no response arrives within the read bound
 */
export class TransportTimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No response within ${timeoutMs} ms`);
    this.name = "TransportTimeoutError";
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, TransportTimeoutError.prototype);
  }
}

export interface MalformedResponseDetails {
  /** Bytes the field needs */
  expected?: number;
  /** Bytes the device returned */
  actual?: number;
  /** Offending byte value */
  byte?: number;
  /** Offset of the offending byte in the response */
  offset?: number;
}

/**
 * Thrown when a response is too short for the field being decoded
 * (expected/actual set), or carries a value the field cannot hold (byte/offset set)
 */
export class MalformedResponseError extends ClarityError {
  readonly expected?: number;
  readonly actual?: number;
  readonly byte?: number;
  readonly offset?: number;

  constructor(message: string, details: MalformedResponseDetails = {}) {
    super(message);
    this.name = "MalformedResponseError";
    this.expected = details.expected;
    this.actual = details.actual;
    this.byte = details.byte;
    this.offset = details.offset;
    Object.setPrototypeOf(this, MalformedResponseError.prototype);
  }
}

export class SessionClosedError extends ClarityError {
  constructor(message: string = "Session is closed") {
    super(message);
    this.name = "SessionClosedError";
    Object.setPrototypeOf(this, SessionClosedError.prototype);
  }
}
