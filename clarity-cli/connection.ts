/**
 * Clarity device session: one HID handle, one transaction at a time.
 */

import {
  DeviceNotFoundError,
  SessionClosedError,
  TransportReadError,
  TransportTimeoutError,
  TransportWriteError,
} from "./errors.js";
import { DEFAULT_TIMEOUT_MS, PRODUCT_ID, VENDOR_ID, getErrorMessage, hexDump } from "./lib.js";
import {
  Command,
  RunState,
  RECORD_LENGTH,
  encodeFrame,
  decodeStatusByte,
  decodeSerial,
  decodeFullStatus,
  decodeVersionTriple,
  type CalibrationLED,
  type DiskSlot,
  type FilterSlot,
  type FirmwareVersion,
  type FullStatus,
  type TransactOptions,
} from "./protocol/index.js";
import { nodeHidProvider, type HidHandle, type HidProvider } from "./transport.js";

const TIMED_OUT = Symbol("timed out");

export interface SessionOptions {
  /** Index into the enumerated devices */
  index?: number;
  /** Frame and response length */
  recordLength?: number;
  /** Read bound for each transaction */
  timeoutMs?: number;
  /** Dump every frame to the console */
  debug?: boolean;
  provider?: HidProvider;
}

/**
 * Serializes async work in call order. A failed task does not block the ones queued after it.
 */
export class TransactionLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * Encapsulates HID communication with a Clarity device.
 */
export class ClaritySession {
  private readonly lock = new TransactionLock();
  private readonly recordLength: number;
  private readonly timeoutMs: number;
  private readonly debug: boolean;
  private closed = false;
  private closing: Promise<void> | null = null;
  /** Read abandoned at its timeout, still outstanding on the handle */
  private staleRead: Promise<void> | null = null;

  constructor(
    private handle: HidHandle,
    options: Omit<SessionOptions, "index" | "provider"> = {}
  ) {
    this.recordLength = options.recordLength ?? RECORD_LENGTH;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.debug = options.debug ?? false;
  }

  /**
   * Find a Clarity device by index and open it.
   */
  static async open(options: SessionOptions = {}): Promise<ClaritySession> {
    const { index = 0, provider = nodeHidProvider } = options;
    const devices = await provider.enumerate(VENDOR_ID, PRODUCT_ID);

    const device = devices[index];
    if (!device) {
      throw new DeviceNotFoundError(`No Clarity device at index ${index} (found ${devices.length})`);
    }
    if (!device.path) {
      throw new DeviceNotFoundError(`Clarity device at index ${index} has no path`);
    }

    const handle = await provider.open(device.path);
    return new ClaritySession(handle, options);
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Release the handle once any in-flight transaction has finished. Calling again is a no-op.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closed = true;
      this.closing = this.lock.run(async () => {
        await this.drainStaleRead();
        await this.handle.close();
      });
    }
    return this.closing;
  }

  /**
   * Write one frame and read the device's response under the session lock.
   */
  async transact(command: number, options: TransactOptions = {}): Promise<Uint8Array> {
    const { parameter = 0, maxLength = this.recordLength, timeoutMs = this.timeoutMs, signal } = options;

    this.assertOpen();
    signal?.throwIfAborted();
    const frame = encodeFrame(command, parameter, maxLength);

    return this.lock.run(async () => {
      // Closed while queued
      this.assertOpen();
      signal?.throwIfAborted();

      await this.drainStaleRead();
      await this.write(frame);
      return this.read(maxLength, timeoutMs);
    });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SessionClosedError();
    }
  }

  /**
   * Wait for a read that outlived its timeout. Its result belongs to an earlier
   * transaction and is dropped.
   */
  private async drainStaleRead(): Promise<void> {
    const stale = this.staleRead;
    if (!stale) return;
    this.staleRead = null;
    await stale;
  }

  private async write(frame: Buffer): Promise<void> {
    if (this.debug) {
      console.log(`[DEBUG] tx ${hexDump(frame)}`);
    }

    let written: number;
    try {
      written = await this.handle.write(frame);
    } catch (err) {
      throw new TransportWriteError(`Write failed: ${getErrorMessage(err)}`, {
        cause: err,
      });
    }

    if (written < frame.length) {
      throw new TransportWriteError(`Short write: ${written}/${frame.length} bytes`);
    }
  }

  private async read(maxLength: number, timeoutMs: number): Promise<Uint8Array> {
    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timeoutId = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });

    const pending = this.handle.read(maxLength, timeoutMs);
    let response: Uint8Array | undefined | typeof TIMED_OUT;
    try {
      response = await Promise.race([pending, timeout]);
    } catch (err) {
      throw new TransportReadError(`Read failed: ${getErrorMessage(err)}`, {
        cause: err,
      });
    } finally {
      clearTimeout(timeoutId);
    }

    if (response === TIMED_OUT) {
      this.staleRead = pending.then(
        () => undefined,
        () => undefined
      );
      throw new TransportTimeoutError(timeoutMs);
    }
    if (!response || response.length === 0) {
      throw new TransportTimeoutError(timeoutMs);
    }

    if (this.debug) {
      console.log(`[DEBUG] rx ${hexDump(response)}`);
    }
    return response;
  }

  // ===========================================================================
  // Power
  // ===========================================================================

  /** Returns the device's echo byte. */
  async switchOn(): Promise<number> {
    return this.setValue(Command.SETONOFF, RunState.RUN);
  }

  /** Returns the device's echo byte. */
  async switchOff(): Promise<number> {
    return this.setValue(Command.SETONOFF, RunState.SLEEP);
  }

  async getOnOff(): Promise<number> {
    return this.getValue(Command.GETONOFF);
  }

  // ===========================================================================
  // Disk, filter and calibration LED
  // ===========================================================================

  /**
   * Start moving the disk slide. The slide may still be moving when this resolves;
   * poll getDiskPosition until it leaves DiskPosition.MOVING.
   */
  async setDiskPosition(position: DiskSlot): Promise<number> {
    return this.setValue(Command.SETDISK, position);
  }

  async getDiskPosition(): Promise<number> {
    return this.getValue(Command.GETDISK);
  }

  /**
   * Start moving the filter turret. Same caveat as setDiskPosition.
   */
  async setFilterPosition(position: FilterSlot): Promise<number> {
    return this.setValue(Command.SETFILT, position);
  }

  async getFilterPosition(): Promise<number> {
    return this.getValue(Command.GETFILT);
  }

  async setCalibrationLED(state: CalibrationLED): Promise<number> {
    return this.setValue(Command.SETCAL, state);
  }

  async getCalibrationLED(): Promise<number> {
    return this.getValue(Command.GETCAL);
  }

  /** Open/closed state of the filter turret door. */
  async getDoor(): Promise<number> {
    return this.getValue(Command.GETDOOR);
  }

  // ===========================================================================
  // Identity and status
  // ===========================================================================

  async getSerialNumber(): Promise<number> {
    return decodeSerial(await this.transact(Command.GETSERIAL));
  }

  async getFullStat(): Promise<FullStatus> {
    return decodeFullStatus(await this.transact(Command.FULLSTAT));
  }

  async getVersion(): Promise<FirmwareVersion> {
    return decodeVersionTriple(await this.transact(Command.GETVERSION));
  }

  private async getValue(command: number): Promise<number> {
    return decodeStatusByte(await this.transact(command));
  }

  private async setValue(command: number, parameter: number): Promise<number> {
    return decodeStatusByte(await this.transact(command, { parameter }));
  }
}

/**
 * Open a session, run fn, and close the session on every exit path.
 */
export async function withSession<T>(
  options: SessionOptions,
  fn: (session: ClaritySession) => Promise<T>
): Promise<T> {
  const session = await ClaritySession.open(options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
