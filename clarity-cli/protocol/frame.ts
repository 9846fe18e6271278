/**
 * Clarity frame encoding and response decoding.
 */

import { MalformedResponseError } from "../errors.js";
import { Command, MIN_FRAME_LENGTH, RECORD_LENGTH } from "./constants.js";
import type { FirmwareVersion, FullStatus } from "./types.js";

/** Offset of the command byte (and of its echo in responses) */
const COMMAND_OFFSET = 1;
/** Offset of the parameter byte in outbound frames */
const PARAMETER_OFFSET = 2;

const SERIAL_OFFSET = 1;
const SERIAL_BYTES = 4;
const VERSION_OFFSET = 1;
const FULLSTAT_STATUS_OFFSET = 4;
const FULLSTAT_LENGTH = 9;

function assertByte(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`Invalid ${label}: ${value}. Must be a byte (0-255).`);
  }
}

function assertLength(response: Uint8Array, required: number, field: string): void {
  if (response.length < required) {
    throw new MalformedResponseError(`Response too short for ${field}: ${response.length}/${required} bytes`, {
      expected: required,
      actual: response.length,
    });
  }
}

/**
 * Build an outbound frame: byte 0 reserved, command at 1, parameter at 2, zero padding.
 */
export function encodeFrame(command: number, parameter: number = 0, length: number = RECORD_LENGTH): Buffer {
  if (!Number.isInteger(length) || length < MIN_FRAME_LENGTH) {
    throw new RangeError(`Invalid frame length: ${length}. Must be at least ${MIN_FRAME_LENGTH}.`);
  }
  assertByte(command, "command");
  assertByte(parameter, "parameter");

  const frame = Buffer.alloc(length);
  frame[COMMAND_OFFSET] = command;
  frame[PARAMETER_OFFSET] = parameter;
  return frame;
}

/**
 * Single status byte, or the command echo of a set command.
 */
export function decodeStatusByte(response: Uint8Array): number {
  assertLength(response, COMMAND_OFFSET + 1, "status byte");
  return response[COMMAND_OFFSET];
}

/**
 * Decode the 4 byte little-endian packed BCD serial number.
 * Nibbles above 9 are rejected rather than folded into the result.
 */
export function decodeSerial(response: Uint8Array): number {
  assertLength(response, SERIAL_OFFSET + SERIAL_BYTES, "serial number");

  let serial = 0;
  for (let i = SERIAL_BYTES - 1; i >= 0; i--) {
    const offset = SERIAL_OFFSET + i;
    const byte = response[offset];
    const high = byte >> 4;
    const low = byte & 0x0f;
    if (high > 9 || low > 9) {
      throw new MalformedResponseError(`Invalid BCD byte 0x${byte.toString(16).padStart(2, "0")} at offset ${offset}`, {
        byte,
        offset,
      });
    }
    serial = serial * 100 + high * 10 + low;
  }
  return serial;
}

export function decodeVersionTriple(response: Uint8Array): FirmwareVersion {
  assertLength(response, VERSION_OFFSET + 3, "version");
  return {
    major: response[VERSION_OFFSET],
    minor: response[VERSION_OFFSET + 1],
    patch: response[VERSION_OFFSET + 2],
  };
}

/**
 * Decode a FULLSTAT record: VERSION[3], ONOFF, DOOR, DISK, FILT, CAL.
 */
export function decodeFullStatus(response: Uint8Array): FullStatus {
  assertLength(response, FULLSTAT_LENGTH, "full status");
  const status = FULLSTAT_STATUS_OFFSET;
  return {
    version: decodeVersionTriple(response),
    onOff: response[status],
    door: response[status + 1],
    disk: response[status + 2],
    filter: response[status + 3],
    cal: response[status + 4],
  };
}

/**
 * Check if an echo byte is the device's "command not understood" reply.
 */
export function isCommandError(echo: number): boolean {
  return echo === Command.CMDERROR;
}

export function formatVersion(version: FirmwareVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}
