import { InvalidArgumentError } from "commander";
import {
  CalibrationLED,
  Command,
  DiskPosition,
  DoorState,
  FilterPosition,
  RunState,
  formatVersion,
  type DiskSlot,
  type FilterSlot,
  type FullStatus,
} from "./protocol/index.js";

// =============================================================================
// Constants
// =============================================================================

export const VENDOR_ID = 0x1f0a;
export const PRODUCT_ID = 0x0088;

export const DEFAULT_TIMEOUT_MS = 100;

export const RUN_STATE_NAMES: Record<number, string> = {
  [RunState.RUN]: "on",
  [RunState.SLEEP]: "sleep",
};

export const DOOR_NAMES: Record<number, string> = {
  [DoorState.CLOSED]: "closed",
  [DoorState.OPEN]: "open",
};

export const DISK_NAMES: Record<number, string> = {
  [DiskPosition.WIDEFIELD]: "widefield",
  [DiskPosition.LOW]: "low sectioning",
  [DiskPosition.MID]: "mid sectioning",
  [DiskPosition.HIGH]: "high sectioning",
  [DiskPosition.MOVING]: "moving",
  [DiskPosition.ERROR]: "error",
};

export const FILTER_NAMES: Record<number, string> = {
  [FilterPosition.POS1]: "position 1",
  [FilterPosition.POS2]: "position 2",
  [FilterPosition.POS3]: "position 3",
  [FilterPosition.POS4]: "position 4",
  [FilterPosition.MOVING]: "moving",
  [FilterPosition.ERROR]: "error",
};

export const CAL_NAMES: Record<number, string> = {
  [CalibrationLED.ON]: "on",
  [CalibrationLED.OFF]: "off",
};

// =============================================================================
// Status Helpers
// =============================================================================

/**
 * Name a status byte. SLEEP is recognised in every field; unknown bytes are shown in hex.
 */
export function describeStatus(names: Record<number, string>, value: number): string {
  const name = names[value];
  if (name) return name;
  if (value === RunState.SLEEP) return "sleep";
  return `unknown (${formatHex(value)})`;
}

export function formatFullStatus(status: FullStatus): string[] {
  return [
    `Firmware: ${formatVersion(status.version)}`,
    `Power:    ${describeStatus(RUN_STATE_NAMES, status.onOff)}`,
    `Door:     ${describeStatus(DOOR_NAMES, status.door)}`,
    `Disk:     ${describeStatus(DISK_NAMES, status.disk)}`,
    `Filter:   ${describeStatus(FILTER_NAMES, status.filter)}`,
    `Cal LED:  ${describeStatus(CAL_NAMES, status.cal)}`,
  ];
}

/**
 * Warning for the echo of a set command, or null if the device accepted it.
 */
export function describeEcho(sent: number, echo: number): string | null {
  if (echo === sent) return null;
  if (echo === Command.CMDERROR) return "Device did not understand the command";
  if (echo === RunState.SLEEP) return "Device is asleep; command ignored";
  return `Unexpected echo ${formatHex(echo)} for command ${formatHex(sent)}`;
}

// =============================================================================
// Argument Parsing
// =============================================================================

const DISK_SLOTS: readonly DiskSlot[] = [0x00, 0x01, 0x02, 0x03];
const FILTER_SLOTS: readonly FilterSlot[] = [0x01, 0x02, 0x03, 0x04];

/**
 * Parse a decimal integer. Blank input is NaN rather than Number("")'s 0.
 */
function parseNumber(value: string): number {
  return value.trim() === "" ? NaN : Number(value);
}

export function parseDiskPosition(value: string): DiskSlot {
  const parsed = parseNumber(value);
  const slot = DISK_SLOTS.find((s) => s === parsed);
  if (slot === undefined) {
    throw new Error(`Invalid disk position: ${value}. Must be 0-3.`);
  }
  return slot;
}

export function parseFilterPosition(value: string): FilterSlot {
  const parsed = parseNumber(value);
  const slot = FILTER_SLOTS.find((s) => s === parsed);
  if (slot === undefined) {
    throw new Error(`Invalid filter position: ${value}. Must be 1-4.`);
  }
  return slot;
}

export function parseCalibrationState(value: string): CalibrationLED {
  switch (value.toLowerCase()) {
    case "on":
      return CalibrationLED.ON;
    case "off":
      return CalibrationLED.OFF;
  }
  throw new Error(`Invalid calibration LED state: ${value}. Must be on or off.`);
}

/**
 * Option parser for commander. Throws InvalidArgumentError so commander reports a usage error.
 */
export function parseNonNegativeInt(value: string, label: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Invalid ${label}: ${value}`);
  }
  return parsed;
}

export function parsePositiveInt(value: string, label: string): number {
  const parsed = parseNonNegativeInt(value, label);
  if (parsed === 0) {
    throw new InvalidArgumentError(`Invalid ${label}: ${value}. Must be greater than 0.`);
  }
  return parsed;
}

// =============================================================================
// Formatting Helpers
// =============================================================================

export function formatHex(byte: number): string {
  return `0x${byte.toString(16).padStart(2, "0").toUpperCase()}`;
}

/**
 * Space-separated hex dump, as used by debug output.
 */
export function hexDump(data: Uint8Array): string {
  return Array.from(data)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join(" ");
}

// =============================================================================
// Error Helpers
// =============================================================================

/**
 * Extract error message from unknown error type.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
