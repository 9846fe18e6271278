/**
 * Clarity protocol module - frame building and response decoding.
 */

export type { FirmwareVersion, FullStatus, TransactOptions } from "./types.js";
export {
  Command,
  RunState,
  DoorState,
  DiskPosition,
  FilterPosition,
  CalibrationLED,
  RECORD_LENGTH,
  MIN_FRAME_LENGTH,
  type DiskSlot,
  type FilterSlot,
} from "./constants.js";
export {
  encodeFrame,
  decodeStatusByte,
  decodeSerial,
  decodeVersionTriple,
  decodeFullStatus,
  isCommandError,
  formatVersion,
} from "./frame.js";
