/**
 * Wire constants for the Clarity HID protocol.
 */

/** Record length of run-state commands and their responses */
export const RECORD_LENGTH = 16;

/** Offsets 0-2 (reserved, command, parameter) must fit in a frame */
export const MIN_FRAME_LENGTH = 3;

export const Command = {
  /** No data out, returns 3 byte version */
  GETVERSION: 0x00,
  /** Echoed when the device did not understand a command */
  CMDERROR: 0xff,

  GETONOFF: 0x12,
  /** Returns door status, or SLEEP */
  GETDOOR: 0x13,
  /** Returns disk slide status, or SLEEP */
  GETDISK: 0x14,
  /** Returns filter position, or SLEEP */
  GETFILT: 0x15,
  /** Returns calibration LED status, or SLEEP */
  GETCAL: 0x16,
  /** Returns 4 byte BCD serial number, little endian */
  GETSERIAL: 0x19,
  /** Returns VERSION[3], ONOFF, DOOR, DISK, FILT, CAL */
  FULLSTAT: 0x1f,

  // Set commands echo the command, or SLEEP
  SETONOFF: 0x21,
  SETDISK: 0x23,
  SETFILT: 0x24,
  SETCAL: 0x25,

  /** Service mode only: stops the disk for alignment. Not exposed by the session. */
  SETSVCMODE1: 0xe0,
} as const;

export type Command = (typeof Command)[keyof typeof Command];

export const RunState = {
  RUN: 0x0f,
  SLEEP: 0x7f,
} as const;

export type RunState = (typeof RunState)[keyof typeof RunState];

export const DoorState = {
  CLOSED: 0x01,
  OPEN: 0x02,
} as const;

export type DoorState = (typeof DoorState)[keyof typeof DoorState];

export const DiskPosition = {
  /** Disk out of beam path, wide field */
  WIDEFIELD: 0x00,
  LOW: 0x01,
  MID: 0x02,
  HIGH: 0x03,
  /** Slide moving between positions */
  MOVING: 0x10,
  /** End stops not detected */
  ERROR: 0xff,
} as const;

/** Positions that SETDISK accepts */
export type DiskSlot = 0x00 | 0x01 | 0x02 | 0x03;

export const FilterPosition = {
  POS1: 0x01,
  POS2: 0x02,
  POS3: 0x03,
  POS4: 0x04,
  MOVING: 0x10,
  /** Filter drive fault, e.g. filters not present */
  ERROR: 0xff,
} as const;

/** Positions that SETFILT accepts */
export type FilterSlot = 0x01 | 0x02 | 0x03 | 0x04;

export const CalibrationLED = {
  ON: 0x01,
  OFF: 0x02,
} as const;

export type CalibrationLED = (typeof CalibrationLED)[keyof typeof CalibrationLED];
