/**
 * Protocol types for Clarity device communication.
 */

/** Firmware version as reported by GETVERSION and FULLSTAT */
export interface FirmwareVersion {
  major: number;
  minor: number;
  patch: number;
}

/** Decoded FULLSTAT record */
export interface FullStatus {
  version: FirmwareVersion;
  onOff: number;
  door: number;
  disk: number;
  filter: number;
  cal: number;
}

/** Options for a single write-then-read transaction */
export interface TransactOptions {
  parameter?: number;
  maxLength?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}
