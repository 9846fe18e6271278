import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import {
  VENDOR_ID,
  PRODUCT_ID,
  DISK_NAMES,
  DOOR_NAMES,
  FILTER_NAMES,
  describeStatus,
  describeEcho,
  formatFullStatus,
  formatHex,
  hexDump,
  parseDiskPosition,
  parseFilterPosition,
  parseCalibrationState,
  parseNonNegativeInt,
  parsePositiveInt,
  getErrorMessage,
} from "./lib.js";

describe("describeStatus", () => {
  it("names known values", () => {
    expect(describeStatus(DISK_NAMES, 0x00)).toBe("widefield");
    expect(describeStatus(DISK_NAMES, 0x10)).toBe("moving");
    expect(describeStatus(FILTER_NAMES, 0xff)).toBe("error");
    expect(describeStatus(DOOR_NAMES, 0x02)).toBe("open");
  });

  it("recognises SLEEP in any field", () => {
    expect(describeStatus(DOOR_NAMES, 0x7f)).toBe("sleep");
  });

  it("shows unknown values in hex", () => {
    expect(describeStatus(FILTER_NAMES, 0x05)).toBe("unknown (0x05)");
  });
});

describe("formatFullStatus", () => {
  it("renders one line per field", () => {
    const lines = formatFullStatus({
      version: { major: 1, minor: 2, patch: 3 },
      onOff: 0x0f,
      door: 0x01,
      disk: 0x02,
      filter: 0x03,
      cal: 0x01,
    });
    expect(lines).toEqual([
      "Firmware: 1.2.3",
      "Power:    on",
      "Door:     closed",
      "Disk:     mid sectioning",
      "Filter:   position 3",
      "Cal LED:  on",
    ]);
  });
});

describe("describeEcho", () => {
  it("returns null when the command is echoed", () => {
    expect(describeEcho(0x23, 0x23)).toBeNull();
  });

  it("reports CMDERROR", () => {
    expect(describeEcho(0x23, 0xff)).toBe("Device did not understand the command");
  });

  it("reports SLEEP", () => {
    expect(describeEcho(0x24, 0x7f)).toBe("Device is asleep; command ignored");
  });

  it("reports anything else", () => {
    expect(describeEcho(0x25, 0x01)).toBe("Unexpected echo 0x01 for command 0x25");
  });
});

describe("parseDiskPosition", () => {
  it("accepts 0-3", () => {
    expect(parseDiskPosition("0")).toBe(0);
    expect(parseDiskPosition("3")).toBe(3);
  });

  it("rejects anything else", () => {
    expect(() => parseDiskPosition("4")).toThrow(/Invalid disk position: 4/);
    expect(() => parseDiskPosition("abc")).toThrow(/Must be 0-3/);
  });

  it("rejects blank input instead of reading it as 0", () => {
    expect(() => parseDiskPosition("")).toThrow("Invalid disk position: . Must be 0-3.");
    expect(() => parseDiskPosition("  ")).toThrow(/Invalid disk position/);
  });
});

describe("parseFilterPosition", () => {
  it("accepts 1-4", () => {
    expect(parseFilterPosition("1")).toBe(1);
    expect(parseFilterPosition("4")).toBe(4);
  });

  it("rejects 0 and 5", () => {
    expect(() => parseFilterPosition("0")).toThrow(/Invalid filter position: 0/);
    expect(() => parseFilterPosition("5")).toThrow(/Must be 1-4/);
  });

  it("rejects blank input", () => {
    expect(() => parseFilterPosition("")).toThrow("Invalid filter position: . Must be 1-4.");
  });
});

describe("parseCalibrationState", () => {
  it("maps on/off to wire values", () => {
    expect(parseCalibrationState("on")).toBe(0x01);
    expect(parseCalibrationState("OFF")).toBe(0x02);
  });

  it("rejects other words", () => {
    expect(() => parseCalibrationState("dim")).toThrow(/Invalid calibration LED state: dim/);
  });
});

describe("parseNonNegativeInt", () => {
  it("parses integers", () => {
    expect(parseNonNegativeInt("0", "index")).toBe(0);
    expect(parseNonNegativeInt("250", "timeout")).toBe(250);
  });

  it("rejects negatives and fractions", () => {
    expect(() => parseNonNegativeInt("-1", "index")).toThrow("Invalid index: -1");
    expect(() => parseNonNegativeInt("1.5", "timeout")).toThrow("Invalid timeout: 1.5");
  });

  it("rejects blank input instead of selecting device 0", () => {
    expect(() => parseNonNegativeInt("", "index")).toThrow("Invalid index: ");
    expect(() => parseNonNegativeInt(" ", "index")).toThrow(InvalidArgumentError);
  });

  it("throws InvalidArgumentError so commander reports a usage error", () => {
    expect(() => parseNonNegativeInt("abc", "timeout")).toThrow(InvalidArgumentError);
  });
});

describe("parsePositiveInt", () => {
  it("parses positive integers", () => {
    expect(parsePositiveInt("100", "timeout")).toBe(100);
  });

  it("rejects 0", () => {
    expect(() => parsePositiveInt("0", "timeout")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("0", "timeout")).toThrow("Invalid timeout: 0. Must be greater than 0.");
  });

  it("rejects non-numbers with InvalidArgumentError", () => {
    expect(() => parsePositiveInt("abc", "timeout")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("abc", "timeout")).toThrow("Invalid timeout: abc");
  });
});

describe("formatting", () => {
  it("formatHex pads and upper-cases", () => {
    expect(formatHex(0x0f)).toBe("0x0F");
    expect(formatHex(0x1f0a)).toBe("0x1F0A");
  });

  it("hexDump separates bytes with spaces", () => {
    expect(hexDump(Uint8Array.from([0x00, 0x1f, 0xab]))).toBe("00 1f ab");
  });
});

describe("getErrorMessage", () => {
  it("reads Error messages", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies anything else", () => {
    expect(getErrorMessage("plain")).toBe("plain");
  });
});

describe("constants", () => {
  it("device identity", () => {
    expect(VENDOR_ID).toBe(0x1f0a);
    expect(PRODUCT_ID).toBe(0x0088);
  });
});
