import { describe, it, expect } from "vitest";
import {
  ClarityError,
  DeviceNotFoundError,
  TransportError,
  TransportWriteError,
  TransportReadError,
  TransportTimeoutError,
  MalformedResponseError,
  SessionClosedError,
} from "./errors.js";

describe("error hierarchy", () => {
  it("all errors extend ClarityError and Error", () => {
    const errors = [
      new DeviceNotFoundError(),
      new TransportWriteError(),
      new TransportReadError(),
      new TransportTimeoutError(100),
      new MalformedResponseError("short"),
      new SessionClosedError(),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(ClarityError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it("transport errors share TransportError", () => {
    expect(new TransportWriteError()).toBeInstanceOf(TransportError);
    expect(new TransportReadError()).toBeInstanceOf(TransportError);
    expect(new TransportTimeoutError(5)).toBeInstanceOf(TransportError);
    expect(new MalformedResponseError("x")).not.toBeInstanceOf(TransportError);
  });

  it("timeout is distinguishable from a hard read failure", () => {
    expect(new TransportTimeoutError(5)).not.toBeInstanceOf(TransportReadError);
  });
});

describe("error names", () => {
  it("sets name to the class name", () => {
    expect(new ClarityError("x").name).toBe("ClarityError");
    expect(new DeviceNotFoundError().name).toBe("DeviceNotFoundError");
    expect(new TransportError("x").name).toBe("TransportError");
    expect(new TransportWriteError().name).toBe("TransportWriteError");
    expect(new TransportReadError().name).toBe("TransportReadError");
    expect(new TransportTimeoutError(1).name).toBe("TransportTimeoutError");
    expect(new MalformedResponseError("x").name).toBe("MalformedResponseError");
    expect(new SessionClosedError().name).toBe("SessionClosedError");
  });
});

describe("MalformedResponseError details", () => {
  it("carries length details", () => {
    const error = new MalformedResponseError("short", { expected: 9, actual: 1 });
    expect(error.expected).toBe(9);
    expect(error.actual).toBe(1);
    expect(error.offset).toBeUndefined();
  });

  it("leaves details unset when none are given", () => {
    const error = new MalformedResponseError("x");
    expect(error.expected).toBeUndefined();
    expect(error.byte).toBeUndefined();
  });
});

describe("messages", () => {
  it("uses defaults", () => {
    expect(new DeviceNotFoundError().message).toBe("Device not found");
    expect(new SessionClosedError().message).toBe("Session is closed");
    expect(new TransportWriteError().message).toBe("Write failed");
    expect(new TransportReadError().message).toBe("Read failed");
  });

  it("reports the timeout bound", () => {
    const error = new TransportTimeoutError(250);
    expect(error.message).toBe("No response within 250 ms");
    expect(error.timeoutMs).toBe(250);
  });

  it("keeps the cause", () => {
    const cause = new Error("device unplugged");
    expect(new TransportReadError("Read failed: device unplugged", { cause }).cause).toBe(cause);
  });
});
