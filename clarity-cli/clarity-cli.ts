#!/usr/bin/env node
import { program } from "commander";
import { withSession, type ClaritySession, type SessionOptions } from "./connection.js";
import {
  VENDOR_ID,
  PRODUCT_ID,
  DEFAULT_TIMEOUT_MS,
  RUN_STATE_NAMES,
  DOOR_NAMES,
  DISK_NAMES,
  FILTER_NAMES,
  CAL_NAMES,
  describeStatus,
  describeEcho,
  formatFullStatus,
  formatHex,
  parseDiskPosition,
  parseFilterPosition,
  parseCalibrationState,
  parseNonNegativeInt,
  parsePositiveInt,
  getErrorMessage,
} from "./lib.js";
import { Command, formatVersion } from "./protocol/index.js";
import { nodeHidProvider, type DeviceDescriptor } from "./transport.js";

interface GlobalOptions {
  index: number;
  timeout: number;
  verbose?: boolean;
}

// =============================================================================
// Helpers
// =============================================================================

function sessionOptions(): SessionOptions {
  const options = program.opts<GlobalOptions>();
  return {
    index: options.index,
    timeoutMs: options.timeout,
    debug: options.verbose ?? false,
  };
}

/**
 * Run fn against the selected device; print the error and exit 1 on failure.
 */
async function run(fn: (session: ClaritySession) => Promise<void>): Promise<void> {
  try {
    await withSession(sessionOptions(), fn);
  } catch (err) {
    console.error(getErrorMessage(err));
    process.exit(1);
  }
}

function reportEcho(sent: number, echo: number): void {
  const warning = describeEcho(sent, echo);
  if (warning) {
    console.warn(`Warning: ${warning}`);
  }
}

// =============================================================================
// CLI Commands
// =============================================================================

program
  .name("clarity-cli")
  .description("Clarity spinning-disk confocal control CLI")
  .version("1.0.0")
  .option("-i, --index <n>", "Device index (see list)", (v) => parseNonNegativeInt(v, "index"), 0)
  .option(
    "-t, --timeout <ms>",
    "Response timeout in milliseconds",
    (v) => parsePositiveInt(v, "timeout"),
    DEFAULT_TIMEOUT_MS
  )
  .option("-v, --verbose", "Dump every frame sent and received");

program
  .command("list")
  .description("List connected Clarity devices")
  .action(async () => {
    let devices: DeviceDescriptor[];
    try {
      devices = await nodeHidProvider.enumerate(VENDOR_ID, PRODUCT_ID);
    } catch (err) {
      console.error(getErrorMessage(err));
      process.exit(1);
    }

    if (devices.length === 0) {
      console.log(`No Clarity devices found (VID: ${formatHex(VENDOR_ID)}, PID: ${formatHex(PRODUCT_ID)}).`);
      return;
    }

    devices.forEach((device, index) => {
      console.log(
        `  [${index}] ${device.path ?? "(no path)"} - ${device.product ?? "Unknown"} (serial: ${device.serialNumber ?? "?"})`
      );
    });
  });

program
  .command("status")
  .description("Show the full device status")
  .option("--json", "Print raw status bytes as JSON")
  .action(async (options: { json?: boolean }) => {
    await run(async (session) => {
      const status = await session.getFullStat();

      if (options.json) {
        console.log(JSON.stringify(status, null, 2));
        return;
      }

      console.log("Clarity - Status");
      console.log("================");
      for (const line of formatFullStatus(status)) {
        console.log(line);
      }
    });
  });

program
  .command("on")
  .description("Switch the device on")
  .action(async () => {
    await run(async (session) => {
      reportEcho(Command.SETONOFF, await session.switchOn());
    });
  });

program
  .command("off")
  .description("Put the device to sleep")
  .action(async () => {
    await run(async (session) => {
      reportEcho(Command.SETONOFF, await session.switchOff());
    });
  });

program
  .command("power")
  .description("Show the on/off state")
  .action(async () => {
    await run(async (session) => {
      console.log(describeStatus(RUN_STATE_NAMES, await session.getOnOff()));
    });
  });

program
  .command("disk")
  .description("Show the disk position, or move it (0 = widefield, 1-3 = sectioning)")
  .argument("[position]", "New position (0-3)")
  .action(async (position?: string) => {
    await run(async (session) => {
      if (position === undefined) {
        console.log(describeStatus(DISK_NAMES, await session.getDiskPosition()));
        return;
      }
      reportEcho(Command.SETDISK, await session.setDiskPosition(parseDiskPosition(position)));
    });
  });

program
  .command("filter")
  .description("Show the filter turret position, or move it")
  .argument("[position]", "New position (1-4)")
  .action(async (position?: string) => {
    await run(async (session) => {
      if (position === undefined) {
        console.log(describeStatus(FILTER_NAMES, await session.getFilterPosition()));
        return;
      }
      reportEcho(Command.SETFILT, await session.setFilterPosition(parseFilterPosition(position)));
    });
  });

program
  .command("cal")
  .description("Show the calibration LED state, or switch it")
  .argument("[state]", "on or off")
  .action(async (state?: string) => {
    await run(async (session) => {
      if (state === undefined) {
        console.log(describeStatus(CAL_NAMES, await session.getCalibrationLED()));
        return;
      }
      reportEcho(Command.SETCAL, await session.setCalibrationLED(parseCalibrationState(state)));
    });
  });

program
  .command("door")
  .description("Show whether the filter turret door is open")
  .action(async () => {
    await run(async (session) => {
      console.log(describeStatus(DOOR_NAMES, await session.getDoor()));
    });
  });

program
  .command("serial")
  .description("Show the device serial number")
  .action(async () => {
    await run(async (session) => {
      console.log(String(await session.getSerialNumber()));
    });
  });

program
  .command("version")
  .description("Show the firmware version")
  .action(async () => {
    await run(async (session) => {
      console.log(formatVersion(await session.getVersion()));
    });
  });

await program.parseAsync();
