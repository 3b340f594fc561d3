#!/usr/bin/env node
import moment from "moment-timezone";
import {
  choiceOption,
  numberOption,
  requireOption,
  SchemaError,
  TransportFailure,
  wireProtocols,
} from "@speedlog/lib";
import { collect } from "./collect";
import {
  DEFAULT_MEASURE_TIMEOUT_MS,
  DEFAULT_SPEEDTEST_COMMAND,
  runMeasurement,
} from "./measure";
import { DEFAULT_SEND_TIMEOUT_MS, send } from "./transport";

// cron starts the collector without a login shell, so these must be set in
// the crontab entry itself.
function readOptions() {
  const options = {
    STORAGE_URL: new URL(requireOption("STORAGE_URL")),
    SPEEDTEST_COMMAND:
      process.env.SPEEDTEST_COMMAND?.split(/\s+/).filter(Boolean) ??
      DEFAULT_SPEEDTEST_COMMAND,
    MEASURE_TIMEOUT_MS: numberOption("MEASURE_TIMEOUT_MS", DEFAULT_MEASURE_TIMEOUT_MS),
    SEND_TIMEOUT_MS: numberOption("SEND_TIMEOUT_MS", DEFAULT_SEND_TIMEOUT_MS),
    PAYLOAD_PROTOCOL: choiceOption("PAYLOAD_PROTOCOL", wireProtocols, "current"),
    LOG_TIMEZONE: process.env.LOG_TIMEZONE || "UTC",
  };
  if (moment.tz.zone(options.LOG_TIMEZONE) === null) {
    throw new Error(`Option LOG_TIMEZONE is not a known time zone: ${options.LOG_TIMEZONE}.`);
  }
  return options;
}

async function main() {
  const options = readOptions();
  await collect(
    {
      measure: () =>
        runMeasurement(options.SPEEDTEST_COMMAND, options.MEASURE_TIMEOUT_MS),
      send: (record) =>
        send(record, options.STORAGE_URL, {
          timeoutMs: options.SEND_TIMEOUT_MS,
          protocol: options.PAYLOAD_PROTOCOL,
        }),
    },
    { timezone: options.LOG_TIMEZONE }
  );
}

main().catch((err) => {
  if (err instanceof SchemaError || err instanceof TransportFailure) {
    console.error(`${err.name}: ${err.message} Sample dropped.`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
