#!/usr/bin/env node
import {
  choiceOption,
  type IAppendOnlyStore,
  numberOption,
  requireOption,
} from "@speedlog/lib";
import { CsvSheet, HEADER, SheetStore } from "@speedlog/destination-sheet";
import { PostgresqlStore } from "@speedlog/destination-postgresql";
import { SpeedlogIngestServer } from "./index";

const storeKinds = ["sheet", "postgresql"] as const;

async function createStore(): Promise<IAppendOnlyStore> {
  const kind = choiceOption("STORE", storeKinds, "sheet");
  if (kind === "postgresql") {
    // Connection settings come from the standard PG* environment variables.
    return new PostgresqlStore({ table: requireOption("PG_TABLE") });
  }
  return new SheetStore(await CsvSheet.open(requireOption("SHEET_PATH"), HEADER));
}

async function main() {
  const store = await createStore();
  const server = new SpeedlogIngestServer(store, {
    port: numberOption("PORT", 3400),
    path: process.env.INGEST_PATH || "/",
  });
  await server.start();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
