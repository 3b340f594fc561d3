import { describe, test, expect, beforeEach, afterEach } from "vitest";
import http from "http";
import fetch from "node-fetch";
import type { IAppendOnlyStore } from "@speedlog/lib";
import { HEADER, MemorySheet, SheetStore } from "@speedlog/destination-sheet";
import { SpeedlogIngestServer } from "../index";

function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve()))
  );
}

describe("SpeedlogIngestServer", () => {
  let sheet: MemorySheet;
  let server: http.Server;
  let url: string;

  async function startWith(store: IAppendOnlyStore, path?: string) {
    server = await new SpeedlogIngestServer(store, { port: 0, path }).start();
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port.");
    }
    url = `http://127.0.0.1:${address.port}`;
  }

  beforeEach(async () => {
    sheet = new MemorySheet(HEADER);
    await startWith(new SheetStore(sheet), "/exec");
  });

  afterEach(async () => {
    await close(server);
  });

  test("stores a legacy payload posted as JSON", async () => {
    const response = await fetch(`${url}/exec`, {
      method: "POST",
      body: JSON.stringify({ data: "2021-10-02T11:30:00Z,23,78.08,143.15" }),
      headers: { "Content-Type": "application/json" },
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(await response.text()).toBe(
      "timestamp: 2021-10-02T11:30:00Z, ping: 23, download: 78.08, upload: 143.15\n"
    );
    expect(sheet.rows()[1]).toEqual(["2021-10-02T11:30:00Z", 23, 78.08, 143.15]);
  });

  test("stores a current payload whatever its content type", async () => {
    const response = await fetch(`${url}/exec`, {
      method: "POST",
      body: '{"timestamp":"2021-10-02T11:30:00Z","ping":23,"download":78.08,"upload":143.15}',
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
    });

    expect(response.status).toBe(200);
    expect(await response.text()).toBe("success");
    expect(sheet.rows()).toHaveLength(2);
  });

  test("answers invalid legacy data with 400", async () => {
    const response = await fetch(`${url}/exec`, {
      method: "POST",
      body: '{"data":"a,b,c"}',
      headers: { "Content-Type": "application/json" },
    });

    expect(response.status).toBe(400);
    expect(await response.text()).toBe("Posted data is invalid.\n");
    expect(sheet.rows()).toHaveLength(1);
  });

  test("answers syntax errors with 400", async () => {
    const response = await fetch(`${url}/exec`, {
      method: "POST",
      body: '{"data":',
      headers: { "Content-Type": "application/json" },
    });

    expect(response.status).toBe(400);
    expect(await response.text()).toBe("Payload is not valid JSON.\n");
  });

  test("answers an empty request with 400", async () => {
    const response = await fetch(`${url}/exec`, { method: "POST" });

    expect(response.status).toBe(400);
    expect(await response.text()).toBe("Payload is empty.\n");
  });

  test("refuses oversized bodies", async () => {
    const response = await fetch(`${url}/exec`, {
      method: "POST",
      body: JSON.stringify({ data: "x".repeat(20 * 1024) }),
      headers: { "Content-Type": "application/json" },
    });

    expect(response.status).toBe(413);
    expect(sheet.rows()).toHaveLength(1);
  });

  test("answers store failures with 500", async () => {
    await close(server);
    await startWith({
      insertAtTop: () => Promise.reject(new Error("sheet unavailable")),
    });

    const response = await fetch(url, {
      method: "POST",
      body: '{"data":"2021-10-02T11:30:00Z,23,78.08,143.15"}',
      headers: { "Content-Type": "application/json" },
    });

    expect(response.status).toBe(500);
    expect(await response.text()).toBe("Failed to store entry.\n");
  });
});
