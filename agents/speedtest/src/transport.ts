import fetch from "node-fetch";
import {
  type ISpeedRecord,
  TransportFailure,
  type WireProtocol,
  toWirePayload,
} from "@speedlog/lib";

export const DEFAULT_SEND_TIMEOUT_MS = 30_000;

export interface TransportResult {
  status: number;
  body: string;
}

export interface SendOptions {
  timeoutMs?: number;
  protocol?: WireProtocol;
}

/**
 * Posts the record to the endpoint once. There is no retry: a failed send
 * loses the sample and the next scheduled run takes a fresh one.
 */
export async function send(
  record: ISpeedRecord,
  endpoint: URL,
  options: SendOptions = {}
): Promise<TransportResult> {
  const payload = toWirePayload(record, options.protocol ?? "current");
  let status: number;
  let body: string;
  try {
    const result = await fetch(endpoint.href, {
      method: "POST",
      body: JSON.stringify(payload),
      headers: {
        "Content-Type": "application/json",
      },
      timeout: options.timeoutMs ?? DEFAULT_SEND_TIMEOUT_MS,
    });
    status = result.status;
    body = await result.text();
  } catch (err) {
    throw new TransportFailure(
      `Failed to send results to ${endpoint.origin}: ${err instanceof Error ? err.message : String(err)}`,
      undefined,
      { cause: err }
    );
  }
  if (status < 200 || status >= 300) {
    throw new TransportFailure(`Failed to store results: ${status}.`, status);
  }
  return { status, body };
}
