import { describe, expect, it } from "vitest";
import { CircuitOpenError, createResilientFetch } from "./http-client";

const URL_UNDER_TEST = "https://sms.example.com/send";

/** Replies with each scripted step in turn: a status code or a thrown error. */
function scriptedFetch(steps: Array<number | Error>) {
  const calls: string[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    calls.push(String(input));
    const step = steps[Math.min(calls.length - 1, steps.length - 1)];
    if (step instanceof Error) throw step;
    return new Response(null, { status: step });
  };
  return { fetchImpl, calls };
}

function recordingSleep() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => void delays.push(ms) };
}

describe("resilient fetch", () => {
  it("retries 5xx responses with exponential backoff", async () => {
    const { fetchImpl, calls } = scriptedFetch([503, 502, 200]);
    const { delays, sleep } = recordingSleep();
    const client = createResilientFetch({ fetchImpl, sleep });

    const response = await client(URL_UNDER_TEST, { maxRetries: 3 });

    expect(response.status).toBe(200);
    expect(calls).toHaveLength(3);
    expect(delays).toEqual([500, 1000]);
  });

  it("returns 4xx responses without retrying", async () => {
    const { fetchImpl, calls } = scriptedFetch([400]);
    const { delays, sleep } = recordingSleep();
    const client = createResilientFetch({ fetchImpl, sleep });

    const response = await client(URL_UNDER_TEST);

    expect(response.status).toBe(400);
    expect(calls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it("hands back the last 5xx response once retries are spent", async () => {
    const { fetchImpl, calls } = scriptedFetch([503]);
    const { delays, sleep } = recordingSleep();
    const client = createResilientFetch({ fetchImpl, sleep });

    const response = await client(URL_UNDER_TEST, { maxRetries: 1 });

    expect(response.status).toBe(503);
    expect(calls).toHaveLength(2);
    expect(delays).toEqual([500]);
  });

  it("reports a timeout by host and duration", async () => {
    const fetchImpl: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const error = new Error("The operation was aborted");
          error.name = "AbortError";
          reject(error);
        });
      });
    const client = createResilientFetch({ fetchImpl });

    await expect(client(URL_UNDER_TEST, { timeoutMs: 5, maxRetries: 0 })).rejects.toThrow(
      "Request to sms.example.com timed out after 5ms"
    );
  });

  it("opens the circuit after repeated failures and tries again after the reset window", async () => {
    let now = 1_000;
    const { fetchImpl, calls } = scriptedFetch([new Error("connect ECONNREFUSED"), new Error("connect ECONNREFUSED"), 200]);
    const { sleep } = recordingSleep();
    const client = createResilientFetch({ fetchImpl, sleep, now: () => now, failureThreshold: 2, resetAfterMs: 60_000 });

    await expect(client(URL_UNDER_TEST, { maxRetries: 1 })).rejects.toThrow("connect ECONNREFUSED");
    expect(client.breaker.isOpen("sms.example.com")).toBe(true);

    await expect(client(URL_UNDER_TEST)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(calls).toHaveLength(2);

    now += 60_001;
    const response = await client(URL_UNDER_TEST);
    expect(response.status).toBe(200);
    expect(calls).toHaveLength(3);
    expect(client.breaker.isOpen("sms.example.com")).toBe(false);
  });
});
