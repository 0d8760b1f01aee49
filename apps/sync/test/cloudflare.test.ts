import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";
import { CloudflareApiError, CloudflareClient } from "../src/cloudflare/client";
import type { DnsRecordConfig } from "../src/config";
import { HttpRequestError, createHttpClient } from "../src/http/client";
import { applyRecordAddress } from "../src/update/apply";
import { jsonResponse, textResponse } from "./helpers";

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal("fetch", mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

const record: DnsRecordConfig = {
  name: "home.example.com",
  apiToken: "test-token",
  zoneId: "z1",
  recordId: "r1",
  webhooks: []
};

const client = new CloudflareClient(createHttpClient({ timeoutMs: 10_000 }));

describe("applyRecordAddress", () => {
  it("PUTs the new content with the record's own token", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ success: true, errors: [], messages: [], result: {} }));

    await applyRecordAddress(client, record, "A", "203.0.113.9");

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://api.cloudflare.com/client/v4/zones/z1/dns_records/r1");
    expect(init.method).toBe("PUT");
    expect(init.headers).toEqual({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json"
    });
    expect(init.body).toBe(
      JSON.stringify({ type: "A", name: "home.example.com", content: "203.0.113.9", ttl: 1 })
    );
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("accepts a successful response without a JSON body", async () => {
    mockFetch.mockResolvedValueOnce(textResponse(""));
    await expect(applyRecordAddress(client, record, "AAAA", "2001:db8::1")).resolves.toBeUndefined();
  });

  it("reports the first structured error of a failed response", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ success: false, errors: [{ code: 10000, message: "Authentication error" }] }, 403)
    );

    const update = applyRecordAddress(client, record, "A", "203.0.113.9");
    await expect(update).rejects.toBeInstanceOf(CloudflareApiError);
    await expect(update).rejects.toThrow("API error: Authentication error (code: 10000)");
  });

  it("falls back to status and raw body when no structured error is present", async () => {
    mockFetch.mockResolvedValueOnce(textResponse("upstream down", 502));

    const error = await applyRecordAddress(client, record, "A", "203.0.113.9").catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(CloudflareApiError);
    if (error instanceof CloudflareApiError) {
      expect(error.message).toBe("API error: 502 upstream down");
      expect(error.status).toBe(502);
      expect(error.body).toBe("upstream down");
    }
  });

  it("treats success: false on a 200 response as a failure", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ success: false, errors: [{ code: 81044, message: "Record does not exist." }] })
    );

    await expect(applyRecordAddress(client, record, "A", "203.0.113.9")).rejects.toThrow(
      "API error: Record does not exist. (code: 81044)"
    );
  });

  it("wraps transport failures", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    const update = applyRecordAddress(client, record, "A", "203.0.113.9");
    await expect(update).rejects.toBeInstanceOf(HttpRequestError);
    await expect(update).rejects.toThrow("request failed: fetch failed");
  });
});

describe("createHttpClient", () => {
  it("reports timeouts with the configured limit", async () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    mockFetch.mockRejectedValueOnce(timeout);

    const http = createHttpClient({ timeoutMs: 5_000 });
    const error = await http.send("https://hooks.example.com/ddns").catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(HttpRequestError);
    if (error instanceof HttpRequestError) {
      expect(error.message).toBe("request timed out after 5000ms");
      expect(error.timedOut).toBe(true);
      expect(error.url).toBe("https://hooks.example.com/ddns");
    }
  });

  it("defaults to GET", async () => {
    mockFetch.mockResolvedValueOnce(textResponse("ok"));

    const http = createHttpClient({ timeoutMs: 5_000 });
    await http.send("https://api.ipify.org");
    expect(mockFetch.mock.calls[0][1].method).toBe("GET");
  });
});
