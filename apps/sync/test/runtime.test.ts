import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { main, run } from "../src/runtime";
import { captureLogger, jsonResponse, makeTempDir, removeDir, textResponse } from "./helpers";

const mockFetch = vi.fn();

let dir: string;

beforeEach(async () => {
  mockFetch.mockReset();
  vi.stubGlobal("fetch", mockFetch);
  dir = await makeTempDir();
});

afterEach(async () => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  await removeDir(dir);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

const writeConfig = async (): Promise<string> => {
  const path = join(dir, "ddns.json");
  await writeFile(
    path,
    JSON.stringify({
      a: [{ name: "home.example.com", api_token: "test-token", zone_id: "z1", record_id: "r1" }]
    })
  );
  return path;
};

const routeHappyPath = (): void => {
  mockFetch.mockImplementation((url: string) => {
    if (url === "https://api.ipify.org") {
      return Promise.resolve(textResponse("203.0.113.9"));
    }
    return Promise.resolve(jsonResponse({ success: true, errors: [], messages: [], result: {} }));
  });
};

describe("run", () => {
  it("performs one pass and returns the summary", async () => {
    routeHappyPath();
    const { logger, lines } = captureLogger();

    const summary = await run(logger, "", await writeConfig());

    expect(summary.families.map((family) => family.recordType)).toEqual(["A"]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(lines[0].message).toBe("🛰️ Starting DDNS client");
    expect(lines[lines.length - 1].message).toBe("DDNS client finished");
  });

  it("prefixes configuration failures", async () => {
    const { logger } = captureLogger();

    await expect(run(logger, "", "")).rejects.toThrow(
      "failed to load configuration: DDNS_CONFIG_PATH environment variable not set"
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe("main", () => {
  it("exits with 0 even when a record fails", async () => {
    vi.stubEnv("DDNS_CONFIG_PATH", await writeConfig());
    vi.stubEnv("DDNS_CACHE_PATH", "");
    vi.stubEnv("DDNS_LOG_LEVEL", "error");
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    mockFetch.mockImplementation((url: string) =>
      Promise.resolve(url === "https://api.ipify.org" ? textResponse("203.0.113.9") : textResponse("boom", 500))
    );

    await expect(main()).resolves.toBe(0);
  });

  it("exits with 1 when configuration cannot be loaded", async () => {
    vi.stubEnv("DDNS_CONFIG_PATH", join(dir, "absent.json"));
    vi.stubEnv("DDNS_LOG_LEVEL", "error");
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await expect(main()).resolves.toBe(1);
    expect(mockFetch).not.toHaveBeenCalled();
    const logged = JSON.parse(String(consoleError.mock.calls[0][0]));
    expect(logged).toMatchObject({ level: "error", message: "Application failed" });
    expect(String(logged.error)).toMatch(/^failed to load configuration: failed to read config file:/);
  });
});
