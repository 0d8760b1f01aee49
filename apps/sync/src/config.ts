import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnvFile } from "dotenv";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger";

export class ConfigurationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ConfigurationError";
  }
}

export const loadEnvironment = (): void => {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const candidateRoots = [
    process.cwd(),
    resolve(process.cwd(), ".."),
    resolve(process.cwd(), "..", ".."),
    moduleDir,
    resolve(moduleDir, ".."),
    resolve(moduleDir, "..", "..")
  ];
  for (const base of candidateRoots) {
    const candidate = resolve(base, ".env");
    if (existsSync(candidate)) {
      loadEnvFile({ path: candidate });
      return;
    }
  }
  loadEnvFile();
};

export type Settings = {
  readonly configPath: string;
  readonly cachePath: string;
  readonly logLevel: LogLevel;
};

const envSchema = z.object({
  DDNS_CONFIG_PATH: z.string().optional(),
  DDNS_CACHE_PATH: z.string().optional(),
  DDNS_LOG_LEVEL: z.string().optional()
});

const parseLogLevel = (value: string | undefined): LogLevel => {
  if (value === undefined || value.trim().length === 0) {
    return "info";
  }
  const normalized = value.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (match === undefined) {
    throw new ConfigurationError(`DDNS_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
  }
  return match;
};

/**
 * Reads process settings. A missing DDNS_CONFIG_PATH is reported later by
 * `loadConfiguration` so the logger can be set up first.
 */
export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
  const parsed = envSchema.parse(env);
  return Object.freeze({
    configPath: parsed.DDNS_CONFIG_PATH?.trim() ?? "",
    cachePath: parsed.DDNS_CACHE_PATH?.trim() ?? "",
    logLevel: parseLogLevel(parsed.DDNS_LOG_LEVEL)
  });
};

export type DnsRecordConfig = {
  readonly name: string;
  readonly apiToken: string;
  readonly zoneId: string;
  readonly recordId: string;
  readonly webhooks: readonly string[];
};

export type DnsConfiguration = {
  readonly a: readonly DnsRecordConfig[];
  readonly aaaa: readonly DnsRecordConfig[];
};

const recordSchema = z
  .object({
    name: z.string().min(1, "name is required"),
    api_token: z.string().min(1, "api_token is required"),
    zone_id: z.string().min(1, "zone_id is required"),
    record_id: z.string().min(1, "record_id is required"),
    webhooks: z.array(z.string().url("webhooks must contain URLs")).optional()
  })
  .transform(
    (record): DnsRecordConfig => ({
      name: record.name,
      apiToken: record.api_token,
      zoneId: record.zone_id,
      recordId: record.record_id,
      webhooks: record.webhooks ?? []
    })
  );

const configurationSchema = z.object({
  a: z.array(recordSchema).optional(),
  aaaa: z.array(recordSchema).optional()
});

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");

export const parseConfiguration = (text: string): DnsConfiguration => {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`failed to parse config file: ${reason}`, error);
  }
  const result = configurationSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(`failed to parse config file: ${formatIssues(result.error)}`, result.error);
  }
  const a = result.data.a ?? [];
  const aaaa = result.data.aaaa ?? [];
  if (a.length === 0 && aaaa.length === 0) {
    throw new ConfigurationError("no DNS records found in config file");
  }
  return Object.freeze({ a, aaaa });
};

export const loadConfiguration = async (configPath: string): Promise<DnsConfiguration> => {
  if (configPath.length === 0) {
    throw new ConfigurationError("DDNS_CONFIG_PATH environment variable not set");
  }
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`failed to read config file: ${reason}`, error);
  }
  return parseConfiguration(text);
};
