import { CloudflareClient } from "./cloudflare/client";
import { type DnsConfiguration, loadConfiguration, loadEnvironment, loadSettings } from "./config";
import { PROVIDER_TIMEOUT_MS, WEBHOOK_TIMEOUT_MS, createHttpClient } from "./http/client";
import { createLogger, describeError, type Logger } from "./logger";
import { createNotifier } from "./notify/webhooks";
import { performSync, type SyncSummary } from "./update";

export const run = async (logger: Logger, cachePath: string, configPath: string): Promise<SyncSummary> => {
  logger.info("🛰️ Starting DDNS client");
  logger.info("Cache path", { path: cachePath });

  let configuration: DnsConfiguration;
  try {
    configuration = await loadConfiguration(configPath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`failed to load configuration: ${reason}`, { cause: error });
  }
  logger.info("Loaded configuration", {
    aRecords: configuration.a.length,
    aaaaRecords: configuration.aaaa.length
  });

  const http = createHttpClient({ timeoutMs: PROVIDER_TIMEOUT_MS });
  const webhookHttp = createHttpClient({ timeoutMs: WEBHOOK_TIMEOUT_MS });

  const summary = await performSync({
    logger,
    http,
    cloudflare: new CloudflareClient(http),
    notifier: createNotifier({ http: webhookHttp }),
    configuration,
    cachePath
  });
  logger.info("DDNS client finished");
  return summary;
};

export const main = async (): Promise<number> => {
  let logger = createLogger();
  try {
    loadEnvironment();
    const settings = loadSettings();
    logger = createLogger({ level: settings.logLevel });
    await run(logger, settings.cachePath, settings.configPath);
    return 0;
  } catch (error) {
    logger.error("Application failed", describeError(error));
    return 1;
  }
};
