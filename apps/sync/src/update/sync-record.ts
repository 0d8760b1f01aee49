import { cacheFileName, readCachedAddress, writeCachedAddress } from "../cache/store";
import type { AddressRecordType, CloudflareClient } from "../cloudflare/client";
import type { DnsRecordConfig } from "../config";
import { describeError, type Logger } from "../logger";
import type { Notifier } from "../notify/webhooks";
import { applyRecordAddress } from "./apply";

export type RecordOutcomeKind = "skipped" | "updated" | "failed";

export type RecordOutcome = {
  readonly kind: RecordOutcomeKind;
  readonly recordType: AddressRecordType;
  readonly recordId: string;
  readonly recordName: string;
  readonly address: string;
  readonly previousAddress?: string;
  readonly cacheWriteFailed?: boolean;
};

export type RecordSyncContext = {
  readonly logger: Logger;
  readonly cloudflare: CloudflareClient;
  readonly notifier: Notifier;
  readonly recordType: AddressRecordType;
  readonly cachePath: string;
  readonly currentAddress: string;
};

const readCacheTolerantly = async (logger: Logger, cachePath: string, fileName: string): Promise<string> => {
  try {
    return await readCachedAddress(cachePath, fileName);
  } catch (error) {
    logger.warn("⚠️ Failed to read cached IP for record", describeError(error));
    return "";
  }
};

/**
 * Brings one record in line with `currentAddress`. The cache is written and
 * webhooks are notified only after the provider accepted the update.
 */
export const syncRecord = async (context: RecordSyncContext, record: DnsRecordConfig): Promise<RecordOutcome> => {
  const { recordType, cachePath, currentAddress } = context;
  const logger = context.logger.child({ record_id: record.recordId, record_name: record.name });
  const base = {
    recordType,
    recordId: record.recordId,
    recordName: record.name,
    address: currentAddress
  };

  const fileName = cacheFileName(recordType, record);
  const cachedAddress = await readCacheTolerantly(logger, cachePath, fileName);
  if (cachedAddress === currentAddress) {
    logger.info("⏭️ IP address unchanged for record, skipping update", { ip: currentAddress });
    return { ...base, kind: "skipped" };
  }

  logger.info("🛠 Updating DNS record", { old_ip: cachedAddress, new_ip: currentAddress });
  try {
    await applyRecordAddress(context.cloudflare, record, recordType, currentAddress);
  } catch (error) {
    logger.error("💥 Failed to update DNS record", describeError(error));
    return { ...base, kind: "failed", previousAddress: cachedAddress };
  }
  logger.info("✅ Successfully updated DNS record", { ip: currentAddress });

  let cacheWriteFailed = false;
  if (cachePath.length > 0) {
    try {
      await writeCachedAddress(cachePath, fileName, currentAddress);
      logger.info("💾 Cached new IP address for record", { ip: currentAddress });
    } catch (error) {
      cacheWriteFailed = true;
      logger.warn("⚠️ Failed to save cached IP for record", describeError(error));
    }
  } else {
    logger.info("Not caching IP address because DDNS_CACHE_PATH is not set", { ip: currentAddress });
  }

  if (record.webhooks.length > 0) {
    await context.notifier.broadcast(
      logger,
      { recordName: record.name, recordType, address: currentAddress },
      record.webhooks
    );
  }

  return { ...base, kind: "updated", previousAddress: cachedAddress, cacheWriteFailed };
};
