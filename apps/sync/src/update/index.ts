import type { AddressRecordType, CloudflareClient } from "../cloudflare/client";
import type { DnsConfiguration, DnsRecordConfig } from "../config";
import type { HttpClient } from "../http/client";
import { describeError, type Logger } from "../logger";
import type { Notifier } from "../notify/webhooks";
import { DISCOVERY_ENDPOINTS, resolveAddress } from "./ip-resolver";
import { type RecordOutcome, type RecordOutcomeKind, syncRecord } from "./sync-record";

export type FamilySummary = {
  readonly recordType: AddressRecordType;
  readonly recordCount: number;
  readonly aborted: boolean;
  readonly address?: string;
  readonly outcomes: readonly RecordOutcome[];
};

export type SyncSummary = {
  readonly timestamp: string;
  readonly durationMs: number;
  readonly families: readonly FamilySummary[];
};

export type FamilySyncOptions = {
  readonly logger: Logger;
  readonly http: HttpClient;
  readonly cloudflare: CloudflareClient;
  readonly notifier: Notifier;
  readonly records: readonly DnsRecordConfig[];
  readonly recordType: AddressRecordType;
  readonly cachePath: string;
  readonly discoveryEndpoint: string;
};

export const summarizeOutcomeKinds = (entries: readonly RecordOutcome[]): Record<RecordOutcomeKind, number> => {
  const counts: Record<RecordOutcomeKind, number> = {
    skipped: 0,
    updated: 0,
    failed: 0
  };
  for (const entry of entries) {
    counts[entry.kind] += 1;
  }
  return counts;
};

const failedOutcome = (recordType: AddressRecordType, record: DnsRecordConfig, address: string): RecordOutcome => ({
  kind: "failed",
  recordType,
  recordId: record.recordId,
  recordName: record.name,
  address
});

/**
 * Resolves the family's address once, then syncs every record concurrently.
 * A discovery failure aborts the family; a record failure only that record.
 */
export const syncAddressFamily = async (options: FamilySyncOptions): Promise<FamilySummary> => {
  const { recordType, records } = options;
  const logger = options.logger.child({ record_type: recordType });

  let address: string;
  try {
    address = await resolveAddress(options.http, options.discoveryEndpoint);
  } catch (error) {
    logger.error("💥 Failed to get current IP address", describeError(error));
    return { recordType, recordCount: records.length, aborted: true, outcomes: [] };
  }
  logger.info("🌐 Public IP resolved", { ip: address });

  const context = {
    logger,
    cloudflare: options.cloudflare,
    notifier: options.notifier,
    recordType,
    cachePath: options.cachePath,
    currentAddress: address
  };
  const outcomes = await Promise.all(
    records.map(async (record) => {
      try {
        return await syncRecord(context, record);
      } catch (error) {
        logger.error("💥 Record sync crashed", {
          record_id: record.recordId,
          record_name: record.name,
          ...describeError(error)
        });
        return failedOutcome(recordType, record, address);
      }
    })
  );

  logger.info("✅ Address family synced", {
    recordCount: records.length,
    ...summarizeOutcomeKinds(outcomes)
  });
  return { recordType, recordCount: records.length, aborted: false, address, outcomes };
};

export type SyncOptions = {
  readonly logger: Logger;
  readonly http: HttpClient;
  readonly cloudflare: CloudflareClient;
  readonly notifier: Notifier;
  readonly configuration: DnsConfiguration;
  readonly cachePath: string;
  readonly discoveryEndpoints?: Partial<Record<AddressRecordType, string>>;
};

export const performSync = async (options: SyncOptions): Promise<SyncSummary> => {
  const startedAt = Date.now();
  const { logger, configuration } = options;
  const groups: readonly [AddressRecordType, readonly DnsRecordConfig[]][] = [
    ["A", configuration.a],
    ["AAAA", configuration.aaaa]
  ];

  const tasks: Promise<FamilySummary>[] = [];
  for (const [recordType, records] of groups) {
    if (records.length === 0) {
      continue;
    }
    logger.info(`🚀 Updating ${recordType} records`, { count: records.length });
    tasks.push(
      syncAddressFamily({
        logger,
        http: options.http,
        cloudflare: options.cloudflare,
        notifier: options.notifier,
        records,
        recordType,
        cachePath: options.cachePath,
        discoveryEndpoint: options.discoveryEndpoints?.[recordType] ?? DISCOVERY_ENDPOINTS[recordType]
      })
    );
  }
  const families = await Promise.all(tasks);

  const summary: SyncSummary = {
    timestamp: new Date(startedAt).toISOString(),
    durationMs: Date.now() - startedAt,
    families
  };
  logger.info("🏁 DNS sync finished", {
    durationMs: summary.durationMs,
    abortedFamilies: families.filter((family) => family.aborted).map((family) => family.recordType),
    ...summarizeOutcomeKinds(families.flatMap((family) => family.outcomes))
  });
  return summary;
};
