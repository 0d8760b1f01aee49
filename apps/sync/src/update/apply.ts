import type { DnsRecordConfig } from "../config";
import type { AddressRecordType, CloudflareClient } from "../cloudflare/client";

// Cloudflare treats a TTL of 1 as "automatic".
export const AUTO_TTL = 1;

export const applyRecordAddress = async (
  client: CloudflareClient,
  record: DnsRecordConfig,
  recordType: AddressRecordType,
  address: string
): Promise<void> => {
  await client.updateDnsRecord(
    {
      apiToken: record.apiToken,
      zoneId: record.zoneId,
      recordId: record.recordId
    },
    {
      type: recordType,
      name: record.name,
      content: address,
      ttl: AUTO_TTL
    }
  );
};
