import type { AddressRecordType } from "../cloudflare/client";
import type { HttpClient } from "../http/client";

export const DISCOVERY_ENDPOINTS: Record<AddressRecordType, string> = {
  A: "https://api.ipify.org",
  AAAA: "https://api6.ipify.org"
};

/**
 * Fetches the public address reported by `endpoint`. The body is trimmed and
 * otherwise passed through untouched; only a 200 response counts.
 */
export const resolveAddress = async (http: HttpClient, endpoint: string): Promise<string> => {
  let response: Response;
  try {
    response = await http.send(endpoint, { method: "GET" });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`failed to request IP: ${reason}`, { cause: error });
  }
  if (response.status !== 200) {
    throw new Error(`IP service returned status code ${response.status}`);
  }
  const text = await response.text();
  return text.trim();
};
