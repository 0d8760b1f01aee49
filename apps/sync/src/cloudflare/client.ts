import { type HttpClient, HttpRequestError } from "../http/client";

export type CloudflareErrorItem = {
  readonly code: number;
  readonly message: string;
};

type CloudflareResponse = {
  readonly success?: boolean;
  readonly errors?: readonly CloudflareErrorItem[];
};

export type AddressRecordType = "A" | "AAAA";

export type DnsRecordInput = {
  readonly type: AddressRecordType;
  readonly name: string;
  readonly content: string;
  readonly ttl: number;
};

export type RecordTarget = {
  readonly apiToken: string;
  readonly zoneId: string;
  readonly recordId: string;
};

export class CloudflareApiError extends Error {
  public readonly status: number;

  public readonly errors: readonly CloudflareErrorItem[];

  public readonly body?: string;

  constructor(message: string, status: number, errors: readonly CloudflareErrorItem[], body?: string) {
    super(message);
    this.name = "CloudflareApiError";
    this.status = status;
    this.errors = errors;
    this.body = body;
  }
}

export const CLOUDFLARE_API_URL = "https://api.cloudflare.com/client/v4";

const isErrorItem = (value: unknown): value is CloudflareErrorItem =>
  typeof value === "object" &&
  value !== null &&
  "code" in value &&
  "message" in value &&
  typeof value.code === "number" &&
  typeof value.message === "string";

const parseResponse = (rawBody: string): CloudflareResponse | null => {
  if (rawBody.trim().length === 0) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) {
    return null;
  }
  const success = "success" in parsed && typeof parsed.success === "boolean" ? parsed.success : undefined;
  const errors = "errors" in parsed && Array.isArray(parsed.errors) ? parsed.errors.filter(isErrorItem) : [];
  return { success, errors };
};

const toApiError = (status: number, rawBody: string, parsed: CloudflareResponse | null): CloudflareApiError => {
  const errors = parsed?.errors ?? [];
  const first = errors[0];
  if (first !== undefined) {
    return new CloudflareApiError(`API error: ${first.message} (code: ${first.code})`, status, errors, rawBody);
  }
  return new CloudflareApiError(`API error: ${status} ${rawBody}`, status, errors, rawBody);
};

export class CloudflareClient {
  private readonly http: HttpClient;

  private readonly baseUrl: string;

  constructor(http: HttpClient, baseUrl: string = CLOUDFLARE_API_URL) {
    this.http = http;
    this.baseUrl = baseUrl;
  }

  /**
   * Replaces the content of one existing record. Authenticates with the
   * token of the record itself, so records may live in different accounts.
   */
  public async updateDnsRecord(target: RecordTarget, input: DnsRecordInput): Promise<void> {
    const url = `${this.baseUrl}/zones/${target.zoneId}/dns_records/${target.recordId}`;
    let response: Response;
    try {
      response = await this.http.send(url, {
        method: "PUT",
        headers: {
          Authorization: `Bearer ${target.apiToken}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify(input)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new HttpRequestError(`request failed: ${reason}`, url, error instanceof HttpRequestError && error.timedOut, error);
    }

    const rawBody = await response.text();
    const parsed = parseResponse(rawBody);
    if (response.status >= 400) {
      throw toApiError(response.status, rawBody, parsed);
    }
    if (parsed !== null && parsed.success === false) {
      throw toApiError(response.status, rawBody, parsed);
    }
  }
}
