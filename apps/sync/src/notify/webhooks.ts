import type { AddressRecordType } from "../cloudflare/client";
import type { HttpClient } from "../http/client";
import { describeError, type Logger } from "../logger";

export const CHAT_WEBHOOK_PREFIX = "https://discord.com/api/webhooks/";

export type WebhookKind = "chat" | "generic";

export type ChatWebhookPayload = {
  readonly content: string;
};

export type GenericWebhookPayload = {
  readonly record_name: string;
  readonly record_type: AddressRecordType;
  readonly ip_address: string;
};

export type WebhookEvent = {
  readonly recordName: string;
  readonly recordType: AddressRecordType;
  readonly address: string;
};

export const classifyWebhook = (url: string): WebhookKind =>
  url.startsWith(CHAT_WEBHOOK_PREFIX) ? "chat" : "generic";

export const buildWebhookPayload = (
  kind: WebhookKind,
  event: WebhookEvent
): ChatWebhookPayload | GenericWebhookPayload => {
  if (kind === "chat") {
    return { content: event.address };
  }
  return {
    record_name: event.recordName,
    record_type: event.recordType,
    ip_address: event.address
  };
};

export type NotifierOptions = {
  readonly http: HttpClient;
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
};

export type Notifier = {
  readonly broadcast: (logger: Logger, event: WebhookEvent, endpoints: readonly string[]) => Promise<void>;
};

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const createNotifier = (options: NotifierOptions): Notifier => {
  const maxAttempts = options.maxAttempts ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const sleep = options.sleep ?? defaultSleep;

  const attempt = async (logger: Logger, url: string, body: string, attemptNumber: number): Promise<boolean> => {
    const startedAt = Date.now();
    logger.info("📨 Sending webhook", { attempt: attemptNumber, maxAttempts });
    try {
      const response = await options.http.send(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body
      });
      const responseTimeMs = Date.now() - startedAt;
      if (response.status >= 200 && response.status < 300) {
        logger.info("✅ Webhook sent", {
          attempt: attemptNumber,
          maxAttempts,
          status: response.status,
          responseTimeMs
        });
        return true;
      }
      const responseBody = await response.text();
      logger.error("Webhook returned non-OK status", {
        attempt: attemptNumber,
        maxAttempts,
        status: response.status,
        responseBody: responseBody.slice(0, 1024),
        responseTimeMs
      });
      return false;
    } catch (error) {
      logger.error("Webhook request failed", {
        attempt: attemptNumber,
        maxAttempts,
        responseTimeMs: Date.now() - startedAt,
        ...describeError(error)
      });
      return false;
    }
  };

  const deliver = async (logger: Logger, url: string, body: string): Promise<boolean> => {
    for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber += 1) {
      const delivered = await attempt(logger, url, body, attemptNumber);
      if (delivered) {
        return true;
      }
      if (attemptNumber < maxAttempts) {
        await sleep(baseDelayMs * attemptNumber);
      }
    }
    return false;
  };

  const notifyEndpoint = async (parent: Logger, url: string, event: WebhookEvent): Promise<void> => {
    const kind = classifyWebhook(url);
    const body = JSON.stringify(buildWebhookPayload(kind, event));
    const logger = parent.child({ url, payload: body });
    logger.info(kind === "chat" ? "Preparing chat webhook" : "Preparing standard webhook");
    const delivered = await deliver(logger, url, body);
    if (delivered) {
      logger.info("Webhook notification completed");
      return;
    }
    logger.error("💥 Webhook notification failed", { error: `webhook failed after ${maxAttempts} attempts` });
  };

  /**
   * Notifies every endpoint concurrently and settles once each one was
   * delivered or ran out of attempts. Delivery failures are only logged.
   */
  const broadcast = async (parent: Logger, event: WebhookEvent, endpoints: readonly string[]): Promise<void> => {
    if (endpoints.length === 0) {
      return;
    }
    const logger = parent.child({ component: "webhook" });
    logger.info("Starting webhook notifications", { webhookCount: endpoints.length });
    await Promise.all(endpoints.map((url) => notifyEndpoint(logger, url, event)));
    logger.info("Completed webhook notifications", { webhookCount: endpoints.length });
  };

  return { broadcast };
};
