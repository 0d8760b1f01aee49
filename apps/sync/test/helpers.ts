import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger, type Logger } from "../src/logger";

export type CapturedLine = {
  readonly level: string;
  readonly message: string;
  readonly [key: string]: unknown;
};

export const captureLogger = (): { readonly logger: Logger; readonly lines: CapturedLine[] } => {
  const lines: CapturedLine[] = [];
  const logger = createLogger({
    level: "debug",
    sink: (_level, line) => {
      lines.push(JSON.parse(line));
    }
  });
  return { logger, lines };
};

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });

export const textResponse = (body: string, status = 200): Response => new Response(body, { status });

export const makeTempDir = (): Promise<string> => mkdtemp(join(tmpdir(), "ipsync-test-"));

export const removeDir = (path: string): Promise<void> => rm(path, { recursive: true, force: true });
