import http from "node:http";
import https from "node:https";
import { CancelledError, GeneratorError } from "../errors.js";
import { createLogger, truncate } from "../logger.js";

const log = createLogger("http");

export interface HttpRequestOptions {
  method: "GET" | "POST";
  url: string;
  body?: object;
  headers?: Record<string, string>;
  /** Socket idle timeout. For streams this bounds the gap between chunks. */
  timeoutMs: number;
  signal?: AbortSignal;
  /** Called for every non-empty line of a 2xx body as it arrives. */
  onLine?: (line: string) => void;
  /** Prefix for error messages (e.g. the generator name). */
  label: string;
}

/**
 * Send a request over node:http(s) and resolve with the full response body.
 *
 * Status >= 400 rejects with GeneratorError("status"), socket failures with
 * GeneratorError("connection"), an idle socket with GeneratorError("timeout")
 * and an aborted signal with CancelledError. An exception thrown by `onLine`
 * aborts the request and rejects with that exception.
 */
export function httpRequest(options: HttpRequestOptions): Promise<string> {
  const { method, url, body, timeoutMs, signal, onLine, label } = options;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const parsed = new URL(url);
    const isHttps = parsed.protocol === "https:";
    const transport = isHttps ? https : http;

    const headers: Record<string, string> = { Accept: "application/json", ...options.headers };
    const payload = body ? JSON.stringify(body) : undefined;
    if (payload) {
      headers["Content-Type"] = "application/json";
      headers["Content-Length"] = String(Buffer.byteLength(payload));
    }

    let settled = false;
    const finish = (err: Error | null, text?: string): void => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      if (err) reject(err);
      else resolve(text ?? "");
    };

    const req = transport.request(
      {
        hostname: parsed.hostname,
        port: parsed.port || (isHttps ? 443 : 80),
        path: parsed.pathname + parsed.search,
        method,
        headers,
        timeout: timeoutMs,
      },
      (res) => {
        res.setEncoding("utf8");
        const failed = res.statusCode !== undefined && res.statusCode >= 400;
        let data = "";
        let pending = "";

        const emit = (line: string): void => {
          const trimmed = line.trim();
          if (trimmed === "" || !onLine) return;
          try {
            onLine(trimmed);
          } catch (err) {
            req.destroy();
            finish(err instanceof Error ? err : new GeneratorError("protocol", String(err)));
          }
        };

        res.on("data", (chunk: string) => {
          data += chunk;
          if (failed) return;
          pending += chunk;
          const lines = pending.split("\n");
          pending = lines.pop() ?? "";
          for (const line of lines) emit(line);
        });
        res.on("end", () => {
          if (failed) {
            const err = new GeneratorError("status", `${label} API error ${res.statusCode}: ${truncate(data, 300)}`, {
              status: res.statusCode,
            });
            log.error(err.message);
            finish(err);
            return;
          }
          emit(pending);
          finish(null, data);
        });
        res.on("error", (err) => {
          finish(signal?.aborted ? new CancelledError() : new GeneratorError("connection", `${label}: ${err.message}`, { cause: err }));
        });
      },
    );

    function onAbort(): void {
      log.debug(label, "request aborted");
      req.destroy();
      finish(new CancelledError());
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    req.on("error", (err) => {
      if (signal?.aborted) {
        finish(new CancelledError());
        return;
      }
      log.error(label, `HTTP ${method} error:`, err.message);
      finish(new GeneratorError("connection", `${label}: ${err.message}`, { cause: err }));
    });
    req.on("timeout", () => {
      req.destroy();
      const err = new GeneratorError("timeout", `${label} request timeout after ${timeoutMs}ms`);
      log.error(err.message);
      finish(err);
    });

    if (payload) req.write(payload);
    req.end();
  });
}
