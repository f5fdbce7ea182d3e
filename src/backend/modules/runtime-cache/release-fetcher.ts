/**
 * ============================================================
 *  Release Fetcher — download one runtime asset into staging
 * ============================================================
 *
 * Streams the asset to the staging archive path while hashing it,
 * so verification never re-reads the file. Every attempt starts
 * from byte 0: partial data from a failed attempt is overwritten,
 * never resumed.
 *
 * Retry policy:
 *   retried   — transport errors, per-attempt timeout, HTTP 408/429/5xx
 *   terminal  — HTTP 404/410 (NotFoundError), other 4xx (NetworkError),
 *               disk errors (DiskError), caller abort (CancelledError)
 *   delay     — backoffBaseMs × 2^(attempt-1), capped at backoffMaxMs
 * ============================================================
 */
import { createHash } from "crypto";
import { createWriteStream } from "fs";
import { pipeline } from "stream/promises";
import { setTimeout as delay } from "timers/promises";
import type { FetchedPayload, RegistryEntry, StagingHandle, DigestAlgorithm } from "./types.js";
import type { HttpClient } from "./http.js";
import { nodeFetchClient } from "./http.js";
import {
  CancelledError,
  DiskError,
  NetworkError,
  NotFoundError,
  RuntimeError,
  errorMessage,
  isDiskFailure,
} from "./errors.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "release-fetcher" });

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Upper bound for one attempt, headers through last byte */
  attemptTimeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffBaseMs: 1_000,
  backoffMaxMs: 30_000,
  attemptTimeoutMs: 10 * 60 * 1_000,
};

export type ProgressListener = (bytesDone: number, bytesTotal: number) => void;

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface ReleaseFetcherOptions {
  http?: HttpClient;
  policy?: Partial<RetryPolicy>;
  sleep?: Sleep;
}

// ---------------------------------------------------------------------------
// Pure helpers (exported for unit testing)
// ---------------------------------------------------------------------------

/** Delay before the next attempt, after `failedAttempt` (1-based) failed. */
export function backoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  return Math.min(policy.backoffBaseMs * 2 ** (failedAttempt - 1), policy.backoffMaxMs);
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function isRetryable(err: RuntimeError): boolean {
  return err instanceof NetworkError && err.retryable;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

// ---------------------------------------------------------------------------
// ReleaseFetcher
// ---------------------------------------------------------------------------

export class ReleaseFetcher {
  readonly policy: RetryPolicy;
  private readonly http: HttpClient;
  private readonly sleep: Sleep;

  constructor(opts: ReleaseFetcherOptions = {}) {
    this.http = opts.http ?? nodeFetchClient;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...opts.policy };
    this.sleep = opts.sleep ?? defaultSleep;
  }

  /**
   * Downloads `entry.assetUrl` into `handle.archivePath`.
   * Resolves with the byte count and digest; the Cache Store decides
   * whether they match what the registry declared.
   */
  async fetch(
    entry: RegistryEntry,
    handle: StagingHandle,
    signal: AbortSignal,
    onProgress?: ProgressListener
  ): Promise<FetchedPayload> {
    for (let attempt = 1; ; attempt++) {
      if (signal.aborted) throw new CancelledError(`Download of "${entry.id}" cancelled`);

      try {
        const payload = await this.attempt(entry, handle, signal, onProgress);
        log.info({ versionId: entry.id, attempt, bytes: payload.bytes }, "Download complete");
        return payload;
      } catch (err) {
        const failure = err instanceof RuntimeError ? err : new NetworkError(errorMessage(err), { retryable: false, cause: err });
        if (!isRetryable(failure) || attempt >= this.policy.maxAttempts) {
          log.warn({ versionId: entry.id, attempt, code: failure.code, err: failure.message }, "Download failed");
          throw failure;
        }

        const wait = backoffDelay(this.policy, attempt);
        log.warn(
          { versionId: entry.id, attempt, retryInMs: wait, err: failure.message },
          "Transient download failure — retrying"
        );
        try {
          await this.sleep(wait, signal);
        } catch (sleepErr) {
          throw new CancelledError(`Download of "${entry.id}" cancelled during backoff: ${errorMessage(sleepErr)}`);
        }
      }
    }
  }

  private async attempt(
    entry: RegistryEntry,
    handle: StagingHandle,
    signal: AbortSignal,
    onProgress?: ProgressListener
  ): Promise<FetchedPayload> {
    const controller = new AbortController();
    let timedOut = false;
    const onAbort = () => controller.abort();
    signal.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.policy.attemptTimeoutMs);

    const algorithm: DigestAlgorithm =
      entry.integrity.kind === "digest" ? entry.integrity.algorithm : "sha256";
    const hash = createHash(algorithm);
    let bytes = 0;

    try {
      const res = await this.http(entry.assetUrl, { signal: controller.signal });

      if (res.status === 404 || res.status === 410) {
        throw new NotFoundError(`Asset for "${entry.id}" not found (${res.status}): ${entry.assetUrl}`);
      }
      if (!res.ok) {
        throw new NetworkError(`Download failed (${res.status} ${res.statusText}): ${entry.assetUrl}`, {
          status: res.status,
          retryable: isRetryableStatus(res.status),
        });
      }
      if (!res.body) {
        throw new NetworkError(`Response body is null for: ${entry.assetUrl}`, { retryable: true });
      }

      const declared = Number(res.headers.get("content-length"));
      const total = Number.isFinite(declared) && declared > 0 ? declared : entry.sizeBytes ?? 0;
      onProgress?.(0, total);

      await pipeline(
        res.body,
        async function* (source: AsyncIterable<string | Buffer>) {
          for await (const chunk of source) {
            const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
            hash.update(buf);
            bytes += buf.length;
            onProgress?.(bytes, total);
            yield buf;
          }
        },
        createWriteStream(handle.archivePath),
        { signal: controller.signal }
      );

      return { bytes, algorithm, digest: hash.digest("hex") };
    } catch (err) {
      throw this.classify(err, entry, signal, timedOut);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
    }
  }

  private classify(err: unknown, entry: RegistryEntry, signal: AbortSignal, timedOut: boolean): RuntimeError {
    if (signal.aborted) return new CancelledError(`Download of "${entry.id}" cancelled`);
    if (err instanceof RuntimeError) return err;
    if (timedOut) {
      return new NetworkError(`Download attempt timed out after ${this.policy.attemptTimeoutMs} ms`, {
        retryable: true,
        cause: err,
      });
    }
    if (isDiskFailure(err)) {
      return new DiskError(`Cannot write archive for "${entry.id}": ${errorMessage(err)}`, err);
    }
    // Connection reset, DNS hiccup, truncated body, …
    return new NetworkError(errorMessage(err), { retryable: true, cause: err });
  }
}
