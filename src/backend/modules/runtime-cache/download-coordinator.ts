/**
 * ============================================================
 *  Download Coordinator — one fetch per version, many waiters
 * ============================================================
 *
 * request() either joins the task already running for a version
 * id or starts a new one (beginInstall → fetch → commitInstall).
 * Tasks are registered synchronously, before the first await, so
 * two requests in the same tick can never start two fetches.
 *
 * Every subscriber gets its own promise that settles exactly once
 * with the task's shared outcome. Cancelling a subscription only
 * detaches that subscriber; the fetch itself is aborted when the
 * last subscriber leaves, and its staging is then discarded.
 * A request arriving while an aborted task is still cleaning up
 * starts a fresh task that waits for that cleanup first.
 * ============================================================
 */
import type { InstallState, ProgressSnapshot, RegistryEntry, StagingHandle } from "./types.js";
import type { CacheStore } from "./cache-store.js";
import type { ReleaseFetcher } from "./release-fetcher.js";
import { CancelledError, toRuntimeError } from "./errors.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "download-coordinator" });

/** Emit at most one progress event per this many bytes while downloading. */
const DEFAULT_PROGRESS_STEP_BYTES = 1024 * 1024;

export interface Subscription {
  readonly id: number;
  readonly versionId: string;
  /** Resolves with the installed directory; rejects with a RuntimeError. */
  readonly result: Promise<string>;
  cancel(): void;
}

export type ProgressEventListener = (snapshot: ProgressSnapshot) => void;

export interface DownloadCoordinatorOptions {
  onProgress?: ProgressEventListener;
  progressStepBytes?: number;
}

interface Subscriber {
  resolve(path: string): void;
  reject(err: Error): void;
  detach(): void;
}

interface TaskState {
  versionId: string;
  controller: AbortController;
  subscribers: Map<number, Subscriber>;
  state: InstallState;
  bytesDone: number;
  bytesTotal: number;
  lastEmittedBytes: number;
}

type Task = TaskState & { promise: Promise<string> };

export class DownloadCoordinator {
  private readonly tasks = new Map<string, Task>();
  /** Aborted tasks still discarding their staging */
  private readonly draining = new Map<string, Task>();
  private readonly finished = new Map<string, ProgressSnapshot>();
  private readonly onProgress: ProgressEventListener | undefined;
  private readonly progressStepBytes: number;
  private nextSubscriptionId = 1;

  constructor(
    private readonly store: CacheStore,
    private readonly fetcher: ReleaseFetcher,
    opts: DownloadCoordinatorOptions = {}
  ) {
    this.onProgress = opts.onProgress;
    this.progressStepBytes = opts.progressStepBytes ?? DEFAULT_PROGRESS_STEP_BYTES;
  }

  // ── Public API ────────────────────────────────────────────────────────────

  /**
   * Subscribes to the install of `entry`. Aborting `signal` is the same as
   * calling cancel() on the returned subscription.
   */
  request(entry: RegistryEntry, signal?: AbortSignal): Subscription {
    const id = this.nextSubscriptionId++;
    const versionId = entry.id;

    const installed = this.store.path(versionId);
    if (installed) {
      return { id, versionId, result: Promise.resolve(installed), cancel: () => undefined };
    }
    if (signal?.aborted) {
      return {
        id,
        versionId,
        result: Promise.reject(new CancelledError(`Request for "${versionId}" cancelled`)),
        cancel: () => undefined,
      };
    }

    const existing = this.tasks.get(versionId);
    const task = existing ?? this.start(entry);
    if (existing) log.debug({ versionId, subscribers: existing.subscribers.size + 1 }, "Joined in-flight download");

    return this.subscribe(task, id, signal);
  }

  /** Detaches one subscriber. */
  cancel(subscription: Subscription): void {
    subscription.cancel();
  }

  /** Bytes and state for UI polling. */
  progress(versionId: string): ProgressSnapshot {
    const task = this.tasks.get(versionId);
    if (task) return this.snapshot(task, null);

    const state = this.store.has(versionId);
    const last = this.finished.get(versionId);
    const recorded = this.store.record(versionId)?.bytes;
    const bytes = last?.bytesDone ?? recorded ?? 0;

    return {
      versionId,
      state,
      bytesDone: state === "installed" ? recorded ?? bytes : bytes,
      bytesTotal: state === "installed" ? recorded ?? last?.bytesTotal ?? 0 : last?.bytesTotal ?? 0,
      subscribers: 0,
      error: state === "failed" ? this.store.lastError(versionId) ?? last?.error ?? null : null,
    };
  }

  isActive(versionId: string): boolean {
    return this.tasks.has(versionId);
  }

  /** True while an aborted download is still removing its staging files. */
  isDraining(versionId: string): boolean {
    return this.draining.has(versionId);
  }

  activeTaskCount(): number {
    return this.tasks.size;
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private start(entry: RegistryEntry): Task {
    const state: TaskState = {
      versionId: entry.id,
      controller: new AbortController(),
      subscribers: new Map(),
      state: "staging",
      bytesDone: 0,
      bytesTotal: entry.sizeBytes ?? 0,
      lastEmittedBytes: 0,
    };
    this.finished.delete(entry.id);

    const prior = this.draining.get(entry.id)?.promise ?? null;
    const task: Task = Object.assign(state, { promise: this.run(state, entry, prior) });
    this.tasks.set(entry.id, task);

    log.info({ versionId: entry.id, url: entry.assetUrl }, "Download started");
    this.emit(task, null);
    return task;
  }

  private subscribe(task: Task, id: number, signal?: AbortSignal): Subscription {
    const cancel = () => {
      const sub = task.subscribers.get(id);
      if (!sub) return;
      task.subscribers.delete(id);
      sub.detach();
      sub.reject(new CancelledError(`Request for "${task.versionId}" cancelled`));

      if (task.subscribers.size === 0 && this.tasks.get(task.versionId) === task) {
        log.info({ versionId: task.versionId }, "Last subscriber left — aborting download");
        this.tasks.delete(task.versionId);
        this.draining.set(task.versionId, task);
        task.controller.abort();
      } else {
        this.emit(task, null);
      }
    };
    const onAbort = () => cancel();

    const result = new Promise<string>((resolve, reject) => {
      task.subscribers.set(id, {
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      });
    });
    // Callers may cancel and drop `result`; awaiting it still rejects.
    void result.catch(() => undefined);
    signal?.addEventListener("abort", onAbort, { once: true });

    const settle = (outcome: { path: string } | { error: Error }) => {
      const sub = task.subscribers.get(id);
      if (!sub) return;
      task.subscribers.delete(id);
      sub.detach();
      if ("path" in outcome) sub.resolve(outcome.path);
      else sub.reject(outcome.error);
    };
    void task.promise.then(
      (path) => settle({ path }),
      (err: unknown) => settle({ error: toRuntimeError(err) })
    );

    return { id, versionId: task.versionId, result, cancel };
  }

  private async run(task: TaskState, entry: RegistryEntry, prior: Promise<string> | null): Promise<string> {
    const { versionId, controller } = task;
    const signal = controller.signal;
    let handle: StagingHandle | null = null;

    try {
      // Settles once the aborted attempt has released its staging.
      if (prior) await prior.then(() => undefined, () => undefined);
      signal.throwIfAborted();

      handle = await this.store.beginInstall(versionId);

      const payload = await this.fetcher.fetch(entry, handle, signal, (done, total) => {
        task.bytesDone = done;
        task.bytesTotal = total;
        const step = Math.max(this.progressStepBytes, Math.floor(total / 100));
        if (done === 0 || done === total || done - task.lastEmittedBytes >= step) {
          task.lastEmittedBytes = done;
          this.emit(task, null);
        }
      });

      task.state = "verifying";
      this.store.markVerifying(handle);
      this.emit(task, null);

      const path = await this.store.commitInstall(handle, entry.integrity, payload, signal);
      this.finish(task, "installed", null);
      return path;
    } catch (err) {
      const failure = signal.aborted
        ? new CancelledError(`Download of "${versionId}" cancelled`)
        : toRuntimeError(err);
      const cancelled = failure.code === "Cancelled";

      if (handle) {
        await this.store.discardInstall(handle, cancelled ? "cancelled" : "failed", failure.message);
      }
      this.finish(task, cancelled ? "missing" : "failed", cancelled ? null : failure.message);

      if (cancelled) log.info({ versionId }, "Download cancelled");
      else log.error({ versionId, code: failure.code, err: failure.message }, "Download failed");
      throw failure;
    }
  }

  private finish(task: TaskState, state: InstallState, error: string | null): void {
    task.state = state;
    const snapshot = this.snapshot(task, error);
    this.finished.set(task.versionId, snapshot);
    if (this.tasks.get(task.versionId) === task) this.tasks.delete(task.versionId);
    if (this.draining.get(task.versionId) === task) this.draining.delete(task.versionId);
    this.emitSnapshot(snapshot);
  }

  private snapshot(task: TaskState, error: string | null): ProgressSnapshot {
    return {
      versionId: task.versionId,
      state: task.state,
      bytesDone: task.bytesDone,
      bytesTotal: task.bytesTotal,
      subscribers: task.subscribers.size,
      error,
    };
  }

  private emit(task: TaskState, error: string | null): void {
    this.emitSnapshot(this.snapshot(task, error));
  }

  private emitSnapshot(snapshot: ProgressSnapshot): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(snapshot);
    } catch (err) {
      log.warn({ err }, "Progress listener threw");
    }
  }
}
