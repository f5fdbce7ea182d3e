/**
 * ============================================================
 *  Runtime Manager — caller-facing entry point
 * ============================================================
 *
 * Owns one instance of every runtime-cache component and exposes
 * the operations a launcher or API layer consumes. There is no
 * module-level cache state: callers hold a RuntimeManager and pass
 * it where it is needed (see server.ts).
 * ============================================================
 */
import type { CacheEntry, ProgressSnapshot, RegistryEntry, ResolutionResult, VersionRequirement } from "./types.js";
import type { HttpClient } from "./http.js";
import type { Unpacker } from "./unpacker.js";
import type { RuntimeRegistry } from "./registry.js";
import type { SystemRuntimeProbe } from "./system-probe.js";
import { CacheStore } from "./cache-store.js";
import { ReleaseFetcher, type RetryPolicy, type Sleep } from "./release-fetcher.js";
import { DownloadCoordinator, type ProgressEventListener } from "./download-coordinator.js";
import { VersionResolver } from "./version-resolver.js";
import { createRegistry } from "./registry.js";
import { createSystemRuntimeProbe } from "./system-probe.js";
import { nodeFetchClient } from "./http.js";
import { resolveCacheRoot, type Settings } from "../settings/index.js";

export interface RuntimeManagerOptions {
  cacheRoot: string;
  registry: RuntimeRegistry;
  probe: SystemRuntimeProbe;
  http?: HttpClient;
  retry?: Partial<RetryPolicy>;
  unpacker?: Unpacker;
  onProgress?: ProgressEventListener;
  now?: () => number;
  sleep?: Sleep;
}

export class RuntimeManager {
  readonly store: CacheStore;
  readonly fetcher: ReleaseFetcher;
  readonly coordinator: DownloadCoordinator;
  readonly resolver: VersionResolver;
  readonly registry: RuntimeRegistry;

  constructor(opts: RuntimeManagerOptions) {
    this.registry = opts.registry;
    this.store = new CacheStore({ root: opts.cacheRoot, unpacker: opts.unpacker, now: opts.now });
    this.fetcher = new ReleaseFetcher({ http: opts.http, policy: opts.retry, sleep: opts.sleep });
    this.coordinator = new DownloadCoordinator(this.store, this.fetcher, { onProgress: opts.onProgress });
    this.resolver = new VersionResolver({
      store: this.store,
      coordinator: this.coordinator,
      registry: opts.registry,
      probe: opts.probe,
    });
  }

  /** Runs cache recovery. Call once before serving requests. */
  async init(): Promise<void> {
    await this.store.init();
  }

  /**
   * Resolves a requirement to a usable runtime path. Managed results carry
   * a lease that must be released once the runtime is no longer in use.
   */
  resolveRuntime(requirement: VersionRequirement, signal?: AbortSignal): Promise<ResolutionResult> {
    return this.resolver.resolve(requirement, signal);
  }

  getInstallProgress(versionId: string): ProgressSnapshot {
    return this.coordinator.progress(versionId);
  }

  listCached(): CacheEntry[] {
    return this.store.list();
  }

  evict(versionId: string): Promise<void> {
    return this.store.evict(versionId);
  }

  setCurrent(versionId: string): Promise<void> {
    return this.store.setCurrent(versionId);
  }

  currentVersion(): string | null {
    return this.store.current();
  }

  /** Versions the configured registry offers, newest first. */
  listAvailable(signal?: AbortSignal): Promise<RegistryEntry[]> {
    return this.registry.listVersions(signal);
  }
}

/** Wires a RuntimeManager from validated settings. */
export function createRuntimeManager(
  settings: Settings,
  extra: Pick<RuntimeManagerOptions, "onProgress" | "http" | "unpacker"> = {}
): RuntimeManager {
  const http = extra.http ?? nodeFetchClient;
  return new RuntimeManager({
    cacheRoot: resolveCacheRoot(settings),
    registry: createRegistry(settings.registry, http),
    probe: createSystemRuntimeProbe({
      explicitPath: settings.systemRuntimePath,
      autoDetect: settings.autoDetectSystemRuntime,
    }),
    http,
    retry: settings.download,
    unpacker: extra.unpacker,
    onProgress: extra.onProgress,
  });
}
