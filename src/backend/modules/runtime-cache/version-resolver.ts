/**
 * ============================================================
 *  Version Resolver — "give me a usable runtime for R"
 * ============================================================
 *
 * Walks the fallback plan lazily:
 *
 *   cached     lease the installed version             → UsedRequested
 *   download   registry lookup, then coordinator fetch → UsedRequested
 *              (not in registry → next step, no fetch)
 *   alternate  lease the MRU cached version            → UsedCachedAlternate
 *   system     unmanaged host runtime                  → UsedSystemFallback
 *   otherwise                                          → Failed(RuntimeUnavailable)
 *
 * The signal is checked after every await; once it fires the result
 * is Failed(Cancelled) and any lease taken on the way is released.
 * ============================================================
 */
import type { ResolutionResult, RuntimeLease, VersionRequirement } from "./types.js";
import type { CacheStore } from "./cache-store.js";
import type { DownloadCoordinator } from "./download-coordinator.js";
import type { RuntimeRegistry } from "./registry.js";
import type { SystemRuntimeProbe } from "./system-probe.js";
import { findRegistryEntry } from "./registry.js";
import { decide } from "./fallback-policy.js";
import { NotFoundError, toRuntimeError, isAbortError } from "./errors.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "version-resolver" });

export interface VersionResolverDeps {
  store: CacheStore;
  coordinator: DownloadCoordinator;
  registry: RuntimeRegistry;
  probe: SystemRuntimeProbe;
}

function cancelled(requirement: VersionRequirement): ResolutionResult {
  return { kind: "Failed", reason: "Cancelled", message: `Resolution of "${requirement}" was cancelled` };
}

export class VersionResolver {
  constructor(private readonly deps: VersionResolverDeps) {}

  async resolve(requirement: VersionRequirement, signal?: AbortSignal): Promise<ResolutionResult> {
    if (signal?.aborted) return cancelled(requirement);

    const { store } = this.deps;
    const plan = decide(requirement, store.state(), this.deps.probe());
    let lastFailure: string | null = null;

    for (const step of plan) {
      if (signal?.aborted) return cancelled(requirement);

      switch (step.kind) {
        case "cached": {
          const lease = await this.tryLease(step.versionId);
          if (signal?.aborted) {
            lease?.release();
            return cancelled(requirement);
          }
          if (lease) {
            return { kind: "UsedRequested", versionId: lease.versionId, path: lease.path, lease };
          }
          break;
        }

        case "download": {
          try {
            const lease = await this.download(step.versionId, signal);
            if (signal?.aborted) {
              lease.release();
              return cancelled(requirement);
            }
            return { kind: "UsedRequested", versionId: lease.versionId, path: lease.path, lease };
          } catch (err) {
            const failure = toRuntimeError(err);
            if (signal?.aborted || failure.code === "Cancelled" || isAbortError(err)) {
              return cancelled(requirement);
            }
            lastFailure = failure.message;
            log.warn(
              { requirement, code: failure.code, err: failure.message },
              "Requested runtime unobtainable — trying fallbacks"
            );
          }
          break;
        }

        case "alternate": {
          const lease = await this.tryLease(step.versionId);
          if (signal?.aborted) {
            lease?.release();
            return cancelled(requirement);
          }
          if (lease) {
            log.warn({ requirement, substitute: lease.versionId }, "Using cached alternate runtime");
            return {
              kind: "UsedCachedAlternate",
              versionId: lease.versionId,
              requested: requirement,
              path: lease.path,
              lease,
            };
          }
          break;
        }

        case "system":
          log.warn({ requirement, path: step.path }, "Using unmanaged system runtime");
          return { kind: "UsedSystemFallback", path: step.path };

        case "unavailable":
          break;
      }
    }

    const message =
      `No usable runtime for "${requirement}"` + (lastFailure ? `: ${lastFailure}` : "");
    log.error({ requirement, lastFailure }, "Every runtime tier exhausted");
    return { kind: "Failed", reason: "RuntimeUnavailable", message };
  }

  /** Looks the id up in the registry and installs it through the coordinator. */
  private async download(versionId: string, signal?: AbortSignal): Promise<RuntimeLease> {
    const { store, coordinator, registry } = this.deps;

    const entry = await findRegistryEntry(registry, versionId, signal);
    if (!entry) {
      throw new NotFoundError(`"${versionId}" is not available from the ${registry.name} registry`);
    }
    signal?.throwIfAborted();

    const subscription = coordinator.request(entry, signal);
    await subscription.result;
    signal?.throwIfAborted();

    await store.setCurrent(versionId);
    return store.acquire(versionId);
  }

  /** Leases an installed version, or null when it disappeared meanwhile. */
  private async tryLease(versionId: string): Promise<RuntimeLease | null> {
    try {
      return await this.deps.store.acquire(versionId);
    } catch (err) {
      log.debug({ versionId, err }, "Cached runtime no longer leasable");
      return null;
    }
  }
}
