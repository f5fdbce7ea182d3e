import type { VersionRequirement } from "./types.js";
import type { CacheState } from "./cache-store.js";

// ---------------------------------------------------------------------------
// Fallback policy
// ---------------------------------------------------------------------------

/** Requirement meaning "any usable runtime", preferring the current one. */
export const ANY_REQUIREMENT = "any";
/** Requirement meaning "use the host's own Proton install". */
export const SYSTEM_REQUIREMENT = "system";

/**
 * One attempt in a resolution plan. The resolver walks the plan in order
 * and stops at the first step that yields a usable path.
 */
export type PlanStep =
  /** Exact version already installed — no network */
  | { kind: "cached"; versionId: string }
  /** Exact version not cached — look it up in the registry, then download */
  | { kind: "download"; versionId: string }
  /** Another cached version, flagged as a substitution */
  | { kind: "alternate"; versionId: string }
  /** Unmanaged runtime found on the host, flagged as a fallback */
  | { kind: "system"; path: string }
  | { kind: "unavailable" };

/** Most-recently-used installed version other than `excludeId`. */
function mostRecentAlternate(cache: CacheState, excludeId: string | null): string | null {
  return cache.installed.find((e) => e.versionId !== excludeId)?.versionId ?? null;
}

/**
 * Builds the ordered list of attempts for a requirement.
 *
 *   exact id:  [cached] → download → alternate → system → unavailable
 *   "any":     current (or MRU) cached → system → unavailable
 *   "system":  system → MRU cached alternate → unavailable
 *
 * Pure: the registry is consulted lazily by the resolver when it reaches
 * a download step, so a plan never costs a network call to build.
 */
export function decide(
  requirement: VersionRequirement,
  cache: CacheState,
  systemRuntimePath: string | null
): PlanStep[] {
  const plan: PlanStep[] = [];
  const wanted = requirement.trim();

  if (wanted === "" || wanted.toLowerCase() === ANY_REQUIREMENT) {
    const preferred =
      cache.current && cache.installed.some((e) => e.versionId === cache.current)
        ? cache.current
        : mostRecentAlternate(cache, null);
    if (preferred) plan.push({ kind: "cached", versionId: preferred });
    if (systemRuntimePath) plan.push({ kind: "system", path: systemRuntimePath });
    plan.push({ kind: "unavailable" });
    return plan;
  }

  if (wanted.toLowerCase() === SYSTEM_REQUIREMENT) {
    if (systemRuntimePath) plan.push({ kind: "system", path: systemRuntimePath });
    const alternate = mostRecentAlternate(cache, null);
    if (alternate) plan.push({ kind: "alternate", versionId: alternate });
    plan.push({ kind: "unavailable" });
    return plan;
  }

  // A cached entry can still be evicted before the resolver leases it,
  // so the download step stays behind it as the next tier.
  if (cache.installed.some((e) => e.versionId === wanted)) {
    plan.push({ kind: "cached", versionId: wanted });
  }
  plan.push({ kind: "download", versionId: wanted });

  const alternate = mostRecentAlternate(cache, wanted);
  if (alternate) plan.push({ kind: "alternate", versionId: alternate });
  if (systemRuntimePath) plan.push({ kind: "system", path: systemRuntimePath });
  plan.push({ kind: "unavailable" });
  return plan;
}
