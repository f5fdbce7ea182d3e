import { InvalidStateError } from "./errors.js";

// ---------------------------------------------------------------------------
// Pure helpers for runtime version ids (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Converts a Proton directory or tag name into a URL-safe slug.
 *
 * Examples:
 *   "Proton 9.0"            → "proton-9-0"
 *   "Proton 8.0-5"          → "proton-8-0-5"
 *   "Proton - Experimental" → "proton-experimental"
 */
export function buildRuntimeId(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Maps an upstream release tag to the version id games declare.
 * GE-Proton tags collapse to "ge-<major>.<minor>"; anything else is slugged.
 *
 *   "GE-Proton8-26"  → "ge-8.26"
 *   "GE-Proton10-1"  → "ge-10.1"
 *   "Proton 9.0"     → "proton-9-0"
 */
export function releaseTagToVersionId(tag: string): string {
  const ge = tag.trim().match(/^GE-Proton(\d+)-(\d+)$/i);
  if (ge) return `ge-${ge[1]}.${ge[2]}`;
  return buildRuntimeId(tag);
}

/**
 * Extracts a numeric sort key from a runtime name so newer versions sort
 * first. Falls back to 0 for names with no recognisable version numbers.
 *
 *   "Proton 9.0"    → 9000
 *   "GE-Proton9-20" → 9020
 *   "ge-8.26"       → 8026
 */
export function runtimeSortKey(name: string): number {
  const match = name.match(/(\d+)[.\-](\d+)/);
  if (!match) {
    const single = name.match(/(\d+)/);
    return single ? parseInt(single[1], 10) * 1000 : 0;
  }
  return parseInt(match[1], 10) * 1000 + parseInt(match[2], 10);
}

const SAFE_ID = /^[a-z0-9][a-z0-9._-]*$/i;

/** True when `id` can be used verbatim as a directory name under the cache root. */
export function isSafeVersionId(id: string): boolean {
  return id.length <= 128 && SAFE_ID.test(id) && !id.includes("..");
}

export function assertSafeVersionId(id: string): void {
  if (!isSafeVersionId(id)) {
    throw new InvalidStateError(`Invalid runtime version id "${id}"`);
  }
}
