import { readdirSync, existsSync, statSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import { buildRuntimeId, runtimeSortKey } from "./version-id.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "system-probe" });

// ---------------------------------------------------------------------------
// Known Steam root paths (checked in order)
// ---------------------------------------------------------------------------

export const STEAM_ROOTS: ReadonlyArray<string> = [
  join(homedir(), ".steam", "steam"),
  join(homedir(), ".local", "share", "Steam"),
  join(homedir(), ".var", "app", "com.valvesoftware.Steam", ".local", "share", "Steam"),
];

/** Sub-directories of a Steam root that hold Proton builds. */
const RUNTIME_DIRS: ReadonlyArray<string[]> = [
  ["steamapps", "common"],
  ["compatibilitytools.d"],
];

/** An unmanaged runtime found on the host — never evicted or modified. */
export interface SystemRuntime {
  id: string;
  path: string;
  label: string;
}

/** Returns the path of a usable unmanaged runtime, or null when there is none. */
export type SystemRuntimeProbe = () => string | null;

/**
 * Returns true when `dirPath` looks like a valid Proton installation.
 * The minimum requirement is the presence of the `proton` launch script.
 */
export function isProtonDirectory(dirPath: string): boolean {
  return existsSync(join(dirPath, "proton"));
}

/**
 * Lists all immediate child directories under `dir` that:
 *   1. Contain the word "proton" (case-insensitive)
 *   2. Are confirmed Proton installs (have a `proton` script)
 */
function scanRuntimeDir(dir: string): SystemRuntime[] {
  if (!existsSync(dir)) return [];

  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch (err) {
    log.debug({ dir, err }, "Cannot read runtime directory");
    return [];
  }

  const runtimes: SystemRuntime[] = [];
  for (const entry of entries) {
    if (!entry.toLowerCase().includes("proton")) continue;

    const fullPath = join(dir, entry);
    try {
      if (!statSync(fullPath).isDirectory()) continue;
    } catch {
      continue; // dangling symlink
    }

    if (!isProtonDirectory(fullPath)) continue;

    runtimes.push({ id: buildRuntimeId(entry), path: fullPath, label: entry });
  }
  return runtimes;
}

/**
 * Detects unmanaged Proton installs across the given Steam roots.
 * Results are deduplicated by absolute path and sorted newest-first.
 */
export function detectSystemRuntimes(roots: ReadonlyArray<string> = STEAM_ROOTS): SystemRuntime[] {
  const seen = new Set<string>();
  const runtimes: SystemRuntime[] = [];

  for (const root of roots) {
    for (const segments of RUNTIME_DIRS) {
      for (const runtime of scanRuntimeDir(join(root, ...segments))) {
        if (seen.has(runtime.path)) continue;
        seen.add(runtime.path);
        runtimes.push(runtime);
      }
    }
  }

  runtimes.sort((a, b) => runtimeSortKey(b.label) - runtimeSortKey(a.label));
  return runtimes;
}

export interface SystemProbeOptions {
  /** Explicit override; "" or undefined means none */
  explicitPath?: string;
  autoDetect: boolean;
  roots?: ReadonlyArray<string>;
}

/**
 * Builds the probe used for the last fallback tier.
 * An explicit path wins when it is a Proton directory; otherwise the newest
 * auto-detected install is used. Scans on every call so the result always
 * reflects the current filesystem state.
 */
export function createSystemRuntimeProbe(opts: SystemProbeOptions): SystemRuntimeProbe {
  return () => {
    if (opts.explicitPath) {
      if (isProtonDirectory(opts.explicitPath)) return opts.explicitPath;
      log.warn({ path: opts.explicitPath }, "Configured system runtime has no proton script — ignoring");
    }
    if (!opts.autoDetect) return null;
    return detectSystemRuntimes(opts.roots)[0]?.path ?? null;
  };
}
