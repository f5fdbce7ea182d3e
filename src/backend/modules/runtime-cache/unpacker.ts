import { spawn } from "child_process";
import { CancelledError, DiskError } from "./errors.js";

// ---------------------------------------------------------------------------
// Archive unpacking
// ---------------------------------------------------------------------------

/**
 * Extracts a downloaded archive into `destDir` (which already exists).
 * Must reject on failure so the staging directory is discarded.
 */
export type Unpacker = (archivePath: string, destDir: string, signal?: AbortSignal) => Promise<void>;

/**
 * Unpacks with the system `tar`. Release tarballs contain a single top-level
 * directory (e.g. GE-Proton8-26/), which is stripped so the `proton` script
 * lands directly in the version directory. tar detects gz/xz/zst itself.
 */
export const tarUnpacker: Unpacker = (archivePath, destDir, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const child = spawn("tar", ["-xf", archivePath, "-C", destDir, "--strip-components=1"], {
      stdio: ["ignore", "ignore", "pipe"],
      signal,
    });

    let stderr = "";
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (err) => {
      if (signal?.aborted) reject(new CancelledError());
      else reject(new DiskError(`Failed to run tar: ${err.message}`, err));
    });

    child.on("exit", (code, sig) => {
      if (code === 0) {
        resolve();
        return;
      }
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      reject(new DiskError(`tar exited with ${code ?? sig}: ${stderr.trim()}`));
    });
  });
