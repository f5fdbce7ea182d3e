import type { FastifyInstance, FastifyReply } from "fastify";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { RuntimeManager } from "../modules/runtime-cache/runtime-manager.js";
import type { ResolutionResult, RuntimeLease } from "../modules/runtime-cache/types.js";
import { RuntimeError } from "../modules/runtime-cache/errors.js";
import { isSafeVersionId } from "../modules/runtime-cache/version-id.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "api-runtimes" });

const ResolveBody = z.object({ requirement: z.string().trim().max(128) });
const CurrentBody = z.object({ versionId: z.string().min(1) });

// ---------------------------------------------------------------------------
// Helpers (exported for unit testing)
// ---------------------------------------------------------------------------

/** HTTP status for a runtime-cache error code. */
export function statusForError(err: RuntimeError): number {
  switch (err.code) {
    case "NotFoundError":
      return 404;
    case "Busy":
    case "AlreadyInstalling":
    case "InvalidState":
      return 409;
    case "Cancelled":
      return 400;
    case "NetworkError":
      return 502;
    case "RuntimeUnavailable":
      return 503;
    default:
      return 500;
  }
}

/** JSON view of a resolution — the lease itself stays server-side. */
export function serializeResolution(result: ResolutionResult, leaseId: string | null) {
  switch (result.kind) {
    case "UsedRequested":
      return { kind: result.kind, versionId: result.versionId, path: result.path, substituted: false, leaseId };
    case "UsedCachedAlternate":
      return {
        kind: result.kind,
        versionId: result.versionId,
        requested: result.requested,
        path: result.path,
        substituted: true,
        leaseId,
      };
    case "UsedSystemFallback":
      return { kind: result.kind, path: result.path, substituted: true, leaseId: null };
    case "Failed":
      return { kind: result.kind, reason: result.reason, message: result.message };
  }
}

function sendError(reply: FastifyReply, err: unknown) {
  if (err instanceof RuntimeError) {
    return reply.status(statusForError(err)).send({ error: err.message, code: err.code });
  }
  throw err;
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export const DEFAULT_LEASE_TTL_MS = 4 * 60 * 60 * 1_000;

export interface RuntimeRouteOptions {
  /** A lease neither released nor renewed within this window is released. */
  leaseTtlMs?: number;
}

interface HeldLease {
  lease: RuntimeLease;
  timer: NodeJS.Timeout;
}

export async function registerRuntimeRoutes(
  app: FastifyInstance,
  manager: RuntimeManager,
  options: RuntimeRouteOptions = {}
) {
  const leaseTtlMs = options.leaseTtlMs ?? DEFAULT_LEASE_TTL_MS;

  // Leases handed out over HTTP, released by DELETE /api/runtimes/leases/:leaseId
  // or by expiry
  const leases = new Map<string, HeldLease>();

  function holdLease(lease: RuntimeLease): string {
    const leaseId = uuidv4();
    const timer = setTimeout(() => {
      log.warn({ leaseId, versionId: lease.versionId, leaseTtlMs }, "Lease expired without release");
      dropLease(leaseId);
    }, leaseTtlMs);
    timer.unref();
    leases.set(leaseId, { lease, timer });
    return leaseId;
  }

  function dropLease(leaseId: string): RuntimeLease | null {
    const held = leases.get(leaseId);
    if (!held) return null;
    clearTimeout(held.timer);
    leases.delete(leaseId);
    held.lease.release();
    return held.lease;
  }

  app.addHook("onClose", async () => {
    for (const leaseId of [...leases.keys()]) dropLease(leaseId);
  });

  /**
   * POST /api/runtimes/resolve
   * Body: { requirement: string }  — e.g. "ge-8.26", "any", "system"
   *
   * Responses:
   *   200  resolution (UsedRequested | UsedCachedAlternate | UsedSystemFallback) + leaseId
   *   400  invalid body / request cancelled
   *   503  Failed(RuntimeUnavailable)
   */
  app.post("/api/runtimes/resolve", async (request, reply) => {
    const body = ResolveBody.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: body.error.flatten() });
    }

    // Abort the resolution if the client goes away before we answer
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.once("close", onClose);

    const result = await manager.resolveRuntime(body.data.requirement, controller.signal);
    reply.raw.off("close", onClose);

    if (result.kind === "Failed") {
      return reply
        .status(result.reason === "Cancelled" ? 400 : 503)
        .send(serializeResolution(result, null));
    }

    const leaseId = result.kind === "UsedSystemFallback" ? null : holdLease(result.lease);
    log.info({ requirement: body.data.requirement, kind: result.kind, leaseId }, "Runtime resolved");
    return serializeResolution(result, leaseId);
  });

  /**
   * DELETE /api/runtimes/leases/:leaseId
   * Releases the active-user reference taken by a resolve call.
   */
  app.delete<{ Params: { leaseId: string } }>("/api/runtimes/leases/:leaseId", async (request, reply) => {
    const lease = dropLease(request.params.leaseId);
    if (!lease) return reply.status(404).send({ error: "Lease not found" });
    return { released: true, versionId: lease.versionId };
  });

  /**
   * POST /api/runtimes/leases/:leaseId/renew
   * Restarts the lease's expiry window; long-running clients call this periodically.
   */
  app.post<{ Params: { leaseId: string } }>("/api/runtimes/leases/:leaseId/renew", async (request, reply) => {
    const held = leases.get(request.params.leaseId);
    if (!held) return reply.status(404).send({ error: "Lease not found" });
    held.timer.refresh();
    return { renewed: true, versionId: held.lease.versionId, expiresInMs: leaseTtlMs };
  });

  /**
   * GET /api/runtimes
   * Installed runtimes, most recently used first.
   */
  app.get("/api/runtimes", async () => {
    return manager.listCached();
  });

  /**
   * GET /api/runtimes/available
   * Versions offered by the configured registry.
   */
  app.get("/api/runtimes/available", async (_request, reply) => {
    try {
      return await manager.listAvailable();
    } catch (err) {
      return sendError(reply, err);
    }
  });

  /**
   * GET /api/runtimes/:id/progress
   * { versionId, state, bytesDone, bytesTotal, subscribers, error }
   */
  app.get<{ Params: { id: string } }>("/api/runtimes/:id/progress", async (request, reply) => {
    if (!isSafeVersionId(request.params.id)) {
      return reply.status(400).send({ error: "Invalid version id" });
    }
    return manager.getInstallProgress(request.params.id);
  });

  /**
   * PUT /api/runtimes/current
   * Body: { versionId }  — must be installed.
   */
  app.put("/api/runtimes/current", async (request, reply) => {
    const body = CurrentBody.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: body.error.flatten() });
    }
    try {
      await manager.setCurrent(body.data.versionId);
      return { current: manager.currentVersion() };
    } catch (err) {
      return sendError(reply, err);
    }
  });

  /**
   * DELETE /api/runtimes/:id
   * Evicts an installed runtime.
   *
   * Responses:
   *   200  { evicted: true }
   *   404  not installed
   *   409  in use (Busy)
   */
  app.delete<{ Params: { id: string } }>("/api/runtimes/:id", async (request, reply) => {
    try {
      await manager.evict(request.params.id);
      return { evicted: true, versionId: request.params.id };
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
