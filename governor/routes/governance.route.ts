import { Express } from "express";
import { z } from "zod";
import { APIError, QuotaExceededError } from "../utils/errorHandler.js";
import { isQuotaResource } from "../services/QuotaLedger.js";
import { QUOTA_RESOURCES } from "../types/index.js";
import type { QuotaResource, RouteContext } from "../types/index.js";

const TierBody = z.object({ tier: z.string().min(1) });

const PolicyBody = z.object({
  limit: z.number().int().min(0),
  windowSeconds: z.number().int().positive().optional(),
});

const AmountBody = z.object({
  resource: z.enum(QUOTA_RESOURCES),
  amount: z.number().finite().min(0),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new APIError(
      "Invalid request body",
      400,
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    );
  }
  return parsed.data;
}

function parseResource(value: string): QuotaResource {
  if (!isQuotaResource(value)) {
    throw new APIError(`Unknown quota resource: ${value}. Valid resources: ${QUOTA_RESOURCES.join(", ")}`, 400);
  }
  return value;
}

const registerEndpoint = (app: Express, context: RouteContext) => {
  const { cache, ledger, scheduler } = context;

  app.get("/governance/cache/stats", (req, res) => {
    res.status(200).json({ data: cache.stats() });
  });

  app.delete("/governance/cache/entries/:key", (req, res) => {
    const invalidated = cache.invalidate(req.params.key);
    res.status(200).json({ data: { key: req.params.key, invalidated } });
  });

  app.delete("/governance/cache/prefix/:prefix", (req, res) => {
    const invalidated = cache.invalidatePrefix(req.params.prefix);
    res.status(200).json({ data: { prefix: req.params.prefix, invalidated } });
  });

  // Registered before /quotas/:tenantId so "tiers" is not read as a tenant
  app.get("/governance/quotas/tiers", (req, res) => {
    res.status(200).json({ data: ledger.listTiers() });
  });

  app.get("/governance/quotas/:tenantId", (req, res) => {
    res.status(200).json({ data: ledger.summary(req.params.tenantId) });
  });

  app.put("/governance/quotas/:tenantId/tier", (req, res, next) => {
    try {
      const { tier } = parseBody(TierBody, req.body);
      ledger.assignTier(req.params.tenantId, tier);
      res.status(200).json({ data: ledger.summary(req.params.tenantId) });
    } catch (error) {
      next(error);
    }
  });

  app.put("/governance/quotas/:tenantId/policies/:resource", (req, res, next) => {
    try {
      const resource = parseResource(req.params.resource);
      const body = parseBody(PolicyBody, req.body);
      const policy = ledger.setPolicy({ tenantId: req.params.tenantId, resource, ...body });
      res.status(200).json({ data: policy });
    } catch (error) {
      next(error);
    }
  });

  app.post("/governance/quotas/:tenantId/reserve", (req, res, next) => {
    try {
      const { tenantId } = req.params;
      const { resource, amount } = parseBody(AmountBody, req.body);
      const decision = ledger.reserve(tenantId, resource, amount);

      if (!decision.allowed) {
        throw new QuotaExceededError({
          tenantId,
          resource,
          current: decision.current,
          limit: decision.limit,
          requested: amount,
          reason: decision.reason,
        });
      }

      res.status(200).json({ data: decision });
    } catch (error) {
      next(error);
    }
  });

  app.post("/governance/quotas/:tenantId/release", (req, res, next) => {
    try {
      const { tenantId } = req.params;
      const { resource, amount } = parseBody(AmountBody, req.body);
      ledger.release(tenantId, resource, amount);
      res.status(200).json({ data: ledger.usage(tenantId) });
    } catch (error) {
      next(error);
    }
  });

  app.get("/governance/prune/status", (req, res) => {
    res.status(200).json({ data: scheduler.status() });
  });

  app.get("/governance/prune/history", (req, res) => {
    res.status(200).json({ data: scheduler.history() });
  });

  app.post("/governance/prune/run", async (req, res, next) => {
    try {
      const stats = await scheduler.runOnce();
      if (!stats) {
        throw new APIError("A prune cycle is already running or the scheduler is stopped", 409);
      }
      res.status(200).json({ data: stats });
    } catch (error) {
      next(error);
    }
  });
};

export default {
  id: "governance",
  handler: registerEndpoint,
};
