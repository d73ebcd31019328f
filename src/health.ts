import { Router } from "express";
import type { Request, Response } from "express";
import type { AppServices } from "./index";
import { errorMessage } from "./lib/errors";
import { createLogger } from "./utils/logger";

const log = createLogger("Health");

export interface HealthReport {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  services: {
    providers: Array<{ name: string; model: string; current: boolean; healthy: boolean }>;
    storage: { backend: "postgres" | "memory"; connected: boolean };
    searchCache: { size: number; hitRate: number };
    conversations: { count: number };
  };
  environment: {
    nodeVersion: string;
    platform: string;
    uptime: number;
  };
}

/**
 * healthy: storage reachable and at least one provider answers.
 * degraded: storage reachable, no provider answers.
 */
export async function checkHealth(services: AppServices): Promise<HealthReport> {
  const [providers, connected] = await Promise.all([
    services.llm.getStatus(),
    services.storage.postgres ? services.storage.postgres.healthCheck() : Promise.resolve(true),
  ]);
  const stats = services.search.getStatistics();

  let status: HealthReport["status"] = "healthy";
  if (!connected) {
    status = "unhealthy";
  } else if (!providers.some((p) => p.healthy)) {
    status = "degraded";
  }

  return {
    status,
    timestamp: new Date().toISOString(),
    services: {
      providers,
      storage: { backend: services.storage.backend, connected },
      searchCache: { size: stats.cacheSize, hitRate: stats.cacheHitRate },
      conversations: { count: services.conversations.size },
    },
    environment: {
      nodeVersion: process.version,
      platform: process.platform,
      uptime: process.uptime(),
    },
  };
}

export function createHealthRouter(services: AppServices): Router {
  const router = Router();

  router.get("/", async (req: Request, res: Response) => {
    try {
      const report = await checkHealth(services);
      res.status(report.status === "unhealthy" ? 503 : 200).json(report);
    } catch (error) {
      log.error(`Health check error: ${errorMessage(error)}`);
      res.status(503).json({
        status: "unhealthy",
        timestamp: new Date().toISOString(),
        error: errorMessage(error),
      });
    }
  });

  return router;
}
