import express, { Express, Request, Response } from "express";
import cors from "cors";
import { Server } from "http";
import { z } from "zod";
import { IDecisionLog } from "./adapters/persistence/decision-log.interface";
import { ILogisticsAgent } from "./services/logistics-agent.interface";
import { INotificationService } from "./services/notification.interface";
import { createLogger, errorMessage } from "./utils/logger";

const logger = createLogger("Status API");

const LimitSchema = z.coerce.number().int().min(1).max(1000).default(50);

function readLimit(req: Request, res: Response): number | undefined {
  const parsed = LimitSchema.safeParse(req.query.limit);
  if (!parsed.success) {
    res.status(400).json({
      success: false,
      error: "limit must be an integer between 1 and 1000",
    });
    return undefined;
  }
  return parsed.data;
}

function fail(res: Response, action: string, error: unknown): void {
  logger.error(`${action} failed: ${errorMessage(error)}`);
  res.status(500).json({ success: false, error: errorMessage(error) });
}

export function createApiServer(
  agent: ILogisticsAgent,
  decisionLog: IDecisionLog,
  notifications: INotificationService
): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    const { agentName, running } = agent.getStatus();
    res.json({ status: "ok", agent: agentName, running });
  });

  app.get("/api/status", (_req, res) => {
    res.json({ success: true, status: agent.getStatus() });
  });

  app.get("/api/decisions", async (req, res) => {
    const limit = readLimit(req, res);
    if (limit === undefined) return;
    try {
      res.json({ success: true, decisions: await decisionLog.listDecisions(limit) });
    } catch (error) {
      fail(res, "Listing decisions", error);
    }
  });

  app.get("/api/notifications", async (req, res) => {
    const limit = readLimit(req, res);
    if (limit === undefined) return;
    try {
      res.json({ success: true, notifications: await notifications.recentNotifications(limit) });
    } catch (error) {
      fail(res, "Listing notifications", error);
    }
  });

  // POST /api/cycle - Run the checks that are due now
  app.post("/api/cycle", async (_req, res) => {
    try {
      res.json({ success: true, report: await agent.runCycle() });
    } catch (error) {
      fail(res, "Cycle", error);
    }
  });

  return app;
}

export function startApiServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once("listening", () => {
      const address = server.address();
      const bound = typeof address === "object" && address !== null ? address.port : port;
      logger.info(`Status API running on http://localhost:${bound}`);
      logger.info(`Health check: http://localhost:${bound}/health`);
      resolve(server);
    });
    server.once("error", reject);
  });
}
