import { Router, Request, Response, NextFunction } from "express";
import pLimit from "p-limit";
import { z } from "zod";
import type { PipelineConfig } from "./config/pipeline";
import { PipelineAbortedError, PipelineError, type PipelineErrorKind } from "./errors";
import type { Services } from "./pipeline/factory";
import { listTrajectories } from "./trajectories";

export interface RouterOptions {
  maxConcurrentRequests: number;
}

const AskBodySchema = z.object({
  question: z.string().trim().min(1).max(2000),
  history: z
    .array(z.object({ question: z.string(), answer: z.string() }))
    .max(20)
    .default([])
});

const TrajectoryQuerySchema = z.object({
  platformId: z.coerce.number().int().positive().optional()
});

export function statusForKind(kind: PipelineErrorKind): number {
  switch (kind) {
    case "ExecutorTimeout":
      return 504;
    case "SyntaxInvalid":
    case "OperationForbidden":
    case "SchemaViolation":
      return 400;
    default:
      return 503;
  }
}

/**
 * Aborts when the client disconnects before a response was written. The
 * request stream closes once its body has been read, so only the response
 * is watched.
 */
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

export function createRouter(services: Pick<Services, "orchestrator" | "stages" | "config">, options: RouterOptions): Router {
  const router = Router();
  const limit = pLimit(options.maxConcurrentRequests);
  const config: Readonly<PipelineConfig> = services.config;

  router.post("/ask", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = AskBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: "Request body must include a question string.", issues: parsed.error.issues });
    }

    const controller = abortOnDisconnect(res);
    try {
      const { question, history } = parsed.data;
      const answer = await limit(() => services.orchestrator.ask(question, history, { signal: controller.signal }));
      return res.json(answer);
    } catch (error) {
      if (error instanceof PipelineAbortedError) {
        console.warn("Client disconnected before the answer was ready");
        return undefined;
      }
      return next(error);
    }
  });

  router.get("/trajectories", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = TrajectoryQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ message: "platformId must be a positive integer." });
    }

    const controller = abortOnDisconnect(res);
    try {
      const listing = await limit(() =>
        listTrajectories(services.stages.validator, services.stages.executor, {
          platformId: parsed.data.platformId,
          limit: config.validation.maxRows,
          timeoutMs: config.execution.timeoutMs,
          signal: controller.signal
        })
      );
      return res.json(listing);
    } catch (error) {
      if (error instanceof PipelineAbortedError) {
        return undefined;
      }
      if (error instanceof PipelineError) {
        return res.status(statusForKind(error.kind)).json({ message: error.message, kind: error.kind });
      }
      return next(error);
    }
  });

  return router;
}
