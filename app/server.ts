import { badRequest, boomify, isBoom, notFound } from "@hapi/boom";
import express from "express";
import type { ErrorRequestHandler, Express, NextFunction, Request, RequestHandler, Response } from "express";
import { z } from "zod";

import { SERVER_CONFIG } from "../lib/config";
import { loadEnvConfig } from "../lib/env";
import {
  createDefaultEngine,
  type CompetitorIntelligenceEngine,
} from "../lib/multi-agent/competitor-intelligence-engine";
import { toAnalysisResponse } from "../lib/report";

export type AnalysisRunner = Pick<CompetitorIntelligenceEngine, "run">;

export const AnalysisRequestSchema = z.object({
  user_input: z.string().trim().min(1, "user_input is required"),
  mode: z.enum(["url", "description"]).default("description"),
});

export function ensureError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(typeof error === "string" ? error : JSON.stringify(error));
}

// body-parser and similar middleware attach an HTTP status to their errors
function clientStatusOf(error: unknown): number | undefined {
  if (error && typeof error === "object" && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 500 ? error.status : undefined;
  }
  return undefined;
}

function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => handler(req, res).catch(next);
}

export function parseAnalysisRequest(body: unknown): z.infer<typeof AnalysisRequestSchema> {
  const result = AnalysisRequestSchema.safeParse(body);
  if (!result.success) {
    const errorMessages = result.error.issues.map((err) => {
      const path = err.path.length > 0 ? err.path.join(".") : "root";
      return `${path}: ${err.message}`;
    });
    throw badRequest(`Validation failed: ${errorMessages.join("; ")}`);
  }
  return result.data;
}

export function createAnalyzeHandler(engine: AnalysisRunner): RequestHandler {
  return asyncHandler(async (req, res) => {
    const request = parseAnalysisRequest(req.body);
    console.log(
      `[server] 📥 Received analysis request: ${request.user_input.slice(0, SERVER_CONFIG.REQUEST_PREVIEW_LENGTH)}...`
    );

    const state = await engine.run(request.user_input, request.mode);

    console.log("[server] ✅ Analysis complete, returning results");
    res.status(200).json(toAnalysisResponse(state));
  });
}

export const healthHandler: RequestHandler = (_req, res) => {
  res.status(200).json({ status: "healthy", service: SERVER_CONFIG.SERVICE_NAME });
};

/**
 * Renders Boom errors as JSON. Server errors keep the underlying error
 * message in the payload instead of Boom's generic text.
 */
export const expressErrorHandler: ErrorRequestHandler = (
  error: unknown,
  req,
  res,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
) => {
  const boomError = isBoom(error)
    ? error
    : boomify(ensureError(error), { statusCode: clientStatusOf(error) ?? 500 });

  if (boomError.isServer) {
    console.error("[server] ❌ Error during analysis:", {
      method: req.method,
      path: req.path,
      error: boomError.message,
      stack: boomError.stack,
    });
  } else {
    console.warn("[server] Client error:", {
      method: req.method,
      path: req.path,
      statusCode: boomError.output.statusCode,
      error: boomError.message,
    });
  }

  const { statusCode, payload } = boomError.output;
  res.status(statusCode).json(boomError.isServer ? { ...payload, message: boomError.message } : payload);
};

export function createApp(engine: AnalysisRunner): Express {
  const app = express();

  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });
  app.use(express.json());

  app.get("/api/health", healthHandler);
  app.post("/api/analyze", createAnalyzeHandler(engine));

  app.use((req, _res, next) => {
    next(notFound(`No route for ${req.method} ${req.path}`));
  });
  app.use(expressErrorHandler);

  return app;
}

async function main(): Promise<void> {
  const env = loadEnvConfig();
  const app = createApp(createDefaultEngine(env));

  app.listen(env.server.port, env.server.host, () => {
    console.log("[server] 🚀 Starting Competitor Intelligence API Server...");
    console.log(`[server] 📍 Listening on http://${env.server.host}:${env.server.port}`);
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("[server] Failed to start:", ensureError(error).message);
    process.exit(1);
  });
}
