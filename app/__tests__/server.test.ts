import { badRequest } from "@hapi/boom";
import type { Request, Response } from "express";
import { describe, it, expect, vi, beforeEach } from "vitest";

import { makeFinalState } from "../../lib/__tests__/fixtures";
import { toAnalysisResponse } from "../../lib/report";
import {
  createAnalyzeHandler,
  createApp,
  expressErrorHandler,
  healthHandler,
  parseAnalysisRequest,
  type AnalysisRunner,
} from "../server";

function mockResponse() {
  return {
    status: vi.fn().mockReturnThis(),
    json: vi.fn(),
  } as unknown as Response;
}

describe("parseAnalysisRequest", () => {
  it("defaults the mode to description", () => {
    expect(parseAnalysisRequest({ user_input: "  CRM for dentists " })).toEqual({
      user_input: "CRM for dentists",
      mode: "description",
    });
  });

  it("rejects a blank input", () => {
    expect(() => parseAnalysisRequest({ user_input: "   " })).toThrow(
      "Validation failed: user_input: user_input is required"
    );
  });

  it("rejects an unknown mode", () => {
    expect(() => parseAnalysisRequest({ user_input: "CRM", mode: "pdf" })).toThrow(/^Validation failed: mode: /);
  });
});

describe("createAnalyzeHandler", () => {
  const state = makeFinalState();
  const run = vi.fn<AnalysisRunner["run"]>();
  const engine: AnalysisRunner = { run };

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  it("runs the engine and returns the snake_case result", async () => {
    run.mockResolvedValue(state);
    const req = { body: { user_input: "CRM for dentists", mode: "url" } } as Request;
    const res = mockResponse();
    const next = vi.fn();

    await createAnalyzeHandler(engine)(req, res, next);

    expect(run).toHaveBeenCalledWith("CRM for dentists", "url");
    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith(toAnalysisResponse(state));
    expect(next).not.toHaveBeenCalled();
  });

  it("forwards validation errors as 400s", async () => {
    const req = { body: {} } as Request;
    const next = vi.fn();

    await createAnalyzeHandler(engine)(req, mockResponse(), next);

    expect(run).not.toHaveBeenCalled();
    const [error] = next.mock.calls[0] ?? [];
    expect(error).toMatchObject({ isBoom: true, output: { statusCode: 400 } });
  });

  it("forwards engine failures", async () => {
    const failure = new Error("rate limited");
    run.mockRejectedValue(failure);
    const req = { body: { user_input: "CRM for dentists" } } as Request;
    const next = vi.fn();

    await createAnalyzeHandler(engine)(req, mockResponse(), next);

    expect(next).toHaveBeenCalledWith(failure);
  });
});

describe("healthHandler", () => {
  it("reports the service as healthy", () => {
    const res = mockResponse();

    healthHandler({} as Request, res, vi.fn());

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ status: "healthy", service: "Competitor Intelligence" });
  });
});

describe("expressErrorHandler", () => {
  const req = { method: "POST", path: "/api/analyze" } as Request;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("renders Boom client errors as they are", () => {
    const res = mockResponse();

    expressErrorHandler(badRequest("Validation failed: user_input: Required"), req, res, vi.fn());

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      statusCode: 400,
      error: "Bad Request",
      message: "Validation failed: user_input: Required",
    });
  });

  it("keeps the message of unexpected errors", () => {
    const res = mockResponse();

    expressErrorHandler(new Error("rate limited"), req, res, vi.fn());

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      statusCode: 500,
      error: "Internal Server Error",
      message: "rate limited",
    });
  });

  it("keeps the status of middleware client errors", () => {
    const res = mockResponse();
    const parseError = Object.assign(new Error("Unexpected end of JSON input"), { status: 400 });

    expressErrorHandler(parseError, req, res, vi.fn());

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      statusCode: 400,
      error: "Bad Request",
      message: "Unexpected end of JSON input",
    });
  });
});

describe("createApp", () => {
  it("builds an express application", () => {
    const app = createApp({ run: vi.fn<AnalysisRunner["run"]>() });
    expect(typeof app.listen).toBe("function");
  });
});
