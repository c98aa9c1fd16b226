import express from "express";
import request from "supertest";

const telemetry = vi.hoisted(() => ({
  trackRequest: vi.fn(),
  trackException: vi.fn(),
  trackEvent: vi.fn(),
}));

vi.mock("applicationinsights", () => {
  const chain = {
    setAutoCollectConsole: vi.fn().mockReturnThis(),
    setAutoCollectExceptions: vi.fn().mockReturnThis(),
    setAutoCollectPerformance: vi.fn().mockReturnThis(),
    setAutoCollectRequests: vi.fn().mockReturnThis(),
    setAutoCollectDependencies: vi.fn().mockReturnThis(),
    setSendLiveMetrics: vi.fn().mockReturnThis(),
    start: vi.fn().mockReturnThis(),
  };
  return {
    defaultClient: telemetry,
    setup: vi.fn(() => chain),
  };
});

describe("application insights telemetry", () => {
  const originalConnectionString = process.env.APPINSIGHTS_CONNECTION_STRING;

  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    if (originalConnectionString === undefined) {
      delete process.env.APPINSIGHTS_CONNECTION_STRING;
    } else {
      process.env.APPINSIGHTS_CONNECTION_STRING = originalConnectionString;
    }
  });

  it("stays silent without a connection string", async () => {
    process.env.APPINSIGHTS_CONNECTION_STRING = "";
    const { initializeAppInsights, trackEvent } = await import("../observability/appInsights");

    initializeAppInsights();
    trackEvent({ name: "worker_restarted" });

    expect(telemetry.trackEvent).not.toHaveBeenCalled();
  });

  it("tracks requests, exceptions and events once configured", async () => {
    process.env.APPINSIGHTS_CONNECTION_STRING = "InstrumentationKey=test-key";
    const { initializeAppInsights, trackEvent } = await import("../observability/appInsights");
    initializeAppInsights();

    const { requestId } = await import("../middleware/requestId");
    const { requestLogger } = await import("../middleware/requestLogger");
    const { AppError, errorHandler } = await import("../middleware/errors");

    const app = express();
    app.use(requestId);
    app.use(requestLogger);
    app.get("/ok", (_req, res) => {
      res.json({ ok: true });
    });
    app.get("/boom", (_req, _res, next) => {
      next(new Error("exploded"));
    });
    app.get("/full", (_req, _res, next) => {
      next(new AppError("queue_full", "Queue is full.", 503));
    });
    app.use(errorHandler);

    await request(app).get("/ok").set("x-request-id", "telemetry-ok");
    expect(telemetry.trackRequest).toHaveBeenCalledWith(
      expect.objectContaining({ name: "GET /ok", resultCode: 200, success: true })
    );

    await request(app).get("/boom").set("x-request-id", "telemetry-err");
    expect(telemetry.trackException).toHaveBeenCalledWith(
      expect.objectContaining({
        properties: expect.objectContaining({ requestId: "telemetry-err", code: "internal_error" }),
      })
    );

    const full = await request(app).get("/full").set("x-request-id", "telemetry-full");
    expect(full.status).toBe(503);
    expect(telemetry.trackException).toHaveBeenCalledWith(
      expect.objectContaining({
        properties: {
          requestId: "telemetry-full",
          route: "/full",
          status: 503,
          code: "queue_full",
          failure_reason: "request_error",
        },
      })
    );

    trackEvent({ name: "job_failed", properties: { jobId: "job-1" } });
    expect(telemetry.trackEvent).toHaveBeenCalledWith({
      name: "job_failed",
      properties: { jobId: "job-1" },
    });
  });
});
