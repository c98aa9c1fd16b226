import * as appInsights from "applicationinsights";
import { isTestEnvironment } from "../config";
import { logInfo, logWarn } from "./logger";

type RequestTelemetry = {
  name: string;
  url: string;
  duration: number;
  resultCode: number;
  success: boolean;
  properties?: Record<string, unknown>;
};

type ExceptionTelemetry = {
  exception: Error;
  properties?: Record<string, unknown>;
};

type EventTelemetry = {
  name: string;
  properties?: Record<string, unknown>;
};

let telemetryClient: appInsights.TelemetryClient | null = null;
let initialized = false;

export function initializeAppInsights(): void {
  if (initialized) {
    return;
  }
  initialized = true;

  const connectionString =
    process.env.APPINSIGHTS_CONNECTION_STRING ??
    process.env.APPLICATIONINSIGHTS_CONNECTION_STRING;

  if (!connectionString?.trim()) {
    logWarn("appinsights_disabled", {
      reason: "missing_connection_string",
      testEnvironment: isTestEnvironment(),
    });
    return;
  }

  try {
    appInsights
      .setup(connectionString)
      .setAutoCollectConsole(false, false)
      .setAutoCollectExceptions(true)
      .setAutoCollectPerformance(false, false)
      .setAutoCollectRequests(false)
      .setAutoCollectDependencies(true)
      .setSendLiveMetrics(false)
      .start();

    telemetryClient = appInsights.defaultClient ?? null;
    logInfo("appinsights_initialized");
  } catch (error) {
    logWarn("appinsights_disabled", {
      reason: "initialization_failed",
      error,
    });
  }
}

export function trackRequest(telemetry: RequestTelemetry): void {
  telemetryClient?.trackRequest(telemetry);
}

export function trackException(telemetry: ExceptionTelemetry): void {
  telemetryClient?.trackException(telemetry);
}

export function trackEvent(telemetry: EventTelemetry): void {
  telemetryClient?.trackEvent(telemetry);
}
