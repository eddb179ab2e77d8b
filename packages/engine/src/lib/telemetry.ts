import appInsights from "applicationinsights";

let client: appInsights.TelemetryClient | null = null;

/**
 * Start Application Insights when a connection string is configured.
 * Without one every track* call is a no-op.
 */
export function configureTelemetry(connectionString: string | undefined): boolean {
  const trimmed = connectionString?.trim();
  if (!trimmed || client) {
    return client !== null;
  }

  appInsights
    .setup(trimmed)
    // Short-lived process: nothing to auto-collect beyond our own events.
    .setAutoCollectRequests(false)
    .setAutoCollectDependencies(false)
    .setAutoCollectPerformance(false, false)
    .setAutoCollectExceptions(false)
    .setAutoCollectConsole(false)
    .start();

  client = appInsights.defaultClient;
  return true;
}

/**
 * Flatten run details (mode, variant, renderer counts) into the string map
 * Application Insights accepts. Absent values are left out.
 */
export function toTelemetryProperties(
  details?: Record<string, unknown>
): Record<string, string> | undefined {
  if (!details) return undefined;

  const entries = Object.entries(details)
    .filter(([, value]) => value !== null && value !== undefined)
    .map(([key, value]): [string, string] => [key, typeof value === "string" ? value : String(value)]);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

export function trackEvent(
  name: string,
  properties?: Record<string, unknown>
): void {
  try {
    client?.trackEvent({
      name,
      properties: toTelemetryProperties(properties),
    });
  } catch {
    // A rejected event leaves the palette and rendered files as they are.
  }
}

export function trackMetric(
  name: string,
  value: number,
  properties?: Record<string, unknown>
): void {
  try {
    client?.trackMetric({
      name,
      value,
      properties: toTelemetryProperties(properties),
    });
  } catch {
    // Run timings are optional; the exit code does not depend on them.
  }
}

export function trackException(
  error: unknown,
  properties?: Record<string, unknown>
): void {
  try {
    const exception = error instanceof Error ? error : new Error(String(error));
    client?.trackException({
      exception,
      properties: toTelemetryProperties(properties),
    });
  } catch {
    // The pipeline rethrows the original error; reporting it is secondary.
  }
}

/** Send buffered telemetry before the process exits. */
export function flushTelemetry(): Promise<void> {
  const current = client;
  if (!current) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    current.flush({ callback: () => resolve() });
  });
}
