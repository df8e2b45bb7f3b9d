export interface TracingHandle {
  shutdown(): Promise<void>;
}

/** OpenTelemetry is loaded only when OTEL_ENABLED=true, so tests and dev skip it. */
export async function initTracing(env: NodeJS.ProcessEnv = process.env): Promise<TracingHandle | null> {
  if (env.OTEL_ENABLED !== "true") return null;

  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { getNodeAutoInstrumentations } = await import("@opentelemetry/auto-instrumentations-node");
  const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-http");

  const url = env.OTEL_EXPORTER_OTLP_ENDPOINT;
  const sdk = new NodeSDK({
    serviceName: env.OTEL_SERVICE_NAME ?? "sample-app",
    traceExporter: new OTLPTraceExporter(url ? { url } : {}),
    instrumentations: [getNodeAutoInstrumentations()]
  });
  sdk.start();

  return {
    shutdown: () => sdk.shutdown()
  };
}
