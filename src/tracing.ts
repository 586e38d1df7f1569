import { NodeSdk } from "@effect/opentelemetry";
import type { SpanProcessor } from "@opentelemetry/sdk-trace-base";

export const TracingLayer = (spanProcessor: SpanProcessor) => NodeSdk.layer(() => ({
  resource: { serviceName: "pile-simulator" },
  spanProcessor,
}));
