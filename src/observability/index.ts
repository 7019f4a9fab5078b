export type {
  ObservabilityAdapter,
  Metric,
  RequestContext,
  ResponseContext,
  ErrorContext,
} from "../core/types.js";
export { ConsoleObservability, type ConsoleObservabilityConfig } from "./console.js";
export { NoOpObservability } from "./noop.js";
