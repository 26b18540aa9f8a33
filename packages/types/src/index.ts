/**
 * @module
 * Runtime validation schemas shared by tracewright packages.
 */

export {
  exporterKind,
  samplerConfig,
  propagatorName,
  telemetryConfig,
  type ExporterKind,
  type SamplerConfig,
  type PropagatorName,
  type TelemetryConfigInput,
} from "./telemetry.js";

export { type } from "arktype";
