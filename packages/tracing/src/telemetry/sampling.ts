/**
 * @tracewright/tracing - Sampling
 * Maps the sampler setting onto the SDK's samplers
 */

import {
  AlwaysOffSampler,
  AlwaysOnSampler,
  ParentBasedSampler,
  TraceIdRatioBasedSampler,
  type Sampler,
} from "@opentelemetry/sdk-trace-base";
import type { SamplerConfig } from "@tracewright/types";

/**
 * Build the head sampler for a sampler setting.
 * Ratio sampling follows the parent's decision when there is one.
 */
export function createSampler(config: SamplerConfig): Sampler {
  if (config === "always") return new AlwaysOnSampler();
  if (config === "never") return new AlwaysOffSampler();
  return new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(config.ratio) });
}
