/**
 * @tracewright/tracing - Propagation
 * Gateway functions and carrier adapters
 */

export { HeaderCarrier, MapCarrier, recordStrategy, type Carrier, type HeaderStrategy } from "./carrier.js";
export { extract, propagate } from "./gateway.js";
export {
  HttpHeadersCarrier,
  extractHttp,
  propagateHttp,
  type HttpHeaderRecord,
  type HttpHeaders,
} from "./http.js";
export {
  GrpcMetadataCarrier,
  createTraceInterceptor,
  createTracingRequester,
  extractGrpcMetadata,
  flattenMetadata,
  injectGrpcMetadata,
  type ContextHolder,
  type ContextSource,
} from "./grpc.js";
export {
  AmqpHeadersCarrier,
  KafkaHeadersCarrier,
  NatsHeadersCarrier,
  extractAmqp,
  extractKafka,
  extractNats,
  propagateAmqp,
  propagateKafka,
  propagateNats,
} from "./messaging.js";
