/**
 * @tracewright/tracing - Semantic Attributes
 * Attribute key catalog and builders for common span metadata
 */

import {
  floatAttr,
  intAttr,
  stringAttr,
  type Attribute,
} from "./attributes.js";
import { HttpHeadersCarrier, type HttpHeaders } from "./propagation/http.js";

// ============================================================================
// KEYS
// ============================================================================

/**
 * Attribute keys used by the builders below and the system collectors.
 */
export const SpanAttributes = {
  // HTTP
  HTTP_METHOD: "http.method",
  HTTP_URL: "http.url",
  HTTP_USER_AGENT: "http.user_agent",
  HTTP_CLIENT_IP: "http.client_ip",
  HTTP_STATUS_CODE: "http.status_code",
  HTTP_CONTENT_LENGTH: "http.content_length",
  HTTP_HEADER_PREFIX: "http.header.",

  // Database
  DB_QUERY: "db.query",
  DB_SYSTEM: "db.system",
  DB_NAME: "db.name",
  DB_VERSION: "db.version",
  DB_TABLE_NAME: "db.table_name",
  DB_ROW_COUNT: "db.row_count",
  DB_TRANSACTION_ID: "db.transaction_id",
  DB_TRANSACTION_STATUS: "db.transaction_status",
  DB_ERROR_MESSAGE: "db.error_message",
  DB_ERROR_CODE: "db.error_code",

  // Errors
  EXCEPTION_TYPE: "exception.type",
  EXCEPTION_MESSAGE: "exception.message",
  EXCEPTION_STACKTRACE: "exception.stacktrace",
  ERROR_TYPE: "error.type",
  ERROR_MESSAGE: "error.message",

  // Work items
  EVENT_NAME: "event.name",
  EVENT_TIMESTAMP: "event.timestamp",
  TASK_ID: "task.id",
  TASK_NAME: "task.name",
  TASK_RETRIES: "task.retries",
  USER_ID: "user.id",
  USER_USERNAME: "user.username",
  METRIC_NAME: "metric.name",
  METRIC_VALUE: "metric.value",

  // Host
  SYSTEM_HOSTNAME: "system.hostname",
  SYSTEM_IP_ADDRESS: "system.ip_address",
  SYSTEM_ENVIRONMENT: "system.environment",
  CPU_COUNT: "cpu.count",
  CPU_ARCHITECTURE: "cpu.architecture",
  CPU_LOAD_1M: "cpu.load_1m",
  MEMORY_TOTAL: "memory.total",
  MEMORY_FREE: "memory.free",
  MEMORY_HEAP_USED: "memory.heap_used",
  MEMORY_RSS: "memory.rss",
  DISK_TOTAL: "disk.total",
  DISK_FREE: "disk.free",

  // Process and deployment
  PROCESS_ID: "process.id",
  PROCESS_COMMAND: "process.command",
  PROCESS_RUNTIME_VERSION: "process.runtime.version",
  PROCESS_ACTIVE_RESOURCES: "process.active_resources",
  CONTAINER_ID: "container.id",
  CONTAINER_IMAGE: "container.image",
  KUBERNETES_POD_NAME: "kubernetes.pod_name",
  KUBERNETES_NAMESPACE: "kubernetes.namespace",
  NETWORK_PROTOCOL: "network.protocol",
  NETWORK_LATENCY_MS: "network.latency_ms",
} as const;

export type SpanAttributeKey = (typeof SpanAttributes)[keyof typeof SpanAttributes];

// ============================================================================
// HTTP
// ============================================================================

/**
 * Request facts for an HTTP span.
 */
export interface HttpRequestInfo {
  method: string;
  url: string;
  userAgent?: string;
  clientIp?: string;
}

export function httpRequestAttributes(request: HttpRequestInfo): Attribute[] {
  const attrs = [
    stringAttr(SpanAttributes.HTTP_METHOD, request.method),
    stringAttr(SpanAttributes.HTTP_URL, request.url),
  ];
  if (request.userAgent !== undefined) {
    attrs.push(stringAttr(SpanAttributes.HTTP_USER_AGENT, request.userAgent));
  }
  if (request.clientIp !== undefined) {
    attrs.push(stringAttr(SpanAttributes.HTTP_CLIENT_IP, request.clientIp));
  }
  return attrs;
}

export function httpResponseAttributes(statusCode: number, contentLength?: number): Attribute[] {
  const attrs = [intAttr(SpanAttributes.HTTP_STATUS_CODE, statusCode)];
  if (contentLength !== undefined) {
    attrs.push(intAttr(SpanAttributes.HTTP_CONTENT_LENGTH, contentLength));
  }
  return attrs;
}

/**
 * One `http.header.<name>` attribute per header, first value only.
 * Names listed in `exclude` (case-insensitive) are skipped.
 */
export function httpHeaderAttributes(
  headers: HttpHeaders,
  exclude: readonly string[] = ["authorization", "cookie", "set-cookie"]
): Attribute[] {
  const skip = new Set(exclude.map((name) => name.toLowerCase()));
  const carrier = new HttpHeadersCarrier(headers);
  return carrier
    .keys()
    .filter((name) => !skip.has(name.toLowerCase()))
    .map((name) => stringAttr(`${SpanAttributes.HTTP_HEADER_PREFIX}${name}`, carrier.get(name)));
}

// ============================================================================
// DATABASE
// ============================================================================

export function dbQueryAttributes(query: string, system: string): Attribute[] {
  return [stringAttr(SpanAttributes.DB_QUERY, query), stringAttr(SpanAttributes.DB_SYSTEM, system)];
}

export function dbInfoAttributes(name: string, version: string): Attribute[] {
  return [stringAttr(SpanAttributes.DB_NAME, name), stringAttr(SpanAttributes.DB_VERSION, version)];
}

export function dbTableAttributes(table: string, rowCount: number): Attribute[] {
  return [
    stringAttr(SpanAttributes.DB_TABLE_NAME, table),
    intAttr(SpanAttributes.DB_ROW_COUNT, rowCount),
  ];
}

export function dbTransactionAttributes(transactionId: string, status: string): Attribute[] {
  return [
    stringAttr(SpanAttributes.DB_TRANSACTION_ID, transactionId),
    stringAttr(SpanAttributes.DB_TRANSACTION_STATUS, status),
  ];
}

export function dbErrorAttributes(message: string, code: string): Attribute[] {
  return [
    stringAttr(SpanAttributes.DB_ERROR_MESSAGE, message),
    stringAttr(SpanAttributes.DB_ERROR_CODE, code),
  ];
}

// ============================================================================
// ERRORS
// ============================================================================

function errorType(error: unknown): string {
  if (error instanceof Error) return error.name;
  return typeof error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorAttributes(error: unknown): Attribute[] {
  return [
    stringAttr(SpanAttributes.ERROR_TYPE, errorType(error)),
    stringAttr(SpanAttributes.ERROR_MESSAGE, errorMessage(error)),
  ];
}

/** Stack defaults to the error's own stack, or empty */
export function exceptionAttributes(error: unknown, stack?: string): Attribute[] {
  const stacktrace = stack ?? (error instanceof Error ? error.stack : undefined) ?? "";
  return [
    stringAttr(SpanAttributes.EXCEPTION_TYPE, errorType(error)),
    stringAttr(SpanAttributes.EXCEPTION_MESSAGE, errorMessage(error)),
    stringAttr(SpanAttributes.EXCEPTION_STACKTRACE, stacktrace),
  ];
}

// ============================================================================
// WORK ITEMS
// ============================================================================

export function eventAttributes(name: string, timestamp: Date = new Date()): Attribute[] {
  return [
    stringAttr(SpanAttributes.EVENT_NAME, name),
    stringAttr(SpanAttributes.EVENT_TIMESTAMP, timestamp.toISOString()),
  ];
}

export function taskAttributes(id: string, name: string, retries: number): Attribute[] {
  return [
    stringAttr(SpanAttributes.TASK_ID, id),
    stringAttr(SpanAttributes.TASK_NAME, name),
    intAttr(SpanAttributes.TASK_RETRIES, retries),
  ];
}

export function userAttributes(id: string, username: string): Attribute[] {
  return [stringAttr(SpanAttributes.USER_ID, id), stringAttr(SpanAttributes.USER_USERNAME, username)];
}

export function metricAttributes(name: string, value: number): Attribute[] {
  return [stringAttr(SpanAttributes.METRIC_NAME, name), floatAttr(SpanAttributes.METRIC_VALUE, value)];
}

// ============================================================================
// DEPLOYMENT
// ============================================================================

export function hostAttributes(hostname: string, ipAddress: string, environment: string): Attribute[] {
  return [
    stringAttr(SpanAttributes.SYSTEM_HOSTNAME, hostname),
    stringAttr(SpanAttributes.SYSTEM_IP_ADDRESS, ipAddress),
    stringAttr(SpanAttributes.SYSTEM_ENVIRONMENT, environment),
  ];
}

export function kubernetesAttributes(podName: string, namespace: string): Attribute[] {
  return [
    stringAttr(SpanAttributes.KUBERNETES_POD_NAME, podName),
    stringAttr(SpanAttributes.KUBERNETES_NAMESPACE, namespace),
  ];
}

/** Latency is recorded in whole milliseconds */
export function networkAttributes(protocol: string, latencyMs: number): Attribute[] {
  return [
    stringAttr(SpanAttributes.NETWORK_PROTOCOL, protocol),
    intAttr(SpanAttributes.NETWORK_LATENCY_MS, latencyMs),
  ];
}
