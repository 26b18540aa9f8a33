/**
 * @tracewright/tracing - System Metadata
 * Host, process and container facts as span attributes
 */

import { readFileSync, statfsSync } from "node:fs";
import os from "node:os";
import { createLogger, getEnv } from "@tracewright/core";
import { floatAttr, intAttr, stringAttr, type Attribute } from "./attributes.js";
import { hostAttributes, SpanAttributes } from "./semantic.js";

const logger = createLogger({ name: "system-info" });

const UNKNOWN = "unknown";

export function cpuAttributes(): Attribute[] {
  const [load1m = 0] = os.loadavg();
  return [
    intAttr(SpanAttributes.CPU_COUNT, os.availableParallelism()),
    stringAttr(SpanAttributes.CPU_ARCHITECTURE, os.arch()),
    floatAttr(SpanAttributes.CPU_LOAD_1M, load1m),
  ];
}

export function memoryAttributes(): Attribute[] {
  const usage = process.memoryUsage();
  return [
    intAttr(SpanAttributes.MEMORY_TOTAL, os.totalmem()),
    intAttr(SpanAttributes.MEMORY_FREE, os.freemem()),
    intAttr(SpanAttributes.MEMORY_HEAP_USED, usage.heapUsed),
    intAttr(SpanAttributes.MEMORY_RSS, usage.rss),
  ];
}

/**
 * Total and free bytes of the filesystem holding `path`.
 * Empty when the filesystem cannot be queried.
 */
export function diskAttributes(path: string = "/"): Attribute[] {
  try {
    const stats = statfsSync(path);
    return [
      intAttr(SpanAttributes.DISK_TOTAL, stats.blocks * stats.bsize),
      intAttr(SpanAttributes.DISK_FREE, stats.bfree * stats.bsize),
    ];
  } catch (error) {
    logger.debug("Disk statistics unavailable", { path, error: String(error) });
    return [];
  }
}

/** First non-internal IPv4 address, or an empty string */
export function primaryIpAddress(): string {
  for (const addresses of Object.values(os.networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.family === "IPv4" && !address.internal) {
        return address.address;
      }
    }
  }
  return "";
}

/** Hostname, primary address and `NODE_ENV` */
export function hostInfoAttributes(): Attribute[] {
  return hostAttributes(os.hostname(), primaryIpAddress(), getEnv("NODE_ENV") ?? "development");
}

export function processAttributes(): Attribute[] {
  return [
    intAttr(SpanAttributes.PROCESS_ID, process.pid),
    stringAttr(SpanAttributes.PROCESS_COMMAND, process.argv[1] ?? process.argv0),
    stringAttr(SpanAttributes.PROCESS_RUNTIME_VERSION, process.version),
  ];
}

/**
 * Container id from a cgroup listing: the last path segment of the first
 * docker or kubepods line.
 */
export function parseContainerId(cgroup: string): string | undefined {
  for (const line of cgroup.split("\n")) {
    if (!line.includes("docker") && !line.includes("kubepods")) continue;
    const segment = line.split("/").pop();
    if (segment) return segment;
  }
  return undefined;
}

/**
 * Container id and image. Unknown values read as `"unknown"`.
 * The image comes from `CONTAINER_IMAGE`.
 */
export function containerAttributes(cgroupPath: string = "/proc/self/cgroup"): Attribute[] {
  let id: string | undefined;
  try {
    id = parseContainerId(readFileSync(cgroupPath, "utf8"));
  } catch (error) {
    logger.debug("cgroup listing unavailable", { path: cgroupPath, error: String(error) });
  }

  return [
    stringAttr(SpanAttributes.CONTAINER_ID, id ?? UNKNOWN),
    stringAttr(SpanAttributes.CONTAINER_IMAGE, getEnv("CONTAINER_IMAGE") || UNKNOWN),
  ];
}

/** Number of handles and requests keeping the event loop alive */
export function concurrencyAttributes(): Attribute[] {
  return [
    intAttr(SpanAttributes.PROCESS_ACTIVE_RESOURCES, process.getActiveResourcesInfo().length),
  ];
}
