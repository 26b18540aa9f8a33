import { describe, it, expect, afterEach, vi } from "vitest";
import { toAttributeRecord } from "./attributes.js";
import {
  concurrencyAttributes,
  containerAttributes,
  cpuAttributes,
  diskAttributes,
  parseContainerId,
  processAttributes,
} from "./system.js";

describe("@tracewright/tracing - System Metadata", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe("parseContainerId", () => {
    it("should take the last segment of a docker line", () => {
      const cgroup = ["12:cpuset:/", "11:memory:/docker/3f2a9c01", "10:pids:/docker/other"].join("\n");
      expect(parseContainerId(cgroup)).toBe("3f2a9c01");
    });

    it("should accept kubepods lines", () => {
      expect(parseContainerId("0::/kubepods/burstable/pod-1/abc123\n")).toBe("abc123");
    });

    it("should return undefined outside a container", () => {
      expect(parseContainerId("0::/user.slice/session-1.scope")).toBeUndefined();
    });
  });

  it("should report unknown container facts when the listing is missing", () => {
    vi.stubEnv("CONTAINER_IMAGE", "");

    expect(toAttributeRecord(containerAttributes("/nonexistent/cgroup"))).toEqual({
      "container.id": "unknown",
      "container.image": "unknown",
    });
  });

  it("should read the container image from the environment", () => {
    vi.stubEnv("CONTAINER_IMAGE", "orders:1.4.0");

    expect(toAttributeRecord(containerAttributes("/nonexistent/cgroup"))["container.image"]).toBe("orders:1.4.0");
  });

  it("should return no disk attributes for a missing path", () => {
    expect(diskAttributes("/nonexistent/volume")).toEqual([]);
  });

  it("should describe the current process", () => {
    const attrs = toAttributeRecord(processAttributes());
    expect(attrs["process.id"]).toBe(process.pid);
    expect(attrs["process.runtime.version"]).toBe(process.version);
  });

  it("should type cpu and concurrency facts", () => {
    expect(cpuAttributes().map((a) => a.value.type)).toEqual(["int", "string", "float"]);
    expect(concurrencyAttributes()[0]?.key).toBe("process.active_resources");
  });
});
