import { afterEach, describe, it, expect, vi } from "vitest";
import { getEnv, getEnvArray, getEnvFloat, getEnvNumber, isDevelopment, pickEnv } from "./env.js";

describe("@tracewright/core - Environment", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should read raw values with defaults", () => {
    vi.stubEnv("TW_TEST_NAME", "orders");
    vi.stubEnv("TW_TEST_EMPTY", "");

    expect(getEnv("TW_TEST_NAME")).toBe("orders");
    expect(getEnv("TW_TEST_MISSING", "fallback")).toBe("fallback");
    expect(getEnv("TW_TEST_EMPTY", "fallback")).toBe("");
  });

  it("should parse numbers", () => {
    vi.stubEnv("TW_TEST_INT", "250");
    vi.stubEnv("TW_TEST_FLOAT", "0.25");
    vi.stubEnv("TW_TEST_BAD", "abc");
    vi.stubEnv("TW_TEST_EMPTY", "");

    expect(getEnvNumber("TW_TEST_INT")).toBe(250);
    expect(getEnvNumber("TW_TEST_FLOAT")).toBe(0);
    expect(getEnvNumber("TW_TEST_BAD", 7)).toBe(7);
    expect(getEnvNumber("TW_TEST_EMPTY")).toBeUndefined();
    expect(getEnvFloat("TW_TEST_FLOAT")).toBe(0.25);
    expect(getEnvFloat("TW_TEST_BAD")).toBeUndefined();
  });

  it("should split lists", () => {
    vi.stubEnv("TW_TEST_LIST", "a, b,,c");
    vi.stubEnv("TW_TEST_EMPTY", "");

    expect(getEnvArray("TW_TEST_LIST")).toEqual(["a", "b", "c"]);
    expect(getEnvArray("TW_TEST_EMPTY")).toBeUndefined();
  });

  it("pickEnv should skip unset and empty variables in request order", () => {
    vi.stubEnv("TW_TEST_REGION", "eu-west-1");
    vi.stubEnv("TW_TEST_BLANK", "");
    vi.stubEnv("TW_TEST_ENV", "staging");

    expect(pickEnv(["TW_TEST_ENV", "TW_TEST_BLANK", "TW_TEST_UNSET", "TW_TEST_REGION"])).toEqual([
      ["TW_TEST_ENV", "staging"],
      ["TW_TEST_REGION", "eu-west-1"],
    ]);
  });

  it("should treat an empty NODE_ENV as development", () => {
    vi.stubEnv("NODE_ENV", "");
    expect(isDevelopment()).toBe(true);

    vi.stubEnv("NODE_ENV", "production");
    expect(isDevelopment()).toBe(false);
  });
});
