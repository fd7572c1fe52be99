import { afterEach, describe, expect, test, vi } from "vitest";
import { createLogger, parseLogLevel } from "../src/observability/logger.js";

describe("Structured Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("should output json with request fields", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ component: "test" }).child({
      uid: "req-1",
      namespace: "default",
      operation: "CREATE",
      stage: undefined,
    });

    logger.info("restore admitted", { causes: 0 });

    expect(spy).toHaveBeenCalledTimes(1);
    const payload = JSON.parse(String(spy.mock.calls[0][0])) as Record<
      string,
      unknown
    >;
    expect(payload.level).toBe("info");
    expect(payload.message).toBe("restore admitted");
    expect(payload.component).toBe("test");
    expect(payload.uid).toBe("req-1");
    expect(payload.namespace).toBe("default");
    expect(payload.operation).toBe("CREATE");
    expect(payload.causes).toBe(0);
    expect("stage" in payload).toBe(false);
  });

  test("should drop records below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger({}, { level: "warn" }).child({ uid: "req-2" });

    logger.info("ignored");
    logger.warn("kept");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      level: "warn",
      message: "kept",
      uid: "req-2",
    });
  });

  test("should parse log levels", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
