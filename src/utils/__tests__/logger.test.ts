import { describe, expect, it } from "vitest";
import { create_logger, is_log_level, resolve_log_level } from "../logger";

describe("logger", () => {
  //=========================================================
  // Level resolution
  //=========================================================

  it("an explicit level wins over the environment", () => {
    expect(resolve_log_level("debug", { CONTAINERS_LOG_LEVEL: "error" })).toBe("debug");
  });

  it("falls back to CONTAINERS_LOG_LEVEL", () => {
    expect(resolve_log_level(undefined, { CONTAINERS_LOG_LEVEL: "info" })).toBe("info");
  });

  it("ignores an unknown level in the environment", () => {
    expect(resolve_log_level(undefined, { CONTAINERS_LOG_LEVEL: "loud" })).toBe("warn");
  });

  it("defaults to warn", () => {
    expect(resolve_log_level(undefined, {})).toBe("warn");
  });

  it("is_log_level knows the winston npm levels", () => {
    expect(is_log_level("silly")).toBe(true);
    expect(is_log_level("trace")).toBe(false);
    expect(is_log_level(undefined)).toBe(false);
  });

  //=========================================================
  // create_logger
  //=========================================================

  it("applies level and silent options", () => {
    const logger = create_logger({ module: "test", level: "debug", silent: true });
    expect(logger.level).toBe("debug");
    expect(logger.silent).toBe(true);
    expect(logger.isDebugEnabled()).toBe(true);
  });

  it("attaches the module as default metadata", () => {
    const logger = create_logger({ module: "buckets", silent: true });
    expect(logger.defaultMeta).toEqual({ module: "buckets" });
  });
});
