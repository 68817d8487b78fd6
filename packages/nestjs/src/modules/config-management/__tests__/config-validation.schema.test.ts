import { afterEach, describe, expect, it, vi } from "vitest";

import checkpointStorageConfig from "../configs/checkpoint-storage.config";
import { configValidationSchema } from "../schemas/config-validation.schema";
import { CheckpointStoreDriver } from "../types/config.types";

describe("configValidationSchema", () => {
  it("should fill defaults for an empty environment", () => {
    const { error, value } = configValidationSchema.validate({});

    expect(error).toBeUndefined();
    expect(value).toEqual({
      NODE_ENV: "development",
      LOG_LEVEL: "log",
      CHECKPOINT_STORE_DRIVER: "sqlite",
      CHECKPOINT_STORE_CONN_STRING: "checkpoints.sqlite",
      CHECKPOINT_STORE_PAGE_SIZE: 100,
    });
  });

  it("should convert numeric strings", () => {
    const { error, value } = configValidationSchema.validate({
      CHECKPOINT_STORE_PAGE_SIZE: "25",
    });

    expect(error).toBeUndefined();
    expect(value).toMatchObject({ CHECKPOINT_STORE_PAGE_SIZE: 25 });
  });

  it.each([
    ["an unknown driver", { CHECKPOINT_STORE_DRIVER: "postgres" }],
    ["a zero page size", { CHECKPOINT_STORE_PAGE_SIZE: "0" }],
    ["a fractional page size", { CHECKPOINT_STORE_PAGE_SIZE: "1.5" }],
    ["an unknown log level", { LOG_LEVEL: "trace" }],
  ])("should reject %s", (_, env) => {
    const { error } = configValidationSchema.validate(env);

    expect(error).toBeDefined();
  });

  it("should report every failure at once", () => {
    const { error } = configValidationSchema.validate(
      { CHECKPOINT_STORE_DRIVER: "postgres", LOG_LEVEL: "trace" },
      { abortEarly: false },
    );

    expect(error?.details.map((detail) => detail.path.join("."))).toEqual([
      "LOG_LEVEL",
      "CHECKPOINT_STORE_DRIVER",
    ]);
  });
});

describe("checkpointStorageConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should read the store settings from the environment", () => {
    vi.stubEnv("CHECKPOINT_STORE_DRIVER", "memory");
    vi.stubEnv("CHECKPOINT_STORE_CONN_STRING", "/var/lib/checkpoints.sqlite");
    vi.stubEnv("CHECKPOINT_STORE_PAGE_SIZE", "50");

    expect(checkpointStorageConfig()).toEqual({
      driver: CheckpointStoreDriver.MEMORY,
      connectionString: "/var/lib/checkpoints.sqlite",
      pageSize: 50,
    });
  });

  it("should fall back to SQLite for anything else", () => {
    vi.stubEnv("CHECKPOINT_STORE_DRIVER", "sqlite");

    expect(checkpointStorageConfig().driver).toBe(CheckpointStoreDriver.SQLITE);
  });
});
