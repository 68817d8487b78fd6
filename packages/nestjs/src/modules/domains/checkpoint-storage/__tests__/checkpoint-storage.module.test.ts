import type { ModuleMetadata } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import { afterEach, describe, expect, it } from "vitest";

import { AppModule } from "../../../../app.module";
import { CheckpointStoreDriver } from "../../../config-management";
import {
  CheckpointStorageModule,
  createCheckpointer,
} from "../checkpoint-storage.module";
import { StorageError } from "../errors/checkpoint.errors";
import { MemoryCheckpointerAdapter } from "../memory.checkpointer.adapter";
import { CHECKPOINTER, type CheckpointerPort } from "../ports/checkpointer.port";
import { SqliteCheckpointerAdapter } from "../sqlite.checkpointer.adapter";
import { makeCheckpoint } from "./checkpointer.suite";

describe("CheckpointStorageModule", () => {
  let moduleRef: TestingModule | undefined;

  afterEach(async () => {
    await moduleRef?.close();
    moduleRef = undefined;
  });

  const compile = async (
    imports: ModuleMetadata["imports"],
  ): Promise<TestingModule> => {
    const compiled = await Test.createTestingModule({ imports }).compile();
    moduleRef = compiled;
    await compiled.init();
    return compiled;
  };

  describe("register", () => {
    it("should provide a SQLite checkpointer", async () => {
      const compiled = await compile([
        CheckpointStorageModule.register({
          driver: CheckpointStoreDriver.SQLITE,
          connectionString: ":memory:",
          pageSize: 10,
        }),
      ]);

      const checkpointer = compiled.get<CheckpointerPort>(CHECKPOINTER);

      expect(checkpointer).toBeInstanceOf(SqliteCheckpointerAdapter);
      await checkpointer.put({ thread_id: "1" }, makeCheckpoint("a"), {});
      await expect(checkpointer.get({ thread_id: "1" })).resolves.toEqual(
        makeCheckpoint("a"),
      );
    });

    it("should return a dynamic module of its own class", () => {
      const dynamicModule = CheckpointStorageModule.register({
        driver: CheckpointStoreDriver.MEMORY,
      });

      expect(dynamicModule.module).toBe(CheckpointStorageModule);
      expect(dynamicModule.exports).toContain(CHECKPOINTER);
    });

    it("should provide an in-memory checkpointer", async () => {
      const compiled = await compile([
        CheckpointStorageModule.register({ driver: CheckpointStoreDriver.MEMORY }),
      ]);

      expect(compiled.get(CHECKPOINTER)).toBeInstanceOf(
        MemoryCheckpointerAdapter,
      );
    });

    it("should close the SQLite handle when the module is destroyed", async () => {
      const compiled = await compile([
        CheckpointStorageModule.register({
          driver: CheckpointStoreDriver.SQLITE,
          connectionString: ":memory:",
        }),
      ]);
      const checkpointer = compiled.get<CheckpointerPort>(CHECKPOINTER);

      await compiled.close();
      moduleRef = undefined;

      await expect(
        checkpointer.getTuple({ thread_id: "1" }),
      ).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe("registerAsync", () => {
    it("should build the checkpointer from a factory", async () => {
      const compiled = await compile([
        CheckpointStorageModule.registerAsync({
          useFactory: async () => ({ driver: CheckpointStoreDriver.MEMORY }),
        }),
      ]);

      expect(compiled.get(CHECKPOINTER)).toBeInstanceOf(
        MemoryCheckpointerAdapter,
      );
    });

    it("should wire the store from environment configuration", async () => {
      const compiled = await compile([AppModule]);

      const checkpointer = compiled.get<CheckpointerPort>(CHECKPOINTER);

      expect(checkpointer).toBeInstanceOf(SqliteCheckpointerAdapter);
      await expect(
        checkpointer.getTuple({ thread_id: "unknown" }),
      ).resolves.toBeUndefined();
    });
  });
});

describe("createCheckpointer", () => {
  it("should default SQLite to an in-memory database", async () => {
    const checkpointer = createCheckpointer({
      driver: CheckpointStoreDriver.SQLITE,
    });

    try {
      expect(checkpointer).toBeInstanceOf(SqliteCheckpointerAdapter);
      await checkpointer.put({ thread_id: "1" }, makeCheckpoint("a"), {});
      await expect(checkpointer.getTuple({ thread_id: "1" })).resolves.toBeDefined();
    } finally {
      await checkpointer.close();
    }
  });
});
