export { CheckpointStoreDriver } from "./modules/config-management/types/config.types";
export * from "./modules/domains/checkpoint-storage/base.checkpointer.adapter";
export * from "./modules/domains/checkpoint-storage/checkpoint-storage.module";
export type { CheckpointStorageModuleOptions } from "./modules/domains/checkpoint-storage/checkpoint-storage.module-definition";
export * from "./modules/domains/checkpoint-storage/errors/checkpoint.errors";
export * from "./modules/domains/checkpoint-storage/memory.checkpointer.adapter";
export * from "./modules/domains/checkpoint-storage/ports/checkpointer.port";
export * from "./modules/domains/checkpoint-storage/query/search-where";
export * from "./modules/domains/checkpoint-storage/serde/legacy-compat.serializer";
export * from "./modules/domains/checkpoint-storage/serde/pickle.decoder";
export type * from "./modules/domains/checkpoint-storage/serde/serializer.port";
export * from "./modules/domains/checkpoint-storage/serde/graph-json.serializer";
export * from "./modules/domains/checkpoint-storage/sqlite.checkpointer.adapter";
export * from "./modules/domains/checkpoint-storage/types/checkpoint.types";
