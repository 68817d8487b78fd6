// Don't export the module from the barrel export - Due to the @Module decorator,
// the module will attempt to init partially during tests, anytime this barrel
// export is imported for shared types.

// export { ConfigManagementModule } from "./config-management.module";
export * from "./types/config.types";
