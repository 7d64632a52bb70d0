export { SqlitePackageStore } from "./sqlite-store.js";
export * as schema from "./schema.js";
