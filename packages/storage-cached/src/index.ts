export { type CachedStorageConfig, createCachedStorage } from "./cached-storage.ts";
