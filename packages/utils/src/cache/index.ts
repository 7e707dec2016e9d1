/**
 * Response Cache
 *
 * File-backed payload storage used for offline content.
 */

export {
  ResponseCache,
  createResponseCache,
  type ResponseCacheConfig,
} from "./responseCache";

export {
  StorageError,
  isStorageError,
  type StorageOperation,
} from "./storageError";

export { KeyedLock } from "./keyedLock";
