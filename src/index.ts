// Hash table
export { HashTable, type HashTableOptions } from "./hash_table/hash_table";
export type { Entry } from "./hash_table/bucket_array";
export {
  combine_hashes,
  hash_int,
  hash_string,
  strict_equals,
  type HashFn,
  type KeyEquals,
} from "./hash_table/hashing";

// Lists
export { LinkedList, ListNode, type ListOptions } from "./list/linked_list";

// Vectors
export { Vec, type VecOptions } from "./vec/vec";

// Storage
export {
  SystemAllocator,
  TrackingAllocator,
  system_allocator,
  type Allocator,
  type AllocatorLimits,
} from "./memory/allocator";
export { scoped, type Freeable } from "./memory/scope";

// Results
export {
  NONE,
  err,
  map_option,
  ok,
  some,
  unwrap,
  unwrap_or,
  type Option,
  type Result,
} from "./type_primitives";

// Errors
export {
  AppError,
  CONTAINER_ERROR,
  ContainerError,
  is_container_error,
} from "./utils/error";
export { TypeError, TYPE_ERROR } from "./type_primitives";

// Logging
export {
  create_logger,
  default_logger,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from "./utils/logger";
