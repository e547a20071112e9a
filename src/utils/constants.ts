// HashTable defaults
export const DEFAULT_HASH_TABLE_CAPACITY = 100;
export const HASH_TABLE_GROWTH_FACTOR = 2.0;

// Vec defaults
export const DEFAULT_VEC_CAPACITY = 100;
export const VEC_GROWTH_FACTOR = 1.5;

// Largest length a JS array can take (2^32 - 1)
export const MAX_ARRAY_LENGTH = 4_294_967_295;

// FNV-1a hash constants (used by hash_string)
export const FNV_OFFSET_BASIS = 0x811c9dc5;
export const FNV_PRIME = 0x01000193;

// Hash multipliers for combining hashes (golden-ratio derived)
export const HASH_GOLDEN_RATIO = 0x9e3779b9;
export const HASH_SECONDARY_PRIME = 0x517cc1b7;

// Logging
export const LOG_LEVEL_ENV = "CONTAINERS_LOG_LEVEL";
export const DEFAULT_LOG_LEVEL = "warn";
