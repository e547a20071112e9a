/** Anything that owns storage and must be released exactly once. */
export interface Freeable {
  readonly is_freed: boolean;
  free(): void;
}

/**
 * Run `fn` with `resource` and free the resource on every exit path,
 * including a throw. A resource that `fn` freed itself is left alone.
 */
export function scoped<T extends Freeable, R>(resource: T, fn: (resource: T) => R): R {
  try {
    return fn(resource);
  } finally {
    if (!resource.is_freed) resource.free();
  }
}
