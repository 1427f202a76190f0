export type KvFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type KvNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a single-key read. A miss means the key does not exist.
 */
export type KvResult<T> = KvFound<T> | KvNotFound
