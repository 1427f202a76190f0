import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"

export type RedisBytesMulti = {
  set(key: string, value: Buffer): RedisBytesMulti
  del(keys: string | string[]): RedisBytesMulti
  exec(): Promise<unknown[] | null>
}

/**
 * The slice of a node-redis client the store uses, with bulk strings mapped
 * to `Buffer`.
 */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  mGet(keys: string[]): Promise<(Buffer | null)[]>

  scan(
    cursor: string,
    opts: { MATCH: string; COUNT?: number },
  ): Promise<{ cursor: Buffer | string; keys: (Buffer | string)[] }>

  multi(): RedisBytesMulti

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean
}

export type RedisBytesClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/**
 * Caller owns `connect()`; the store owns `quit()`.
 */
export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  return createClient({ ...options, url: options.url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
