export { createEtcdClient } from "./adapters/etcd/etcd-client"
export type {
  EtcdBytesClient,
  EtcdClientOptions,
  EtcdRequestOp,
  EtcdTxnReply,
  EtcdTxnRequest,
} from "./adapters/etcd/etcd-client"
export { EtcdTransactionalKeyValueStore } from "./adapters/etcd/etcd-transactional-kv-store"
export {
  MemoryTransactionalKeyValueStore,
  type MemoryKvStoreOptions,
} from "./adapters/memory/memory-transactional-kv-store"
export { createRedisClient } from "./adapters/redis/redis-client"
export type {
  RedisBytesClient,
  RedisBytesClientOptions,
  RedisBytesMulti,
} from "./adapters/redis/redis-client"
export {
  RedisTransactionalKeyValueStore,
  type RedisKvStoreOptions,
} from "./adapters/redis/redis-transactional-kv-store"
export { jsonCodec } from "./core/codec/json-codec"
export { utf8Codec } from "./core/codec/utf8-codec"
export { callBackend, KvError, type KvErrorCode, type KvOperation } from "./core/errors/kv-error"
export { del, put } from "./core/op"
export { SerialKeyValueStore } from "./core/serial/serial-kv-store"
export type { Codec } from "./ports/codec"
export type { KvKey } from "./ports/kv-key"
export type { KvDelete, KvOp, KvPut } from "./ports/kv-op"
export type { KvFound, KvNotFound, KvResult } from "./ports/kv-result"
export type { KvBackendName, KvTxnResponse, KvTxnResult } from "./ports/kv-txn"
export type { KvEntry } from "./ports/kv-value"
export type { TransactionalKeyValueStore } from "./ports/transactional-kv-store"
