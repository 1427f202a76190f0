import type { KvKey } from "../ports/kv-key"
import type { KvDelete, KvPut } from "../ports/kv-op"

export function put(key: KvKey, value: Uint8Array): KvPut {
  return { kind: "put", key, value }
}

export function del(key: KvKey): KvDelete {
  return { kind: "delete", key }
}
