import { readFile } from "node:fs/promises"
import { Etcd3, type IOptions } from "etcd3"

export type EtcdRequestOp =
  | { request_put: { key: Buffer; value: Buffer } }
  | { request_delete_range: { key: Buffer } }

export type EtcdTxnRequest = {
  success: EtcdRequestOp[]
}

export type EtcdTxnReply = {
  succeeded: boolean
  header: { revision: string }
}

/**
 * The slice of the etcd3 client the store uses.
 */
export type EtcdBytesClient = {
  get(key: string): { buffer(): Promise<Buffer | null> }
  getAll(): { prefix(prefix: string): { buffers(): Promise<Record<string, Buffer>> } }
  readonly kv: { txn(req: EtcdTxnRequest): Promise<EtcdTxnReply> }
  close(): void
}

export type EtcdClientOptions = {
  /** e.g. "http://127.0.0.1:2379"; several endpoints may be comma separated. */
  url: string
  username?: string
  password?: string
  caCertFile?: string
  certChainFile?: string
  privateKeyFile?: string
}

/**
 * Builds an etcd client. The connection is opened lazily on the first call.
 *
 * @remarks
 * TLS material is read from disk here; client certificates require a CA.
 */
export async function createEtcdClient(options: EtcdClientOptions): Promise<EtcdBytesClient> {
  const hosts = options.url.split(",").map((host) => host.trim())
  const etcdOptions: IOptions = { hosts }

  if (options.caCertFile !== undefined) {
    etcdOptions.credentials = {
      rootCertificate: await readFile(options.caCertFile),
      ...(options.certChainFile !== undefined && {
        certChain: await readFile(options.certChainFile),
      }),
      ...(options.privateKeyFile !== undefined && {
        privateKey: await readFile(options.privateKeyFile),
      }),
    }
  } else if (options.certChainFile !== undefined || options.privateKeyFile !== undefined) {
    throw new Error("etcd client certificates require a CA certificate")
  }

  if (options.username !== undefined && options.password !== undefined) {
    etcdOptions.auth = { username: options.username, password: options.password }
  }

  return new Etcd3(etcdOptions)
}
