import { describeTransactionalKvStoreContract } from "../../../ports/__tests__/transactional-kv-store.contract"
import { FakeEtcdClient } from "../../../tests/utils/fake-etcd-client"
import { EtcdTransactionalKeyValueStore } from "../etcd-transactional-kv-store"

describeTransactionalKvStoreContract("EtcdTransactionalKeyValueStore", () => {
  return new EtcdTransactionalKeyValueStore(new FakeEtcdClient())
})
