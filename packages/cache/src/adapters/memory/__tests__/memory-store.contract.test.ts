import { describeStoreContract } from "../../../ports/__tests__/store.contract"
import { ManualClock } from "../../../tests/utils/manual-clock"
import { MemoryStore } from "../memory-store"

describeStoreContract({
  name: "MemoryStore",
  make: (namespace) => {
    const clock = new ManualClock()

    return { store: new MemoryStore({ clock }, { namespace }), clock }
  },
})
