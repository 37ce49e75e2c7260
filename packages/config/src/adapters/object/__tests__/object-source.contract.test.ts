import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: async () => ({
    source: new ObjectSource({ server: { host: "localhost" }, debug: null }),
  }),
  setup: async () => {},
  expectedEntries: () => [{ path: [], value: { server: { host: "localhost" } } }],
})
