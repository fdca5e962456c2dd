import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: async () => ({
    source: new ObjectSource({ session: { name: "sid" } }, "tests"),
  }),
  setup: async () => {},
  expectedValue: () => ({ session: { name: "sid" } }),
})
