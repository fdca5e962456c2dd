import { group, list, map, string, variable } from "../../schema/builder"
import { mergeLayers, mergeValues } from "../merge"

describe("mergeValues", () => {
  it("replaces scalars", () => {
    expect(mergeValues(string("name"), "a", "b", "name")).toBe("b")
  })

  it("returns the later value when nothing came before", () => {
    expect(mergeValues(list("hosts", string("host")), undefined, ["a"], "hosts")).toEqual(["a"])
  })

  describe("lists", () => {
    it("replaces by default", () => {
      expect(mergeValues(list("hosts", string("host")), ["a", "b"], ["c"], "hosts")).toEqual(["c"])
    })

    it("appends", () => {
      const node = list("paths", string("path"), { merge: "append" })

      expect(mergeValues(node, ["a", "b"], ["b", "c"], "paths")).toEqual(["a", "b", "b", "c"])
    })

    it("appends unique entries at their last position", () => {
      const node = list("paths", variable("path"), { merge: "append-unique" })

      expect(mergeValues(node, ["a", "b", 1], ["b", "c"], "paths")).toEqual(["a", 1, "b", "c"])
    })

    it("ignores key order when comparing entries", () => {
      const node = list("middleware", group("middleware", [string("id"), string("x")]), { merge: "append-unique" })

      expect(mergeValues(node, [{ id: "a", x: "1" }], [{ x: "1", id: "a" }], "middleware")).toEqual([
        { id: "a", x: "1" },
      ])
    })

    describe("with an identity field", () => {
      const node = list("middleware", group("middleware", [string("id"), list("arguments", variable("argument"))]), {
        merge: "append-unique",
        uniqueBy: "id",
      })

      it("keeps the last entry per identity at its position", () => {
        const merged = mergeValues(
          node,
          [{ id: "a", arguments: [1] }, { id: "b", arguments: [] }],
          [{ id: "a", arguments: [2] }],
          "middleware",
        )

        expect(merged).toEqual([
          { id: "b", arguments: [] },
          { id: "a", arguments: [2] },
        ])
      })

      it("falls back to content for entries without the field", () => {
        expect(mergeValues(node, [{ arguments: [1] }], [{ arguments: [1] }, { arguments: [2] }], "middleware")).toEqual(
          [{ arguments: [1] }, { arguments: [2] }],
        )
      })
    })

    it("compares structured entries by content", () => {
      const node = list("middleware", group("middleware", [string("id")]), { merge: "append-unique" })

      expect(mergeValues(node, [{ id: "a" }, { id: "b" }], [{ id: "a" }], "middleware")).toEqual([
        { id: "b" },
        { id: "a" },
      ])
    })
  })

  describe("maps", () => {
    const buses = map("buses", group("bus", [variable("default_middleware"), list("middleware", string("id"))]))

    it("merges entries by key", () => {
      const merged = mergeValues(
        buses,
        { first: { default_middleware: false, middleware: ["a"] }, second: { middleware: ["b"] } },
        { first: { middleware: ["c"] }, third: {} },
        "buses",
      )

      expect(merged).toEqual({
        first: { default_middleware: false, middleware: ["c"] },
        second: { middleware: ["b"] },
        third: {},
      })
    })

    it("merges keys named after object built-ins", () => {
      expect(
        mergeValues(buses, { first: { middleware: ["a"] } }, { constructor: { middleware: ["b"] } }, "buses"),
      ).toEqual({ first: { middleware: ["a"] }, constructor: { middleware: ["b"] } })
    })

    it("replaces the whole map when told to", () => {
      const node = map("headers", string("value"), { merge: "replace" })

      expect(mergeValues(node, { a: "1", b: "2" }, { c: "3" }, "headers")).toEqual({ c: "3" })
    })
  })

  it("merges groups child by child", () => {
    const session = group("session", [string("name"), string("save_path")])

    expect(mergeValues(session, { name: "a", save_path: "/tmp" }, { name: "b" }, "session")).toEqual({
      name: "b",
      save_path: "/tmp",
    })
  })

  it("does not mutate its inputs", () => {
    const session = group("session", [string("name")])
    const prev = { name: "a" }

    mergeValues(session, prev, { name: "b" }, "session")

    expect(prev).toEqual({ name: "a" })
  })
})

describe("mergeLayers", () => {
  const root = group("framework", [string("default_locale"), list("trusted_hosts", string("host"))])

  it("folds layers in order", () => {
    expect(
      mergeLayers(root, [{ default_locale: "en" }, { trusted_hosts: ["a"] }, { default_locale: "fr" }], "framework"),
    ).toEqual({ default_locale: "fr", trusted_hosts: ["a"] })
  })

  it("returns undefined for no layers", () => {
    expect(mergeLayers(root, [], "framework")).toBeUndefined()
  })
})
