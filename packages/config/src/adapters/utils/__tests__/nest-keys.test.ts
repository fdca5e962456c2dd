import { nestKeys } from "../nest-keys"

describe("nestKeys", () => {
  it("nests and lower-cases keys", () => {
    expect(nestKeys({ SESSION__NAME: "sid", SESSION__SAVE_PATH: "/tmp", IDE: "vscode" }, "__")).toEqual({
      session: { name: "sid", save_path: "/tmp" },
      ide: "vscode",
    })
  })

  it("skips undefined values", () => {
    expect(nestKeys({ A: undefined, B: "1" }, "__")).toEqual({ b: "1" })
  })

  it("rejects a value under a key that already holds one", () => {
    expect(() => nestKeys({ LOCK: "flock", LOCK__DEFAULT: "semaphore" }, "__")).toThrow(
      'Cannot nest "LOCK__DEFAULT" under "lock", which already holds a value',
    )
  })

  it("rejects a value over nested keys", () => {
    expect(() => nestKeys({ LOCK__DEFAULT: "semaphore", LOCK: "flock" }, "__")).toThrow(
      '"LOCK" conflicts with nested keys under "lock"',
    )
  })

  it("rejects empty segments", () => {
    expect(() => nestKeys({ LOCK__: "flock" }, "__")).toThrow('Cannot read "LOCK__": empty key segment')
  })

  it("rejects the __proto__ segment", () => {
    expect(() => nestKeys({ "__PROTO__.POLLUTED": "yes" }, ".")).toThrow('Cannot read "__PROTO__.POLLUTED": reserved key segment')
  })
})
