import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("filters and strips the prefix", async () => {
    const env = {
      APP__DEFAULT_LOCALE: "fr",
      APP__SESSION__NAME: "sid",
      OTHER_KEY: "ignored",
      PATH: "/usr/bin",
    }

    const source = new EnvSource({ env, prefix: "APP__" })

    await expect(source.load()).resolves.toEqual({
      default_locale: "fr",
      session: { name: "sid" },
    })
  })

  it("skips unset variables", async () => {
    const source = new EnvSource({ env: { APP__IDE: undefined, APP__SECRET: "test-secret" }, prefix: "APP__" })

    await expect(source.load()).resolves.toEqual({ secret: "test-secret" })
  })

  it("honours a custom delimiter", async () => {
    const source = new EnvSource({ env: { CFG_MAILER_DSN: "null://null" }, prefix: "CFG_", delimiter: "_" })

    await expect(source.load()).resolves.toEqual({ mailer: { dsn: "null://null" } })
  })

  it("rejects an empty key segment", async () => {
    const source = new EnvSource({ env: { APP__SESSION____NAME: "sid" }, prefix: "APP__" })

    await expect(source.load()).rejects.toThrow('Cannot read "SESSION____NAME": empty key segment')
  })

  it("uses injected env over process.env", async () => {
    const source = new EnvSource({ env: { APP__CUSTOM: "injected_value" }, prefix: "APP__" })
    const result = await source.load()

    expect(result).toEqual({ custom: "injected_value" })
    expect(result).not.toHaveProperty("path")
  })
})
