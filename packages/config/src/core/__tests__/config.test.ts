import { Config } from "../config"

describe("Config", () => {
  const data = { PORT: 6379, LOG_PRETTY: false, HOST: "127.0.0.1" }
  const provenance = { PORT: "env", LOG_PRETTY: "default", HOST: "dotenv:.env" }
  const providedKeys = new Set(["PORT", "HOST", "STALE_KEY"])

  const config = new Config(data, provenance, providedKeys)

  describe("value", () => {
    it("exposes typed values", () => {
      const port: number = config.value.PORT
      const pretty: boolean = config.value.LOG_PRETTY

      expect(port).toBe(6379)
      expect(pretty).toBe(false)
      expect(config.value.HOST).toBe("127.0.0.1")
    })

    it("is frozen", () => {
      expect(Object.isFrozen(config.value)).toBe(true)
    })
  })

  describe("keys", () => {
    it("returns config keys only", () => {
      expect(config.keys().sort()).toEqual(["HOST", "LOG_PRETTY", "PORT"])
    })
  })

  describe("explain", () => {
    it("returns source name for key from source", () => {
      expect(config.explain("PORT")).toBe("env")
      expect(config.explain("HOST")).toBe("dotenv:.env")
    })

    it("returns 'default' for key from schema default", () => {
      expect(config.explain("LOG_PRETTY")).toBe("default")
    })
  })

  describe("sourcesUsed", () => {
    it("returns unique source names including 'default'", () => {
      expect(config.sourcesUsed().sort()).toEqual(["default", "dotenv:.env", "env"])
    })
  })

  describe("unknownKeys", () => {
    it("returns keys in sources but not in schema", () => {
      expect(config.unknownKeys()).toEqual(["STALE_KEY"])
    })

    it("returns empty array when every provided key is known", () => {
      const clean = new Config(data, provenance, new Set(["PORT", "HOST"]))

      expect(clean.unknownKeys()).toEqual([])
    })
  })
})
