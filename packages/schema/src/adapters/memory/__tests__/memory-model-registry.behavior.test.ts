import { ConfigurationError } from "@keymap/errors"
import type { Logger } from "@keymap/logger"
import { defineModel } from "../../../core/define-model"
import { fieldTypes } from "../../../core/field-types"
import { MemoryModelRegistry } from "../memory-model-registry"

function createRecordingLogger() {
  const child = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  }
  const root: Logger = { ...child, child: vi.fn(() => child) }

  return { root, child }
}

const User = defineModel("User", { id: { type: fieldTypes.uuid, primaryKey: true } })

describe("MemoryModelRegistry (behavior)", () => {
  it("scopes its logger to the registry module", () => {
    const { root } = createRecordingLogger()

    new MemoryModelRegistry({ logger: root })

    expect(root.child).toHaveBeenCalledWith({ module: "model-registry" })
  })

  it("registers several models at once", () => {
    const { root } = createRecordingLogger()
    const Team = defineModel("Team", { slug: { type: fieldTypes.ascii, primaryKey: true } })

    const registry = new MemoryModelRegistry({ logger: root }).register(User, Team)

    expect(registry.has("User")).toBe(true)
    expect(registry.has("Team")).toBe(true)
    expect(registry.has("Ghost")).toBe(false)
  })

  it("rejects registering the same name twice", () => {
    const { root } = createRecordingLogger()
    const registry = new MemoryModelRegistry({ logger: root }).register(User)

    expect(() => registry.register(User)).toThrow(ConfigurationError)
  })

  it("logs registration with the primary key", () => {
    const { root, child } = createRecordingLogger()

    new MemoryModelRegistry({ logger: root }).register(User)

    expect(child.debug).toHaveBeenCalledWith("model registered", {
      operation: "register",
      model: "User",
      primaryKey: ["id"],
    })
  })

  it("logs a warning with the error when a model is unknown", async () => {
    const { root, child } = createRecordingLogger()
    const registry = new MemoryModelRegistry({ logger: root })

    await expect(registry.resolve("Ghost")).rejects.toThrow('Unknown model "Ghost"')

    expect(child.warn).toHaveBeenCalledWith(
      "model not found",
      expect.objectContaining({ operation: "resolve", model: "Ghost" }),
    )
  })
})
