import { deepFreeze } from "../deep-freeze"

describe("deepFreeze", () => {
  it("freezes nested tables and arrays", () => {
    const value = deepFreeze({ server: { hosts: ["a", "b"] } })

    expect(Object.isFrozen(value)).toBe(true)
    expect(Object.isFrozen(value.server)).toBe(true)
    expect(Object.isFrozen(value.server.hosts)).toBe(true)
  })

  it("handles arrays with hundreds of thousands of elements", () => {
    const list = Array.from({ length: 300_000 }, (_, i) => ({ id: i }))

    deepFreeze(list)

    expect(Object.isFrozen(list)).toBe(true)
    expect(Object.isFrozen(list[299_999])).toBe(true)
  })
})
