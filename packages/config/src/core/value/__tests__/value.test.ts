import type { ConfigValue, ConfigValueKind } from "../../../ports/value"
import { cloneValue, createTree, getMember, isTable, kindOf, setMember } from "../value"
import { valueToString } from "../value-to-string"

describe("kindOf", () => {
  it.each<[ConfigValue, ConfigValueKind]>([
    [{}, "table"],
    [[1], "array"],
    ["s", "string"],
    [42, "integer"],
    [-3n, "integer"],
    [1.5, "float"],
    [Number.POSITIVE_INFINITY, "float"],
    [false, "boolean"],
    [new Date(0), "datetime"],
  ])("%s is a %s", (value, kind) => {
    expect(kindOf(value)).toBe(kind)
  })
})

describe("isTable", () => {
  it("accepts plain objects only", () => {
    expect(isTable({ a: 1 })).toBe(true)
    expect(isTable([])).toBe(false)
    expect(isTable(new Date(0))).toBe(false)
    expect(isTable("{}")).toBe(false)
  })
})

describe("valueToString", () => {
  it.each<[ConfigValue, string]>([
    ["text", "text"],
    [-42, "-42"],
    [12345678901234567890n, "12345678901234567890"],
    [3.25, "3.25"],
    [1e21, "1e+21"],
    [true, "true"],
    [false, "false"],
    [new Date("2024-01-15T10:30:00Z"), "2024-01-15T10:30:00.000Z"],
  ])("renders %s as %s", (value, text) => {
    expect(valueToString(value, "ref", "loc")).toBe(text)
  })

  it("renders a date-only value as a full UTC timestamp", () => {
    expect(valueToString(new Date(Date.UTC(1979, 4, 27)), "born", "loc")).toBe(
      "1979-05-27T00:00:00.000Z",
    )
  })

  it("rejects tables and arrays", () => {
    expect(() => valueToString({ a: 1 }, "ref", "loc")).toThrow(
      expect.objectContaining({
        code: "non_scalar_reference",
        context: { reference: "ref", location: "loc", kind: "table" },
      }),
    )
    expect(() => valueToString([1], "ref", "loc")).toThrow(
      expect.objectContaining({ code: "non_scalar_reference" }),
    )
  })
})

describe("cloneValue", () => {
  it("copies deeply and keeps dates and bigints", () => {
    const original = { at: new Date(0), big: 1n, nested: { list: [1] } }
    const copy = cloneValue(original)

    expect(copy).toEqual(original)
    expect(copy.nested).not.toBe(original.nested)
    expect(copy.at).toBeInstanceOf(Date)
    expect(copy.at).not.toBe(original.at)
  })
})

describe("members", () => {
  it("reads own members only", () => {
    const table = { a: 1 }

    expect(getMember(table, "a")).toBe(1)
    expect(getMember(table, "hasOwnProperty")).toBeUndefined()
  })

  it("writes __proto__ as data", () => {
    const table = createTree().root
    if (!isTable(table)) throw new Error("expected a table")

    setMember(table, "__proto__", "x")

    expect(getMember(table, "__proto__")).toBe("x")
    expect(Object.getPrototypeOf(table)).toBe(Object.prototype)
  })
})
