import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("maps key=value pairs to coerced entries", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "PORT=3000\nHOST=localhost\nDEBUG=true")

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(source.name).toBe("dotenv:.env")
    expect(await source.entries()).toEqual([
      { path: ["port"], value: 3000 },
      { path: ["host"], value: "localhost" },
      { path: ["debug"], value: true },
    ])
  })

  it("handles quoted values and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      `# comment\nSINGLE='single quoted'\nDOUBLE="double quoted"\n# another\nUNQUOTED=no quotes`,
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.entries()).toEqual([
      { path: ["single"], value: "single quoted" },
      { path: ["double"], value: "double quoted" },
      { path: ["unquoted"], value: "no quotes" },
    ])
  })

  it("applies prefix and separator like EnvSource", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "APP__DB__URL=postgres://localhost/test\nOTHER=1")

    const source = new DotenvSource({ file: ".env", required: true, cwd, prefix: "APP" })

    expect(await source.entries()).toEqual([
      { path: ["db", "url"], value: "postgres://localhost/test" },
    ])
  })

  it("does not touch process.env", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "GW_DOTENV_PROBE=1")

    await new DotenvSource({ file: ".env", required: true, cwd }).entries()

    expect(process.env.GW_DOTENV_PROBE).toBeUndefined()
  })

  it("yields no entries when the file is missing and not required", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })

    expect(await source.entries()).toEqual([])
  })

  it("fails with file_not_found when the file is missing and required", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.entries()).rejects.toMatchObject({
      code: "file_not_found",
      context: { file: ".env" },
    })
  })
})
