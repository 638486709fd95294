import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

const SOURCE_ROOTS = ["packages/core/src", "scripts"];

const CONSOLE_CALL = /\bconsole\.[a-z]+\s*\(/;
const STREAM_WRITE = /process\.(stdout|stderr)\.write\s*\(/;

// Log lines leave through the logger sink, command output through the write helper.
const STREAM_WRITERS = [
  "packages/core/src/observability/logger.ts",
  "packages/core/src/cli/command-support.ts",
  "scripts/swipe-session.ts",
];

function productionSources(): Array<{ file: string; source: string }> {
  return SOURCE_ROOTS.flatMap((root) =>
    fs.readdirSync(path.resolve(process.cwd(), root), { recursive: true, encoding: "utf8" })
      .filter((name) => name.endsWith(".ts"))
      .map((name) => {
        const file = path.posix.join(root, name.split(path.sep).join("/"));
        return { file, source: fs.readFileSync(path.resolve(process.cwd(), file), "utf8") };
      })
  );
}

describe("output guardrails", () => {
  it("keeps console calls out of production sources", () => {
    const offenders = productionSources()
      .filter(({ source }) => CONSOLE_CALL.test(source))
      .map(({ file }) => file);

    expect(offenders).toEqual([]);
  });

  it("writes to the process streams only from the logger and the command helpers", () => {
    const writers = productionSources()
      .filter(({ source }) => STREAM_WRITE.test(source))
      .map(({ file }) => file)
      .sort();

    expect(writers).toEqual([...STREAM_WRITERS].sort());
  });

  it("recognises a raw console call", () => {
    expect(CONSOLE_CALL.test("export const demo = () => { console.info('debug line'); };")).toBe(true);
  });
});
