import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { main, parseArgs, USAGE } from "../src/cli";
import type { Env } from "../src/config";
import { BufferSink, BufferSource } from "../src/streams";

function makeIO(stdin = "", env: Env = {}) {
  return {
    stdin: new BufferSource(stdin),
    stdout: new BufferSink(),
    stderr: new BufferSink(),
    env,
  };
}

// Prints 1 on 8-bit cells (256 wraps to 0) and 0 on wider cells.
const WIDTH_PROBE = ">+<" + "+".repeat(256) + "[>-<[-]]>.";

describe("parseArgs", () => {
  it("takes a program file", () => {
    expect(parseArgs(["prog.bf"], {})).toEqual({
      ok: true,
      value: {
        kind: "run",
        program: { kind: "file", path: "prog.bf" },
        options: {},
        quiet: false,
        frame: false,
      },
    });
  });

  it("takes a literal program and inline flag values", () => {
    const res = parseArgs(["--tape-length=10", "-q", "-e", "+."], {});
    expect(res).toEqual({
      ok: true,
      value: {
        kind: "run",
        program: { kind: "literal", text: "+." },
        options: { tapeLength: 10 },
        quiet: true,
        frame: false,
      },
    });
  });

  it("lets flags override the environment", () => {
    const res = parseArgs(["--cell-width", "32", "--frame", "a.bf"], {
      BF_CELL_WIDTH: "8",
      BF_BRACKETS: "table",
    });
    expect(res.ok && res.value.kind === "run" && res.value.options).toEqual({
      cellWidth: 32,
      brackets: "table",
    });
  });

  it("recognises help anywhere", () => {
    expect(parseArgs(["a.bf", "--help"], {})).toEqual({
      ok: true,
      value: { kind: "help" },
    });
  });

  const rejected: Array<[string[], string]> = [
    [[], "no program given"],
    [["-e"], "missing value for -e"],
    [["--brackets"], "missing value for --brackets"],
    [["a.bf", "b.bf"], "unexpected argument: b.bf"],
    [["--bogus"], "unknown option: --bogus"],
    [["-e", "+", "a.bf"], "give either a file or -e <program>, not both"],
    [["-e", "+", "--eval", "-"], "--eval given more than once"],
    [["--cell-width=12", "a.bf"], "invalid cell width: 12 (expected 8, 16 or 32)"],
  ];

  it.each(rejected)("rejects %j", (argv, message) => {
    expect(parseArgs(argv, {})).toEqual({ ok: false, error: message });
  });
});

describe("main", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "bf-cli-"));
    vi.spyOn(console, "error");
    vi.spyOn(console, "log");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("runs a literal program and exits 0", async () => {
    const io = makeIO();
    expect(await main(["-e", "++++++++[>++++++++<-]>."], io)).toBe(0);
    expect(io.stdout.text()).toBe("@");
    expect(io.stderr.text()).toBe("");
  });

  it("runs a program file against stdin", async () => {
    const path = join(dir, "cat.bf");
    await writeFile(path, ",[.,]");
    const io = makeIO("hello");
    expect(await main([path], io)).toBe(0);
    expect(io.stdout.text()).toBe("hello");
  });

  it("exits 1 and logs the fault", async () => {
    const io = makeIO();
    expect(await main(["-e", "<"], io)).toBe(1);
    expect(io.stderr.text()).toBe(
      "error: data pointer moved left out of bounds at char 0\n"
    );
  });

  it("suppresses the fault diagnostic with --quiet", async () => {
    const io = makeIO();
    expect(await main(["--quiet", "-e", "[><"], io)).toBe(1);
    expect(io.stderr.text()).toBe("");
  });

  it("prints a code frame with --frame", async () => {
    const io = makeIO();
    expect(await main(["--frame", "-e", "+\n]"], io)).toBe(1);
    expect(io.stderr.text()).toBe(
      [
        "error: missing opening bracket for closing bracket at char 2",
        "<eval>:2:1 error: missing opening bracket for closing bracket at char 2",
        "2 | ]",
        "  | ^",
        "",
      ].join("\n")
    );
  });

  it("prints usage and exits 1 on bad arguments", async () => {
    const io = makeIO();
    expect(await main([], io)).toBe(1);
    expect(io.stderr.text()).toBe(`error: no program given\n${USAGE}\n`);
    expect(io.stdout.text()).toBe("");
  });

  it("prints usage to stdout for --help", async () => {
    const io = makeIO();
    expect(await main(["-h"], io)).toBe(0);
    expect(io.stdout.text()).toBe(`${USAGE}\n`);
    expect(io.stderr.text()).toBe("");
  });

  it("exits 1 when the file is missing", async () => {
    const path = join(dir, "nope.bf");
    const io = makeIO();
    expect(await main([path], io)).toBe(1);
    expect(io.stderr.text()).toBe(`error: file not found: ${path}\n`);
  });

  it("writes only to the streams it is given", async () => {
    await main([], makeIO());
    await main(["-h"], makeIO());
    await main(["--frame", "-e", "]"], makeIO());
    expect(console.error).not.toHaveBeenCalled();
    expect(console.log).not.toHaveBeenCalled();
  });

  it("takes the cell width from the environment", async () => {
    const io = makeIO("", { BF_CELL_WIDTH: "8" });
    expect(await main(["-e", WIDTH_PROBE], io)).toBe(0);
    expect(Array.from(io.stdout.bytes())).toEqual([1]);
  });

  it("prefers the --cell-width flag over the environment", async () => {
    const io = makeIO("", { BF_CELL_WIDTH: "8" });
    expect(await main(["--cell-width", "32", "-e", WIDTH_PROBE], io)).toBe(0);
    expect(Array.from(io.stdout.bytes())).toEqual([0]);
  });

  it("applies --tape-length", async () => {
    const io = makeIO();
    expect(await main(["--tape-length", "3", "-e", ">>>"], io)).toBe(1);
    expect(io.stderr.text()).toBe(
      "error: data pointer moved right out of bounds at char 2\n"
    );
  });
});
