import {
  ConfigError,
  optionsFromEnv,
  parseBrackets,
  parseCellWidth,
  parseTapeLength,
  type Env,
  type InterpreterOptions,
} from "./config";
import { formatCodeFrame } from "./diagnostics";
import { interpret } from "./interpret";
import { err, ok, type Result } from "./result";
import { loadProgram, type ProgramSpec } from "./source";
import {
  NullSink,
  textBytes,
  type ByteSink,
  type ByteSource,
} from "./streams";

export const USAGE = `Usage: bf [options] <file>
       bf [options] -e <program>

Options:
  -e, --eval <program>      run <program> instead of reading a file
  --cell-width <8|16|32>    cell size in bits (env BF_CELL_WIDTH, default 32)
  --tape-length <n>         number of cells (env BF_TAPE_LENGTH, default 30000)
  --brackets <scan|table>   bracket matching strategy (env BF_BRACKETS, default scan)
  -q, --quiet               do not print fault diagnostics
  --frame                   print the faulting source line after a fault
  -h, --help                show this help`;

export type RunCommand = {
  kind: "run";
  program: ProgramSpec;
  options: Partial<InterpreterOptions>;
  quiet: boolean;
  frame: boolean;
};

export type CliCommand = { kind: "help" } | RunCommand;

export type CliIO = {
  stdin: ByteSource;
  stdout: ByteSink;
  stderr: ByteSink;
  env: Env;
};

type OptionParser = (raw: string) => Partial<InterpreterOptions>;

const VALUE_FLAGS = new Map<string, OptionParser>([
  ["--cell-width", (raw) => ({ cellWidth: parseCellWidth(raw) })],
  ["--tape-length", (raw) => ({ tapeLength: parseTapeLength(raw) })],
  ["--brackets", (raw) => ({ brackets: parseBrackets(raw) })],
]);

function splitFlag(arg: string): [string, string | undefined] {
  const eq = arg.indexOf("=");
  if (!arg.startsWith("--") || eq < 0) return [arg, undefined];
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}

/**
 * Parses command-line arguments. Flags win over BF_* environment variables,
 * which win over the defaults.
 */
export function parseArgs(
  argv: string[],
  env: Env
): Result<CliCommand, string> {
  let options: Partial<InterpreterOptions> = {};
  let literal: string | undefined;
  let file: string | undefined;
  let quiet = false;
  let frame = false;

  for (let i = 0; i < argv.length; i++) {
    const [flag, inline] = splitFlag(argv[i]);

    if (flag === "-h" || flag === "--help") {
      return ok<CliCommand>({ kind: "help" });
    }
    if (flag === "-q" || flag === "--quiet") {
      quiet = true;
      continue;
    }
    if (flag === "--frame") {
      frame = true;
      continue;
    }

    const isEval = flag === "-e" || flag === "--eval";
    const setOption = VALUE_FLAGS.get(flag);
    if (isEval || setOption) {
      const value = inline ?? argv[++i];
      if (value === undefined) return err(`missing value for ${flag}`);
      if (!setOption) {
        if (literal !== undefined) return err(`${flag} given more than once`);
        literal = value;
        continue;
      }
      try {
        options = { ...options, ...setOption(value) };
      } catch (e) {
        if (e instanceof ConfigError) return err(e.message);
        throw e;
      }
      continue;
    }

    if (flag.startsWith("-") && flag !== "-") {
      return err(`unknown option: ${flag}`);
    }
    if (file !== undefined) return err(`unexpected argument: ${argv[i]}`);
    file = argv[i];
  }

  if (literal !== undefined && file !== undefined) {
    return err("give either a file or -e <program>, not both");
  }

  let program: ProgramSpec;
  if (literal !== undefined) program = { kind: "literal", text: literal };
  else if (file !== undefined) program = { kind: "file", path: file };
  else return err("no program given");

  return ok<CliCommand>({
    kind: "run",
    program,
    options: { ...optionsFromEnv(env), ...options },
    quiet,
    frame,
  });
}

/** Runs the command line and returns the process exit code. */
function println(sink: ByteSink, text: string): void {
  sink.write(textBytes(`${text}\n`));
  sink.flush?.();
}

export async function main(argv: string[], io: CliIO): Promise<number> {
  const parsed = parseArgs(argv, io.env);
  if (!parsed.ok) {
    println(io.stderr, `error: ${parsed.error}`);
    println(io.stderr, USAGE);
    return 1;
  }

  const cmd = parsed.value;
  if (cmd.kind === "help") {
    println(io.stdout, USAGE);
    return 0;
  }

  const loaded = await loadProgram(cmd.program);
  if (!loaded.ok) {
    println(io.stderr, `error: ${loaded.error.message}`);
    return 1;
  }

  const { name, bytes } = loaded.value;
  const errorLog = cmd.quiet ? new NullSink() : io.stderr;
  const result = interpret(bytes, io.stdin, io.stdout, errorLog, cmd.options);
  if (result.ok) return 0;

  if (cmd.frame) {
    println(io.stderr, formatCodeFrame(bytes, result.error, name));
  }
  return 1;
}
