import { resolveOptions, type InterpreterOptions } from "./config";
import {
  faultLine,
  missingClosing,
  missingOpening,
  outOfBounds,
  type Fault,
} from "./faults";
import {
  createResolver,
  Op,
  toProgramBytes,
  type ProgramInput,
} from "./program";
import { done, err, type Result } from "./result";
import {
  BufferSink,
  BufferSource,
  NullSink,
  textBytes,
  type ByteSink,
  type ByteSource,
} from "./streams";
import { Tape } from "./tape";

/**
 * Runs one program to completion or to its first fault.
 *
 * Bytes other than the eight instructions are skipped. On a fault a single
 * diagnostic line goes to `errorLog` and the fault is returned; nothing is
 * thrown for program errors. Invalid `options` throw a ConfigError before
 * execution starts.
 */
export function interpret(
  program: ProgramInput,
  input: ByteSource,
  output: ByteSink,
  errorLog: ByteSink = new NullSink(),
  options: Partial<InterpreterOptions> = {}
): Result<void, Fault> {
  const opts = resolveOptions(options);
  const code = toProgramBytes(program);
  const tape = new Tape(opts.tapeLength, opts.cellWidth);
  const brackets = createResolver(code, opts.brackets);
  const outByte = new Uint8Array(1);

  const fail = (fault: Fault): Result<void, Fault> => {
    // Output printed before the fault must land ahead of the diagnostic.
    output.flush?.();
    errorLog.write(textBytes(faultLine(fault)));
    errorLog.flush?.();
    return err(fault);
  };

  try {
    for (let pc = 0; pc < code.length; pc++) {
      switch (code[pc]) {
        case Op.RIGHT:
          if (!tape.moveRight()) return fail(outOfBounds(pc, "right"));
          break;
        case Op.LEFT:
          if (!tape.moveLeft()) return fail(outOfBounds(pc, "left"));
          break;
        case Op.INC:
          tape.increment();
          break;
        case Op.DEC:
          tape.decrement();
          break;
        case Op.OUT:
          outByte[0] = tape.outputByte();
          output.write(outByte);
          break;
        case Op.IN:
          // Let a prompt reach the user before blocking on input.
          output.flush?.();
          tape.store(input.read() ?? 0);
          break;
        case Op.OPEN:
          if (tape.current === 0) {
            const match = brackets.closing(pc);
            if (match === undefined) return fail(missingClosing(pc));
            pc = match;
          }
          break;
        case Op.CLOSE:
          if (tape.current !== 0) {
            const match = brackets.opening(pc);
            if (match === undefined) return fail(missingOpening(pc));
            pc = match;
          }
          break;
      }
    }
    return done;
  } finally {
    output.flush?.();
  }
}

export type RunOutcome = {
  result: Result<void, Fault>;
  output: Uint8Array;
  errors: string;
};

/** In-memory convenience wrapper: string or byte stdin in, captured bytes out. */
export function run(
  program: ProgramInput,
  stdin: string | Uint8Array = "",
  options: Partial<InterpreterOptions> = {}
): RunOutcome {
  const output = new BufferSink();
  const errorLog = new BufferSink();
  const result = interpret(
    program,
    new BufferSource(stdin),
    output,
    errorLog,
    options
  );
  return { result, output: output.bytes(), errors: errorLog.text() };
}
