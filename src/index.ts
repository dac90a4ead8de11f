export { interpret, run } from "./interpret";
export type { RunOutcome } from "./interpret";
export { FaultKind, describeFault, faultLine } from "./faults";
export type { Direction, Fault } from "./faults";
export {
  ConfigError,
  ConfigErrorCode,
  DEFAULT_OPTIONS,
  DEFAULT_TAPE_LENGTH,
  resolveOptions,
} from "./config";
export type { InterpreterOptions } from "./config";
export { Tape, CELL_WIDTHS } from "./tape";
export type { CellWidth } from "./tape";
export {
  buildJumpTable,
  scanBackward,
  scanForward,
  toProgramBytes,
} from "./program";
export type { BracketStrategy, ProgramInput } from "./program";
export {
  BufferSink,
  BufferSource,
  FdSink,
  FdSource,
  NullSink,
} from "./streams";
export type { ByteSink, ByteSource } from "./streams";
export {
  loadProgram,
  MAX_PROGRAM_BYTES,
  SourceError,
  SourceErrorCode,
} from "./source";
export type { LoadedProgram, ProgramSpec } from "./source";
export { formatCodeFrame, locate } from "./diagnostics";
export { isOk, isErr } from "./result";
export type { Result } from "./result";
