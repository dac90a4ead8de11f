import { isBracketStrategy, type BracketStrategy } from "./program";
import { isCellWidth, type CellWidth } from "./tape";

export interface InterpreterOptions {
  tapeLength: number;
  cellWidth: CellWidth;
  brackets: BracketStrategy;
}

export const DEFAULT_TAPE_LENGTH = 30_000;

export const DEFAULT_OPTIONS: Readonly<InterpreterOptions> = Object.freeze({
  tapeLength: DEFAULT_TAPE_LENGTH,
  cellWidth: 32,
  brackets: "scan",
});

export enum ConfigErrorCode {
  INVALID_TAPE_LENGTH = "INVALID_TAPE_LENGTH",
  INVALID_CELL_WIDTH = "INVALID_CELL_WIDTH",
  INVALID_BRACKETS = "INVALID_BRACKETS",
}

const CONFIG_MESSAGES: Record<ConfigErrorCode, (value: string) => string> = {
  [ConfigErrorCode.INVALID_TAPE_LENGTH]: (v) =>
    `invalid tape length: ${v} (expected a positive integer)`,
  [ConfigErrorCode.INVALID_CELL_WIDTH]: (v) =>
    `invalid cell width: ${v} (expected 8, 16 or 32)`,
  [ConfigErrorCode.INVALID_BRACKETS]: (v) =>
    `invalid bracket strategy: ${v} (expected scan or table)`,
};

export class ConfigError extends Error {
  constructor(readonly code: ConfigErrorCode, readonly value: string) {
    super(CONFIG_MESSAGES[code](value));
    this.name = "ConfigError";
  }
}

export function parseTapeLength(raw: string): number {
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new ConfigError(ConfigErrorCode.INVALID_TAPE_LENGTH, raw);
  }
  return n;
}

export function parseCellWidth(raw: string): CellWidth {
  const n = Number(raw);
  if (!isCellWidth(n)) {
    throw new ConfigError(ConfigErrorCode.INVALID_CELL_WIDTH, raw);
  }
  return n;
}

export function parseBrackets(raw: string): BracketStrategy {
  if (!isBracketStrategy(raw)) {
    throw new ConfigError(ConfigErrorCode.INVALID_BRACKETS, raw);
  }
  return raw;
}

/** Fills in defaults and rejects values the interpreter cannot run with. */
export function resolveOptions(
  partial: Partial<InterpreterOptions> = {}
): InterpreterOptions {
  const opts = {
    tapeLength: partial.tapeLength ?? DEFAULT_OPTIONS.tapeLength,
    cellWidth: partial.cellWidth ?? DEFAULT_OPTIONS.cellWidth,
    brackets: partial.brackets ?? DEFAULT_OPTIONS.brackets,
  };
  if (!Number.isSafeInteger(opts.tapeLength) || opts.tapeLength <= 0) {
    throw new ConfigError(
      ConfigErrorCode.INVALID_TAPE_LENGTH,
      String(opts.tapeLength)
    );
  }
  if (!isCellWidth(opts.cellWidth)) {
    throw new ConfigError(
      ConfigErrorCode.INVALID_CELL_WIDTH,
      String(opts.cellWidth)
    );
  }
  if (!isBracketStrategy(opts.brackets)) {
    throw new ConfigError(ConfigErrorCode.INVALID_BRACKETS, opts.brackets);
  }
  return opts;
}

export type Env = Record<string, string | undefined>;

function fromEnv<T>(raw: string | undefined, parse: (s: string) => T) {
  if (raw === undefined) return undefined;
  try {
    return parse(raw);
  } catch (e) {
    // Bad environment values fall back to the defaults.
    if (e instanceof ConfigError) return undefined;
    throw e;
  }
}

/**
 * Options taken from BF_TAPE_LENGTH, BF_CELL_WIDTH and BF_BRACKETS.
 * Unset or invalid variables are left out.
 */
export function optionsFromEnv(env: Env): Partial<InterpreterOptions> {
  const out: Partial<InterpreterOptions> = {};
  const tapeLength = fromEnv(env.BF_TAPE_LENGTH, parseTapeLength);
  const cellWidth = fromEnv(env.BF_CELL_WIDTH, parseCellWidth);
  const brackets = fromEnv(env.BF_BRACKETS, parseBrackets);
  if (tapeLength !== undefined) out.tapeLength = tapeLength;
  if (cellWidth !== undefined) out.cellWidth = cellWidth;
  if (brackets !== undefined) out.brackets = brackets;
  return out;
}
