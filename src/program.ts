/** Byte values of the eight instructions. Every other byte is inert. */
export enum Op {
  RIGHT = 0x3e, // >
  LEFT = 0x3c, // <
  INC = 0x2b, // +
  DEC = 0x2d, // -
  OUT = 0x2e, // .
  IN = 0x2c, // ,
  OPEN = 0x5b, // [
  CLOSE = 0x5d, // ]
}

export type ProgramInput = string | Uint8Array;

export type BracketStrategy = "scan" | "table";

export const isBracketStrategy = (s: string): s is BracketStrategy =>
  s === "scan" || s === "table";

/** Strings are executed as their UTF-8 bytes; positions are byte offsets. */
export function toProgramBytes(program: ProgramInput): Uint8Array {
  return typeof program === "string" ? Buffer.from(program, "utf8") : program;
}

/**
 * Depth-counted search for the `]` matching the `[` at `origin`.
 * Returns undefined when the program ends first.
 */
export function scanForward(
  program: Uint8Array,
  origin: number
): number | undefined {
  let depth = 1;
  for (let pc = origin + 1; pc < program.length; pc++) {
    const c = program[pc];
    if (c === Op.OPEN) depth++;
    else if (c === Op.CLOSE && --depth === 0) return pc;
  }
  return undefined;
}

/** Mirror of scanForward: finds the `[` matching the `]` at `origin`. */
export function scanBackward(
  program: Uint8Array,
  origin: number
): number | undefined {
  let depth = 1;
  for (let pc = origin - 1; pc >= 0; pc--) {
    const c = program[pc];
    if (c === Op.CLOSE) depth++;
    else if (c === Op.OPEN && --depth === 0) return pc;
  }
  return undefined;
}

const UNMATCHED = -1;

/**
 * One pass over the program pairing brackets with a stack.
 * Entry i holds the partner of the bracket at i, or -1.
 */
export function buildJumpTable(program: Uint8Array): Int32Array {
  const table = new Int32Array(program.length).fill(UNMATCHED);
  const open: number[] = [];
  for (let pc = 0; pc < program.length; pc++) {
    const c = program[pc];
    if (c === Op.OPEN) {
      open.push(pc);
    } else if (c === Op.CLOSE) {
      const start = open.pop();
      if (start === undefined) continue;
      table[start] = pc;
      table[pc] = start;
    }
  }
  return table;
}

export interface BracketResolver {
  /** Matching `]` for the `[` at `origin`. */
  closing(origin: number): number | undefined;
  /** Matching `[` for the `]` at `origin`. */
  opening(origin: number): number | undefined;
}

class ScanResolver implements BracketResolver {
  constructor(private readonly program: Uint8Array) {}

  closing(origin: number): number | undefined {
    return scanForward(this.program, origin);
  }

  opening(origin: number): number | undefined {
    return scanBackward(this.program, origin);
  }
}

class TableResolver implements BracketResolver {
  private readonly table: Int32Array;

  constructor(program: Uint8Array) {
    this.table = buildJumpTable(program);
  }

  closing(origin: number): number | undefined {
    return this.lookup(origin);
  }

  opening(origin: number): number | undefined {
    return this.lookup(origin);
  }

  private lookup(origin: number): number | undefined {
    const target = this.table[origin];
    return target === UNMATCHED ? undefined : target;
  }
}

export function createResolver(
  program: Uint8Array,
  strategy: BracketStrategy
): BracketResolver {
  return strategy === "table"
    ? new TableResolver(program)
    : new ScanResolver(program);
}
