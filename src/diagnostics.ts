import { describeFault, type Fault } from "./faults";

export type SourceLocation = {
  /** 1-based */
  line: number;
  /** 1-based, counted in bytes */
  col: number;
};

const NEWLINE = 10;

function computeLineStarts(program: Uint8Array): number[] {
  const starts = [0];
  for (let i = 0; i < program.length; i++) {
    if (program[i] === NEWLINE) starts.push(i + 1);
  }
  return starts;
}

function lineIndexOf(lineStarts: number[], position: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= position) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

export function locate(program: Uint8Array, position: number): SourceLocation {
  const starts = computeLineStarts(program);
  const idx = lineIndexOf(starts, position);
  return { line: idx + 1, col: position - starts[idx] + 1 };
}

function lineText(program: Uint8Array, starts: number[], idx: number): string {
  const start = starts[idx];
  let end = starts[idx + 1] ?? program.length;
  if (end > start && program[end - 1] === NEWLINE) end--;
  if (end > start && program[end - 1] === 13 /* \r */) end--;
  return Buffer.from(program.subarray(start, end)).toString("utf8");
}

/**
 * Renders the program line holding `position` with a caret under it:
 *
 *     prog.bf:2:4 error: missing opening bracket for closing bracket at char 9
 *     2 | ++-]
 *       |    ^
 */
export function formatCodeFrame(
  program: Uint8Array,
  fault: Fault,
  name: string
): string {
  const starts = computeLineStarts(program);
  const idx = lineIndexOf(starts, fault.position);
  const col = fault.position - starts[idx] + 1;
  const lineNo = String(idx + 1);
  return [
    `${name}:${lineNo}:${col} error: ${describeFault(fault)}`,
    `${lineNo} | ${lineText(program, starts, idx)}`,
    `${" ".repeat(lineNo.length)} | ${" ".repeat(col - 1)}^`,
  ].join("\n");
}
