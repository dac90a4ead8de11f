/**
 * Catalog of the faults that stop a running program.
 * Each fault maps to exactly one diagnostic line.
 */

export enum FaultKind {
  POINTER_OUT_OF_BOUNDS = "POINTER_OUT_OF_BOUNDS",
  MISSING_CLOSING_BRACKET = "MISSING_CLOSING_BRACKET",
  MISSING_OPENING_BRACKET = "MISSING_OPENING_BRACKET",
}

export type Direction = "left" | "right";

export type Fault =
  | {
      kind: FaultKind.POINTER_OUT_OF_BOUNDS;
      /** Program counter of the offending `<` or `>`. */
      position: number;
      direction: Direction;
    }
  | {
      kind: FaultKind.MISSING_CLOSING_BRACKET;
      /** Position of the unmatched `[`. */
      position: number;
    }
  | {
      kind: FaultKind.MISSING_OPENING_BRACKET;
      /** Position of the unmatched `]`. */
      position: number;
    };

export interface FaultDefinition {
  kind: FaultKind;
  format: (params: Record<string, string | number>) => string;
}

function makeFaultDef(
  kind: FaultKind,
  format: (params: Record<string, string | number>) => string
): FaultDefinition {
  return { kind, format };
}

export const FAULT_CATALOG: Record<FaultKind, FaultDefinition> = {
  [FaultKind.POINTER_OUT_OF_BOUNDS]: makeFaultDef(
    FaultKind.POINTER_OUT_OF_BOUNDS,
    ({ direction, position }) =>
      `data pointer moved ${direction} out of bounds at char ${position}`
  ),
  [FaultKind.MISSING_CLOSING_BRACKET]: makeFaultDef(
    FaultKind.MISSING_CLOSING_BRACKET,
    ({ position }) =>
      `missing closing bracket for opening bracket at char ${position}`
  ),
  [FaultKind.MISSING_OPENING_BRACKET]: makeFaultDef(
    FaultKind.MISSING_OPENING_BRACKET,
    ({ position }) =>
      `missing opening bracket for closing bracket at char ${position}`
  ),
};

export const outOfBounds = (position: number, direction: Direction): Fault => ({
  kind: FaultKind.POINTER_OUT_OF_BOUNDS,
  position,
  direction,
});

export const missingClosing = (position: number): Fault => ({
  kind: FaultKind.MISSING_CLOSING_BRACKET,
  position,
});

export const missingOpening = (position: number): Fault => ({
  kind: FaultKind.MISSING_OPENING_BRACKET,
  position,
});

export function describeFault(fault: Fault): string {
  return FAULT_CATALOG[fault.kind].format(fault);
}

/** The exact line written to the error log, newline included. */
export function faultLine(fault: Fault): string {
  return `error: ${describeFault(fault)}\n`;
}
