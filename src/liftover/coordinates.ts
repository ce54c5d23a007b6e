/**
 * Coordinate arithmetic for scaffold-to-chromosome projection
 *
 * All coordinates are 1-based inclusive integers held in JavaScript numbers
 * and restricted to the safe-integer range.
 *
 * @module liftover/coordinates
 */

/**
 * How a scaffold sits on its chromosome
 */
export type Orientation = "forward" | "reverse";

/**
 * A closed interval in 1-based inclusive coordinates
 */
export interface Interval {
  readonly start: number;
  readonly end: number;
}

const INTEGER_TEXT = /^-?[0-9]+$/;

/**
 * Map an AGP orientation symbol to an Orientation
 *
 * Only "-" means reverse. "+", "?", "0", "na" and anything else is forward.
 */
export function orientationFromSymbol(symbol: string): Orientation {
  return symbol === "-" ? "reverse" : "forward";
}

/**
 * Chromosome-space anchor for a placement
 *
 * The start of the placed region for forward placements, the end for reverse.
 */
export function placementOffset(start: number, end: number, orientation: Orientation): number {
  return orientation === "reverse" ? end : start;
}

/**
 * Parse a coordinate column
 *
 * @returns The integer value, or undefined when the text is not a safe integer
 */
export function parseCoordinate(text: string): number | undefined {
  if (!INTEGER_TEXT.test(text)) {
    return undefined;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Swap "+" and "-"; every other strand symbol is returned unchanged
 *
 * @example
 * ```typescript
 * flipStrand("+"); // "-"
 * flipStrand("."); // "."
 * ```
 */
export function flipStrand(strand: string): string {
  if (strand === "+") return "-";
  if (strand === "-") return "+";
  return strand;
}

/**
 * Project a scaffold-local interval into chromosome space
 *
 * Forward: `[offset + start - 1, offset + end - 1]`.
 * Reverse: `[offset - end - 1, offset - start - 1]`.
 */
export function projectInterval(
  interval: Interval,
  offset: number,
  orientation: Orientation
): Interval {
  if (orientation === "reverse") {
    return { start: offset - interval.end - 1, end: offset - interval.start - 1 };
  }
  return { start: offset + interval.start - 1, end: offset + interval.end - 1 };
}

/**
 * Strand of a feature after projection
 */
export function projectStrand(strand: string, orientation: Orientation): string {
  return orientation === "reverse" ? flipStrand(strand) : strand;
}
