/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Gives every line-oriented format parser (AGP, GFF3) the same defaults,
 * warning channel and AbortSignal support without imposing how each one
 * tokenises its lines.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * Parser options after defaults have been applied
 */
export interface ResolvedParserOptions {
  maxLineLength: number;
  onWarning: (warning: string, lineNumber?: number) => void;
}

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & ResolvedParserOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    // Merge in order: base -> format-specific -> user options
    const baseDefaults: ResolvedParserOptions = {
      maxLineLength: 1_000_000,
      onWarning: (warning: string, lineNumber?: number): void => {
        const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
        console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
      },
    };

    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check if parsing operation should be aborted
   * Call this in parsing loops to allow cancellation between lines
   */
  protected checkAborted(): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} parsing`);
  }

  /**
   * Reject a line longer than the configured maximum
   */
  protected checkLineLength(line: string, lineNumber: number): void {
    if (line.length > this.options.maxLineLength) {
      throw new ParseError(
        `Line too long (${line.length} > ${this.options.maxLineLength})`,
        this.getFormatName(),
        lineNumber,
        `Line starts with: ${line.slice(0, 100)}`
      );
    }
  }

  /**
   * Parse records from string data
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file, decompressing by extension
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Parse records from a binary stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Parse records from already-split lines
   */
  abstract parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<T>;

  /**
   * Format identifier for error messages and warnings (e.g., "AGP", "GFF3")
   */
  protected abstract getFormatName(): string;
}

/**
 * Interrupt handler utility for AbortSignal integration
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * Throw with context if aborted
   * @throws {ParseError} If operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
