/**
 * Error handling for assembly-map and annotation processing
 *
 * Every failure raised by the library is a LiftoverError subclass carrying a
 * stable code, the offending line number where one exists, and the raw
 * content that triggered it.
 */

/**
 * Base error class for all chromolift errors
 */
export class LiftoverError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "LiftoverError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options or arguments
 */
export class ValidationError extends LiftoverError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends LiftoverError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * An assembly-map (AGP) row that cannot yield a placement
 *
 * Raised for rows with too few columns and for rows whose chromosome
 * coordinates or part number are not positive integers.
 */
export class MalformedAssemblyRecordError extends ParseError {
  constructor(
    message: string,
    public readonly line: string,
    lineNumber: number,
    public readonly expectedFields?: number,
    public readonly actualFields?: number
  ) {
    super(message, "AGP", lineNumber, `Row content: ${line}`);
    this.name = "MalformedAssemblyRecordError";
  }

  /**
   * Create error for a row with fewer columns than required
   */
  static forFieldCount(
    line: string,
    lineNumber: number,
    expected: number,
    actual: number
  ): MalformedAssemblyRecordError {
    return new MalformedAssemblyRecordError(
      `AGP row ${lineNumber} has ${actual} tab-separated fields, expected at least ${expected}`,
      line,
      lineNumber,
      expected,
      actual
    );
  }
}

/**
 * An annotation (GFF3) record that cannot be re-projected
 */
export class MalformedAnnotationRecordError extends ParseError {
  constructor(
    message: string,
    public readonly line: string,
    lineNumber: number,
    public readonly expectedFields?: number,
    public readonly actualFields?: number
  ) {
    super(message, "GFF3", lineNumber, `Record content: ${line}`);
    this.name = "MalformedAnnotationRecordError";
  }

  /**
   * Create error for a record with fewer columns than required
   */
  static forFieldCount(
    line: string,
    lineNumber: number,
    expected: number,
    actual: number
  ): MalformedAnnotationRecordError {
    return new MalformedAnnotationRecordError(
      `GFF3 record on line ${lineNumber} has ${actual} tab-separated fields, expected at least ${expected}`,
      line,
      lineNumber,
      expected,
      actual
    );
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends LiftoverError {
  constructor(
    message: string,
    public readonly format: "gzip" | "zstd" | "none",
    public readonly operation: "detect" | "decompress" | "stream" | "validate",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("truncated") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }
    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends LiftoverError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "rename" | "delete",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends LiftoverError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors for streaming operations
 */
export class BufferError extends LiftoverError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "allocate" | "overflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}
