/**
 * Error handling for read quality-control processing
 *
 * Per-record problems (bad headers, bad bases, undecodable quality) are
 * counted by the chunk processor and never escape it. The classes below
 * cover the failures that do propagate: chunk I/O, cancellation, empty
 * reductions, invalid configuration and platform I/O.
 */

/**
 * Base error class for all readqc errors
 */
export class ReadQcError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "ReadQcError";
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
 * Validation errors for invalid options or malformed serialized results
 */
export class ValidationError extends ReadQcError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Quality string contains a character outside the Phred+33 range
 */
export class DecodeError extends ReadQcError {
  constructor(
    message: string,
    public readonly position: number,
    public readonly charCode: number
  ) {
    super(message, "DECODE_ERROR");
    this.name = "DecodeError";
  }
}

/**
 * The line source of a chunk failed mid-stream.
 *
 * The partial statistics of the chunk are discarded; retrying is left to
 * whoever scheduled the chunk.
 */
export class ChunkIOError extends ReadQcError {
  constructor(
    message: string,
    public readonly sourceIdentifier: string,
    public readonly recordsRead: number,
    public readonly systemError?: unknown
  ) {
    super(message, "CHUNK_IO_ERROR", undefined, `Source: ${sourceIdentifier}`);
    this.name = "ChunkIOError";
  }

  static fromSystemError(
    sourceIdentifier: string,
    recordsRead: number,
    systemError: unknown
  ): ChunkIOError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    return new ChunkIOError(
      `Reading chunk '${sourceIdentifier}' failed after ${recordsRead} records: ${errorMessage}`,
      sourceIdentifier,
      recordsRead,
      systemError
    );
  }

  override toString(): string {
    return `${super.toString()}\nRecords read before failure: ${this.recordsRead}`;
  }
}

/**
 * A chunk was abandoned before completion (supervisor cancellation)
 */
export class ChunkCancelledError extends ReadQcError {
  constructor(public readonly sourceIdentifier: string) {
    super(`Chunk '${sourceIdentifier}' was cancelled`, "CHUNK_CANCELLED");
    this.name = "ChunkCancelledError";
  }
}

/**
 * Reduction requested over zero results
 */
export class EmptyInputError extends ReadQcError {
  constructor(message = "Cannot merge an empty set of results", context?: string) {
    super(message, "EMPTY_INPUT", undefined, context);
    this.name = "EmptyInputError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends ReadQcError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
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

    if (msg.includes("enoent") || msg.includes("not found")) {
      return "Check that the file path is correct";
    }
    if (msg.includes("eacces") || msg.includes("permission")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir")) {
      return "Path points to a directory, not a file";
    }
    return undefined;
  }

  override toString(): string {
    return `${super.toString()}\nFile: ${this.filePath}\nOperation: ${this.operation}`;
  }
}

/**
 * Stream processing errors
 */
export class StreamError extends ReadQcError {
  constructor(
    message: string,
    public readonly streamType: "read",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Line buffer errors (a single line longer than the allowed maximum)
 */
export class BufferError extends ReadQcError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}
