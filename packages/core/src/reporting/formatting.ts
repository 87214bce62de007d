/**
 * Minimal interface describing a writable target suitable for reporter output streams.
 */
export interface WritableTarget {
  write(line: string): void;
}

export interface WriteJsonOptions {
  /** Indent nested values by two spaces. */
  readonly pretty?: boolean;
}

const LINE_TERMINATOR = '\n';

/**
 * JSON replacer that renders regular expressions as their literal source (`/\.css$/i`).
 *
 * @param _key - Property name currently being serialised.
 * @param value - Property value currently being serialised.
 * @returns The value to serialise in place of `value`.
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  return value instanceof RegExp ? value.toString() : value;
}

/**
 * Serialises an unknown error into a structured payload for logging.
 *
 * @param error - Error-like value to serialise.
 * @returns Structured error payload describing the value.
 */
export function serialiseError(error: unknown): {
  readonly name: string;
  readonly message: string;
  readonly stack?: string;
} {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack ? { stack: error.stack } : {}),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

/**
 * Writes a JSON payload to the provided target followed by a newline terminator.
 *
 * @param target - Writable destination for the encoded payload.
 * @param payload - Arbitrary value to serialise as JSON.
 * @param options - Layout of the encoded payload.
 */
export function writeJson(
  target: WritableTarget,
  payload: unknown,
  options: WriteJsonOptions = {},
): void {
  const encoded = JSON.stringify(payload, jsonReplacer, options.pretty ? 2 : undefined);
  target.write(`${encoded}${LINE_TERMINATOR}`);
}

/**
 * Writes a plain-text line to the provided target followed by a newline terminator.
 *
 * @param target - Writable destination for the text content.
 * @param line - Text content to emit.
 */
export function writeLine(target: WritableTarget, line: string): void {
  target.write(`${line}${LINE_TERMINATOR}`);
}
