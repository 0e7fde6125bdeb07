export type SpellErrorCode =
  | "IO"
  | "DICTIONARY_NOT_FOUND"
  | "EMPTY_DICTIONARY"
  | "INVALID_ENCODING"
  | "UNSUPPORTED_FORMAT"
  | "INVALID_WORD"
  | "UNRESOLVED_LANGUAGE";

export interface SpellErrorOptions {
  code: SpellErrorCode;
  message: string;
  path?: string;
  language?: string;
  cause?: unknown;
}

export class SpellError extends Error {
  public readonly code: SpellErrorCode;
  public readonly path?: string;
  public readonly language?: string;

  constructor(options: SpellErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SpellError";
    this.code = options.code;
    this.path = options.path;
    this.language = options.language;
  }
}

export function isSpellError(value: unknown): value is SpellError {
  return value instanceof SpellError;
}

export function isSpellErrorCode(value: unknown, code: SpellErrorCode): value is SpellError {
  return value instanceof SpellError && value.code === code;
}

/**
 * Wrap an unknown failure. A `message` in the fallback becomes a prefix to the
 * underlying error's own message. SpellErrors pass through unchanged.
 */
export function asSpellError(
  value: unknown,
  fallback: Omit<SpellErrorOptions, "message"> & { message?: string } = { code: "IO" },
): SpellError {
  if (value instanceof SpellError) return value;
  const detail = value instanceof Error ? value.message : String(value ?? "Unknown spell-check error");
  return new SpellError({
    code: fallback.code,
    message: fallback.message ? `${fallback.message}: ${detail}` : detail,
    path: fallback.path,
    language: fallback.language,
    cause: value,
  });
}
