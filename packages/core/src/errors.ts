/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** Vector lengths disagree: a construction or wiring bug, never valid input. */
export class DimensionError extends Data.TaggedError("DimensionError")<{
  readonly message: string;
  readonly expected: number;
  readonly actual: number;
}> {}

export class CodecError extends Data.TaggedError("CodecError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class BuildError extends Data.TaggedError("BuildError")<{
  readonly message: string;
}> {}

export class PersistError extends Data.TaggedError("PersistError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ImageError extends Data.TaggedError("ImageError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
