/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class UninitializedError extends Data.TaggedError("Uninitialized")<{
  readonly message: string;
}> {}

export type LoadFailureReason =
  | "Unreadable"
  | "Malformed"
  | "UnsupportedModel"
  | "UnsupportedPreTokenizer"
  | "UnsupportedNormalizer"
  | "DuplicateToken"
  | "DuplicateId";

export class LoadError extends Data.TaggedError("LoadFailure")<{
  readonly reason: LoadFailureReason;
  readonly message: string;
  readonly cause?: unknown;
}> {}

export type EncodeFailureReason = "UnknownSymbol" | "UnresolvedSpecialToken";

export class EncodeError extends Data.TaggedError("EncodeFailure")<{
  readonly reason: EncodeFailureReason;
  readonly message: string;
}> {}

export type DecodeFailureReason = "InvalidId";

export class DecodeError extends Data.TaggedError("DecodeFailure")<{
  readonly reason: DecodeFailureReason;
  readonly message: string;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Every failure a tokenizer operation can return. */
export type TokenizerError = UninitializedError | LoadError | EncodeError | DecodeError;
