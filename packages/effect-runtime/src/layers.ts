/**
 * Effect layers for dependency injection.
 *
 * Each service gets a Layer that constructs it from config.
 */
import { Layer, Effect } from "effect";
import {
  TokenizerService,
  type Tokenizer,
  type TokenizerOptions,
  type LoadError,
} from "@bytelevel/core";
import { HfTokenizer } from "@bytelevel/tokenizers";

// ── Tokenizer Layer ────────────────────────────────────────────────────────

export const TokenizerFrom = (tokenizer: Tokenizer) =>
  Layer.succeed(TokenizerService, tokenizer);

/** Load a tokenizer file or directory once and share it. */
export const TokenizerLive = (
  path: string,
  options: Partial<TokenizerOptions> = {},
): Layer.Layer<TokenizerService, LoadError> =>
  Layer.effect(
    TokenizerService,
    Effect.suspend(() => {
      const tokenizer = new HfTokenizer(options);
      return tokenizer.load(path).pipe(Effect.as<Tokenizer>(tokenizer));
    }),
  );
