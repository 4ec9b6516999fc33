import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/types.js";
import type { Tokenizer } from "./types.js";

export const DEFAULT_ENCODING = "o200k_base" as const;

interface TiktokenEncoding {
  encode(text: string, allowedSpecial: "all"): Uint32Array;
  free(): void;
}

export async function loadTiktokenTokenizer(
  logger?: Logger,
): Promise<Tokenizer | null> {
  let encoding: TiktokenEncoding;
  try {
    const tiktoken = await import("tiktoken");
    encoding = tiktoken.get_encoding(DEFAULT_ENCODING);
  } catch (error) {
    logger?.warn(
      `Failed to initialize tokenizer '${DEFAULT_ENCODING}'. Token counts unavailable: ${errorMessage(error)}`,
    );
    return null;
  }
  return {
    name: DEFAULT_ENCODING,
    count: (text) => encoding.encode(text, "all").length,
    dispose: () => encoding.free(),
  };
}

export class TokenCounter {
  private warned = false;

  constructor(
    private readonly tokenizer: Tokenizer | null,
    private readonly logger?: Logger,
  ) {}

  count(text: string, displayPath: string): number {
    if (!this.tokenizer) {
      return 0;
    }
    try {
      return this.tokenizer.count(text);
    } catch (error) {
      if (!this.warned) {
        this.warned = true;
        this.logger?.warn(
          `Tokenizer failed on ${displayPath}; counting 0 tokens for it and any later failures: ${errorMessage(error)}`,
        );
      }
      return 0;
    }
  }
}
