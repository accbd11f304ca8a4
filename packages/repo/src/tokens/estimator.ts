import { DEFAULT_CHARS_PER_TOKEN, type TokenizerConfig } from '@repodump/shared';

/**
 * Approximates how many tokens a piece of text costs.
 *
 * Implementations must be pure and prefix-monotonic: a prefix of `text` never
 * estimates higher than `text` itself. Budget truncation relies on both.
 */
export interface TokenEstimator {
  readonly name: string;
  estimate(text: string): number;
}

/**
 * Fixed characters-per-token ratio; the default strategy.
 */
export class CharRatioEstimator implements TokenEstimator {
  readonly name = 'chars';

  constructor(private readonly charsPerToken: number = DEFAULT_CHARS_PER_TOKEN) {
    if (!(charsPerToken > 0)) {
      throw new RangeError(`charsPerToken must be positive, got ${charsPerToken}`);
    }
  }

  estimate(text: string): number {
    return Math.ceil(text.length / this.charsPerToken);
  }
}

// A run of letters/digits/underscore, or any single non-space character.
const WORD_PIECE = /[\p{L}\p{N}_]+|[^\s\p{L}\p{N}_]/gu;

/**
 * Counts words and individual punctuation marks, closer to how BPE
 * vocabularies split source code than a flat ratio.
 */
export class WordPieceEstimator implements TokenEstimator {
  readonly name = 'words';

  estimate(text: string): number {
    return text.match(WORD_PIECE)?.length ?? 0;
  }
}

export function createEstimator(config?: Partial<TokenizerConfig>): TokenEstimator {
  if (config?.strategy === 'words') {
    return new WordPieceEstimator();
  }
  return new CharRatioEstimator(config?.charsPerToken);
}
