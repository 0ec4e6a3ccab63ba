/**
 * Structured guesses returned for one neighborhood's raw text.
 * Values are unnormalized; any of them may be missing.
 */
export interface LanguageModelFieldGuess {
  boxId: string | null;
  cfm: number | string | null;
  inletSize: string | null;
  /** Model's own certainty, 0-1 */
  certainty: number;
}

export interface LanguageModelPort {
  extractFields(
    neighborhoodText: string,
    options?: { signal?: AbortSignal },
  ): Promise<LanguageModelFieldGuess>;
}
