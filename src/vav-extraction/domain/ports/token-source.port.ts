import { Token } from '../entities/token.entity';

/**
 * Read-only handle on a parsed document, safe to share across page tasks.
 */
export interface TokenDocument {
  readonly pageCount: number;

  /**
   * Tokens of one page in reading order. Each call returns a fresh iterable.
   * @throws EmptyPageError when the page has no embedded text
   * @throws DocumentReadError when the page index is outside the document
   */
  tokens(pageIndex: number): Iterable<Token>;
}

export interface TokenSourcePort {
  /**
   * @throws DocumentReadError when the bytes are not a readable PDF
   */
  open(pdf: Buffer): Promise<TokenDocument>;
}
