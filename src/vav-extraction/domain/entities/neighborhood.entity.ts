import { NeighborhoodKind } from '../enums/neighborhood-kind.enum';
import { BoundingBox, Token } from './token.entity';

export interface Neighborhood {
  readonly kind: NeighborhoodKind;
  readonly page: number;
  /** Position in the page's neighborhood list, stable for identical input */
  readonly index: number;
  /** Tokens in reading order */
  readonly tokens: readonly Token[];
  readonly anchorBbox: BoundingBox;
  /** The box-id token the cluster grew from; absent for UNASSIGNED */
  readonly seed?: Token;
  /** Schedule header tokens, SCHEDULE_ROW only */
  readonly columnLabels?: readonly Token[];
}

export function neighborhoodText(neighborhood: Neighborhood): string {
  return neighborhood.tokens.map((token) => token.text).join(' ');
}
