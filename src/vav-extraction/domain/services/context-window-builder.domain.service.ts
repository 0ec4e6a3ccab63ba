import { Injectable, Logger } from '@nestjs/common';
import { Neighborhood } from '../entities/neighborhood.entity';
import { Token, createToken } from '../entities/token.entity';
import { NeighborhoodKind } from '../enums/neighborhood-kind.enum';
import {
  ExtractionSettings,
  containsBoxId,
} from '../utils/extraction-settings.util';
import {
  BOX_ID_COLUMN,
  CFM_COLUMN,
  INLET_COLUMN,
} from '../utils/field-patterns.util';
import {
  bboxOfTokens,
  groupIntoLines,
  readingOrder,
  rectDistance,
  sortByPosition,
} from '../utils/geometry.util';

interface SeedGroup {
  kind: NeighborhoodKind.CALLOUT | NeighborhoodKind.SCHEDULE_ROW;
  seed: Token;
  tokens: Token[];
  columnLabels?: Token[];
}

/**
 * ContextWindowBuilderDomainService
 *
 * Clusters the tokens of one page into neighborhoods, each hypothesized to
 * describe a single VAV box. Layout independent: no fixed coordinates, only
 * box-id seeds, schedule tables and spatial distance.
 */
@Injectable()
export class ContextWindowBuilderDomainService {
  private readonly logger = new Logger(ContextWindowBuilderDomainService.name);

  build(
    page: number,
    tokens: readonly Token[],
    settings: ExtractionSettings,
  ): Neighborhood[] {
    const sorted = sortByPosition(
      tokens.flatMap((token) => this.splitBoxIds(token, settings)),
    );
    const position = new Map<Token, number>(
      sorted.map((token, index) => [token, index]),
    );

    const consumed = new Set<Token>();
    const groups: SeedGroup[] = this.detectScheduleRows(
      sorted,
      settings,
      consumed,
    );

    const seeds = sorted.filter(
      (token) => !consumed.has(token) && containsBoxId(token.text, settings),
    );
    const callouts = new Map<Token, SeedGroup>();
    for (const seed of seeds) {
      const group: SeedGroup = {
        kind: NeighborhoodKind.CALLOUT,
        seed,
        tokens: [seed],
      };
      callouts.set(seed, group);
      groups.push(group);
      consumed.add(seed);
    }

    const unassigned: Token[] = [];
    for (const token of sorted) {
      if (consumed.has(token)) {
        continue;
      }
      const nearest = this.nearestSeed(token, seeds, settings.neighborhoodRadius);
      const group = nearest ? callouts.get(nearest) : undefined;
      if (group) {
        group.tokens.push(token);
      } else {
        unassigned.push(token);
      }
    }

    groups.sort(
      (a, b) => (position.get(a.seed) ?? 0) - (position.get(b.seed) ?? 0),
    );

    const neighborhoods: Neighborhood[] = groups.map((group, index) => {
      const ordered = readingOrder(group.tokens);
      return {
        kind: group.kind,
        page,
        index,
        tokens: ordered,
        anchorBbox: bboxOfTokens(ordered),
        seed: group.seed,
        ...(group.columnLabels ? { columnLabels: group.columnLabels } : {}),
      };
    });

    if (unassigned.length > 0) {
      const ordered = readingOrder(unassigned);
      neighborhoods.push({
        kind: NeighborhoodKind.UNASSIGNED,
        page,
        index: neighborhoods.length,
        tokens: ordered,
        anchorBbox: bboxOfTokens(ordered),
      });
    }

    this.logger.debug(
      `[Neighborhoods] page=${page + 1} tokens=${tokens.length} seeds=${groups.length} unassigned=${unassigned.length}`,
    );

    return neighborhoods;
  }

  /**
   * A token naming several boxes ("VAV-1, VAV-2") becomes one token per box
   * id, each spanning its share of the original width.
   */
  private splitBoxIds(token: Token, settings: ExtractionSettings): Token[] {
    const { text, bbox } = token;
    const starts = [...text.matchAll(settings.boxIdPattern)].map(
      (match) => match.index ?? 0,
    );
    if (starts.length < 2) {
      return [token];
    }

    const charWidth = (bbox.x1 - bbox.x0) / text.length;
    return starts.map((start, i) => {
      const from = i === 0 ? 0 : start;
      const segment = text.slice(from, starts[i + 1] ?? text.length);
      const lead = segment.length - segment.trimStart().length;
      const body = segment.trim().replace(/[\s,;&\/]+$/, '');
      const x0 = bbox.x0 + (from + lead) * charWidth;
      return createToken(
        body,
        { x0, y0: bbox.y0, x1: x0 + body.length * charWidth, y1: bbox.y1 },
        token.page,
        token.fontSize,
      );
    });
  }

  /**
   * A header line names at least two distinct columns. Every following line
   * that starts with a box id is one row; the table ends at the first line
   * that does not.
   */
  private detectScheduleRows(
    sorted: readonly Token[],
    settings: ExtractionSettings,
    consumed: Set<Token>,
  ): SeedGroup[] {
    const lines = groupIntoLines(sorted);
    const rows: SeedGroup[] = [];

    let i = 0;
    while (i < lines.length) {
      const header = lines[i];
      if (!this.isScheduleHeader(header)) {
        i++;
        continue;
      }

      let j = i + 1;
      while (j < lines.length && containsBoxId(lines[j][0].text, settings)) {
        const line = lines[j];
        rows.push({
          kind: NeighborhoodKind.SCHEDULE_ROW,
          seed: line[0],
          tokens: [...line],
          columnLabels: header,
        });
        line.forEach((token) => consumed.add(token));
        j++;
      }

      if (j > i + 1) {
        header.forEach((token) => consumed.add(token));
      }
      i = j;
    }

    return rows;
  }

  private isScheduleHeader(line: readonly Token[]): boolean {
    const columns = new Set<string>();
    for (const token of line) {
      if (BOX_ID_COLUMN.test(token.text)) columns.add('boxId');
      if (CFM_COLUMN.test(token.text)) columns.add('cfm');
      if (INLET_COLUMN.test(token.text)) columns.add('inletSize');
    }
    return columns.size >= 2;
  }

  private nearestSeed(
    token: Token,
    seeds: readonly Token[],
    radius: number,
  ): Token | undefined {
    let best: Token | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (const seed of seeds) {
      const distance = rectDistance(token.bbox, seed.bbox);
      // strict comparison keeps the earlier seed on ties
      if (distance <= radius && distance < bestDistance) {
        best = seed;
        bestDistance = distance;
      }
    }
    return best;
  }
}
