import { Injectable } from '@nestjs/common';
import { FieldCandidate } from '../entities/field-candidate.entity';
import { Neighborhood } from '../entities/neighborhood.entity';
import { Token } from '../entities/token.entity';
import { CandidateSource } from '../enums/candidate-source.enum';
import { FieldKind } from '../enums/field-kind.enum';
import { NeighborhoodKind } from '../enums/neighborhood-kind.enum';
import {
  ClassificationContext,
  ClassificationOutcome,
  FieldClassifierPort,
} from '../ports/field-classifier.port';
import {
  ExtractionSettings,
  isPlausibleCfm,
} from '../utils/extraction-settings.util';
import {
  CFM_COLUMN,
  CFM_LABEL_VALUE,
  CFM_VALUE_UNIT,
  DIMENSION_SIZE,
  FLOW_LABEL,
  INLET_COLUMN,
  ROUND_SIZE_PREFIX,
  ROUND_SIZE_SUFFIX,
  blankSpan,
  isInteger,
  normalizeBoxId,
  normalizeInletSize,
  parseNumber,
} from '../utils/field-patterns.util';

/**
 * Rule confidences, highest for explicit unit or label in the same token.
 */
export const HEURISTIC_CONFIDENCE = {
  boxIdInSeed: 0.95,
  boxIdElsewhere: 0.75,
  cfmValueUnit: 0.95,
  cfmLabelValue: 0.9,
  cfmScheduleColumn: 0.85,
  cfmNextToLabel: 0.8,
  cfmBareInRange: 0.4,
  inletDimension: 0.9,
  inletRound: 0.85,
  inletScheduleColumn: 0.8,
} as const;

type SpanRule = {
  pattern: RegExp;
  kind: FieldKind;
  confidence: number;
  normalize: (match: RegExpMatchArray) => string | number | null;
};

const SPAN_RULES: readonly SpanRule[] = [
  {
    pattern: DIMENSION_SIZE,
    kind: FieldKind.INLET_SIZE,
    confidence: HEURISTIC_CONFIDENCE.inletDimension,
    normalize: (match) => `${Number(match[1])}x${Number(match[2])}`,
  },
  {
    pattern: ROUND_SIZE_SUFFIX,
    kind: FieldKind.INLET_SIZE,
    confidence: HEURISTIC_CONFIDENCE.inletRound,
    normalize: (match) => `${Number(match[1])}"`,
  },
  {
    pattern: ROUND_SIZE_PREFIX,
    kind: FieldKind.INLET_SIZE,
    confidence: HEURISTIC_CONFIDENCE.inletRound,
    normalize: (match) => `${Number(match[1])}"`,
  },
  {
    pattern: CFM_VALUE_UNIT,
    kind: FieldKind.CFM,
    confidence: HEURISTIC_CONFIDENCE.cfmValueUnit,
    normalize: (match) => positive(parseNumber(match[1])),
  },
  {
    pattern: CFM_LABEL_VALUE,
    kind: FieldKind.CFM,
    confidence: HEURISTIC_CONFIDENCE.cfmLabelValue,
    normalize: (match) => positive(parseNumber(match[1])),
  },
];

function positive(value: number | null): number | null {
  return value !== null && value > 0 ? value : null;
}

/**
 * HeuristicFieldClassifierDomainService
 *
 * Pattern rules applied per token in reading order. Each matched span is
 * blanked before the next rule runs, so one piece of text yields at most one
 * candidate. Bare numbers are only typed when the whole token is a number.
 */
@Injectable()
export class HeuristicFieldClassifierDomainService
  implements FieldClassifierPort
{
  classify(
    neighborhood: Neighborhood,
    context: ClassificationContext,
  ): Promise<ClassificationOutcome> {
    return Promise.resolve({
      candidates: this.extractCandidates(neighborhood, context.settings),
      diagnostics: [],
      languageModelCalled: false,
    });
  }

  extractCandidates(
    neighborhood: Neighborhood,
    settings: ExtractionSettings,
  ): FieldCandidate[] {
    return neighborhood.tokens.flatMap((token, index) =>
      this.classifyToken(token, index, neighborhood, settings),
    );
  }

  private classifyToken(
    token: Token,
    index: number,
    neighborhood: Neighborhood,
    settings: ExtractionSettings,
  ): FieldCandidate[] {
    const candidates: FieldCandidate[] = [];
    const emit = (
      kind: FieldKind,
      rawText: string,
      normalizedValue: string | number,
      confidence: number,
    ) =>
      candidates.push({
        kind,
        rawText: rawText.trim(),
        normalizedValue,
        confidence,
        sourceTokens: [token],
        source: CandidateSource.HEURISTIC,
      });

    let working = token.text;

    for (const match of [...working.matchAll(settings.boxIdPattern)]) {
      emit(
        FieldKind.BOX_ID,
        match[0],
        normalizeBoxId(match[0]),
        neighborhood.seed === token
          ? HEURISTIC_CONFIDENCE.boxIdInSeed
          : HEURISTIC_CONFIDENCE.boxIdElsewhere,
      );
      working = blankSpan(working, match.index ?? 0, match[0].length);
    }

    for (const rule of SPAN_RULES) {
      for (const match of [...working.matchAll(rule.pattern)]) {
        const value = rule.normalize(match);
        if (value === null) {
          continue;
        }
        emit(rule.kind, match[0], value, rule.confidence);
        working = blankSpan(working, match.index ?? 0, match[0].length);
      }
    }

    if (candidates.length === 0) {
      const bare = this.classifyBareNumber(token, index, neighborhood, settings);
      if (bare) {
        emit(bare.kind, token.text, bare.value, bare.confidence);
      }
    }

    return candidates;
  }

  private classifyBareNumber(
    token: Token,
    index: number,
    neighborhood: Neighborhood,
    settings: ExtractionSettings,
  ): { kind: FieldKind; value: string | number; confidence: number } | null {
    const value = parseNumber(token.text);
    if (value === null || value <= 0) {
      return null;
    }

    if (
      neighborhood.kind === NeighborhoodKind.SCHEDULE_ROW &&
      neighborhood.columnLabels
    ) {
      const label = this.columnLabelFor(token, neighborhood.columnLabels);
      if (label && CFM_COLUMN.test(label.text)) {
        return {
          kind: FieldKind.CFM,
          value,
          confidence: HEURISTIC_CONFIDENCE.cfmScheduleColumn,
        };
      }
      if (label && INLET_COLUMN.test(label.text)) {
        const size = normalizeInletSize(token.text);
        if (size) {
          return {
            kind: FieldKind.INLET_SIZE,
            value: size,
            confidence: HEURISTIC_CONFIDENCE.inletScheduleColumn,
          };
        }
      }
    }

    const previous = neighborhood.tokens[index - 1];
    const next = neighborhood.tokens[index + 1];
    if (
      (previous && FLOW_LABEL.test(previous.text.trim())) ||
      (next && FLOW_LABEL.test(next.text.trim()))
    ) {
      return {
        kind: FieldKind.CFM,
        value,
        confidence: HEURISTIC_CONFIDENCE.cfmNextToLabel,
      };
    }

    if (isInteger(token.text) && isPlausibleCfm(value, settings)) {
      return {
        kind: FieldKind.CFM,
        value,
        confidence: HEURISTIC_CONFIDENCE.cfmBareInRange,
      };
    }

    return null;
  }

  /**
   * Header token whose horizontal extent is closest to the cell.
   */
  private columnLabelFor(
    token: Token,
    labels: readonly Token[],
  ): Token | undefined {
    let best: Token | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const label of labels) {
      const distance = Math.max(
        0,
        label.bbox.x0 - token.bbox.x1,
        token.bbox.x0 - label.bbox.x1,
      );
      if (distance < bestDistance) {
        best = label;
        bestDistance = distance;
      }
    }
    return best;
  }
}
