import { Injectable, Logger } from '@nestjs/common';
import { Diagnostic } from '../entities/diagnostic.entity';
import { FieldCandidate } from '../entities/field-candidate.entity';
import { Neighborhood } from '../entities/neighborhood.entity';
import { BoundingBox } from '../entities/token.entity';
import {
  FieldConfidences,
  VavRecord,
  recordConfidence,
} from '../entities/vav-record.entity';
import { CandidateSource } from '../enums/candidate-source.enum';
import { DiagnosticReason } from '../enums/diagnostic-reason.enum';
import { ExtractionStage } from '../enums/extraction-stage.enum';
import { FieldKind } from '../enums/field-kind.enum';
import { NeighborhoodKind } from '../enums/neighborhood-kind.enum';
import {
  ExtractionSettings,
  isPlausibleCfm,
} from '../utils/extraction-settings.util';
import { compareBoxIds, normalizeBoxId } from '../utils/field-patterns.util';
import { bboxOfTokens, rectDistance } from '../utils/geometry.util';

export const RECOVERY_CONFIDENCE_FACTOR = 0.6;
export const ESTIMATED_INLET_CONFIDENCE = 0.3;

export interface ClassifiedNeighborhood {
  neighborhood: Neighborhood;
  candidates: FieldCandidate[];
}

export interface DraftRecord {
  boxId: string;
  cfm: number | null;
  inletSize: string | null;
  page: number;
  neighborhoodIndex: number;
  anchorBbox: BoundingBox;
  confidences: FieldConfidences;
  sources: Partial<Record<FieldKind, CandidateSource>>;
}

export interface PageAssembly {
  page: number;
  drafts: DraftRecord[];
  diagnostics: Diagnostic[];
}

/**
 * Round inlet size for a given airflow, smallest first
 */
const INLET_SIZE_BY_CFM: ReadonlyArray<readonly [number, string]> = [
  [200, '6"'],
  [400, '8"'],
  [700, '10"'],
  [Number.POSITIVE_INFINITY, '12"'],
];

export function estimateInletSize(cfm: number): string | null {
  if (!(cfm > 0)) {
    return null;
  }
  const match = INLET_SIZE_BY_CFM.find(([limit]) => cfm <= limit);
  return match ? match[1] : null;
}

/**
 * RecordAssemblerDomainService
 *
 * Turns classified neighborhoods into draft records per page, then merges
 * the drafts of all pages into one record per normalized box id. The merge
 * visits drafts by (page, neighborhood index) so the result does not depend
 * on the order in which pages finished.
 */
@Injectable()
export class RecordAssemblerDomainService {
  private readonly logger = new Logger(RecordAssemblerDomainService.name);

  assemblePage(
    page: number,
    classified: readonly ClassifiedNeighborhood[],
    settings: ExtractionSettings,
  ): PageAssembly {
    const ordered = [...classified].sort(
      (a, b) => a.neighborhood.index - b.neighborhood.index,
    );

    const diagnostics: Diagnostic[] = [];
    const drafts = ordered
      .filter(({ neighborhood }) => neighborhood.kind !== NeighborhoodKind.UNASSIGNED)
      .map(({ neighborhood, candidates }) =>
        this.toDraft(neighborhood, candidates, settings, diagnostics),
      );

    const overflow = ordered.find(
      ({ neighborhood }) => neighborhood.kind === NeighborhoodKind.UNASSIGNED,
    );
    if (overflow) {
      const plausible = this.withoutRejected(
        overflow.candidates,
        'Unassigned value',
        page,
        settings,
        diagnostics,
      );
      const discarded = this.recoverUnassigned(plausible, drafts, settings);
      if (discarded.length > 0) {
        this.logger.debug(
          `[Assembler] page=${page + 1} discarded ${discarded.length} unassigned candidate(s)`,
        );
        diagnostics.push({
          stage: ExtractionStage.ASSEMBLING,
          reason: DiagnosticReason.UNASSIGNED_DISCARDED,
          message: `Discarded ${discarded.length} value(s) not near any box: ${discarded
            .map((candidate) => candidate.rawText)
            .join(', ')}`,
          page,
        });
      }
    }

    if (settings.estimateInletFromCfm) {
      drafts.forEach((draft) => this.estimateInlet(draft));
    }

    return { page, drafts, diagnostics };
  }

  merge(pageAssemblies: readonly PageAssembly[]): VavRecord[] {
    const drafts = pageAssemblies
      .flatMap((assembly) => assembly.drafts)
      .sort((a, b) => a.page - b.page || a.neighborhoodIndex - b.neighborhoodIndex);

    const byBoxId = new Map<string, MergedRecord>();
    const unkeyed: MergedRecord[] = [];

    for (const draft of drafts) {
      const key = normalizeBoxId(draft.boxId);
      if (key === '') {
        unkeyed.push(MergedRecord.from(draft));
        continue;
      }
      const existing = byBoxId.get(key);
      if (existing) {
        existing.absorb(draft);
      } else {
        byBoxId.set(key, MergedRecord.from({ ...draft, boxId: key }));
      }
    }

    return [...byBoxId.values(), ...unkeyed]
      .map((merged) => merged.toRecord())
      .sort((a, b) => compareBoxIds(a.boxId, b.boxId));
  }

  private toDraft(
    neighborhood: Neighborhood,
    candidates: readonly FieldCandidate[],
    settings: ExtractionSettings,
    diagnostics: Diagnostic[],
  ): DraftRecord {
    const boxId = this.best(candidates, FieldKind.BOX_ID);
    const plausible = this.withoutRejected(
      candidates,
      boxId ? String(boxId.normalizedValue) : 'Unidentified box',
      neighborhood.page,
      settings,
      diagnostics,
    );
    const cfm = this.best(plausible, FieldKind.CFM);
    const inletSize = this.best(plausible, FieldKind.INLET_SIZE);

    const sources: Partial<Record<FieldKind, CandidateSource>> = {};
    if (boxId) sources[FieldKind.BOX_ID] = boxId.source;
    if (cfm) sources[FieldKind.CFM] = cfm.source;
    if (inletSize) sources[FieldKind.INLET_SIZE] = inletSize.source;

    return {
      boxId: boxId ? String(boxId.normalizedValue) : '',
      cfm: cfm && typeof cfm.normalizedValue === 'number' ? cfm.normalizedValue : null,
      inletSize: inletSize ? String(inletSize.normalizedValue) : null,
      page: neighborhood.page,
      neighborhoodIndex: neighborhood.index,
      anchorBbox: neighborhood.anchorBbox,
      confidences: {
        boxId: boxId?.confidence ?? 0,
        cfm: cfm && typeof cfm.normalizedValue === 'number' ? cfm.confidence : 0,
        inletSize: inletSize?.confidence ?? 0,
      },
      sources,
    };
  }

  /**
   * Drops values the settings rule out before they compete with plausible
   * ones, reporting each as FIELD_REJECTED.
   */
  private withoutRejected(
    candidates: readonly FieldCandidate[],
    label: string,
    page: number,
    settings: ExtractionSettings,
    diagnostics: Diagnostic[],
  ): FieldCandidate[] {
    return candidates.filter((candidate) => {
      const problem = this.rejection(candidate, settings);
      if (problem === undefined) {
        return true;
      }
      diagnostics.push({
        stage: ExtractionStage.ASSEMBLING,
        reason: DiagnosticReason.FIELD_REJECTED,
        message: `${label}: ${problem}`,
        page,
      });
      return false;
    });
  }

  private rejection(
    candidate: FieldCandidate,
    settings: ExtractionSettings,
  ): string | undefined {
    const value = candidate.normalizedValue;
    if (candidate.kind === FieldKind.CFM) {
      return typeof value === 'number' && !isPlausibleCfm(value, settings)
        ? `CFM ${value} outside ${settings.cfmRange.min}-${settings.cfmRange.max}`
        : undefined;
    }
    if (candidate.kind === FieldKind.INLET_SIZE) {
      return settings.inletSizePattern.test(String(value))
        ? undefined
        : `unrecognized inlet size "${String(value)}"`;
    }
    return undefined;
  }

  /**
   * Highest confidence wins; an exact tie keeps the first in reading order.
   */
  private best(
    candidates: readonly FieldCandidate[],
    kind: FieldKind,
  ): FieldCandidate | undefined {
    let best: FieldCandidate | undefined;
    for (const candidate of candidates) {
      if (candidate.kind !== kind) continue;
      if (!best || candidate.confidence > best.confidence) {
        best = candidate;
      }
    }
    return best;
  }

  /**
   * Returns the candidates that could not be attached to any draft.
   */
  private recoverUnassigned(
    candidates: readonly FieldCandidate[],
    drafts: DraftRecord[],
    settings: ExtractionSettings,
  ): FieldCandidate[] {
    const discarded: FieldCandidate[] = [];

    for (const candidate of candidates) {
      if (candidate.kind === FieldKind.BOX_ID) {
        continue;
      }
      const bbox = bboxOfTokens(candidate.sourceTokens);
      const target = this.nearestDraftLacking(
        drafts,
        candidate.kind,
        bbox,
        settings.recoveryRadius,
      );
      if (!target) {
        discarded.push(candidate);
        continue;
      }

      const confidence = candidate.confidence * RECOVERY_CONFIDENCE_FACTOR;
      if (candidate.kind === FieldKind.CFM && typeof candidate.normalizedValue === 'number') {
        target.cfm = candidate.normalizedValue;
        target.confidences.cfm = confidence;
        target.sources[FieldKind.CFM] = CandidateSource.RECOVERED;
      } else if (candidate.kind === FieldKind.INLET_SIZE) {
        target.inletSize = String(candidate.normalizedValue);
        target.confidences.inletSize = confidence;
        target.sources[FieldKind.INLET_SIZE] = CandidateSource.RECOVERED;
      }
    }

    return discarded;
  }

  private nearestDraftLacking(
    drafts: readonly DraftRecord[],
    kind: FieldKind,
    bbox: BoundingBox,
    radius: number,
  ): DraftRecord | undefined {
    let best: DraftRecord | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (const draft of drafts) {
      const lacking =
        kind === FieldKind.CFM ? draft.cfm === null : draft.inletSize === null;
      if (!lacking) continue;

      const distance = rectDistance(bbox, draft.anchorBbox);
      if (distance <= radius && distance < bestDistance) {
        best = draft;
        bestDistance = distance;
      }
    }
    return best;
  }

  private estimateInlet(draft: DraftRecord): void {
    if (draft.cfm === null || draft.inletSize !== null) {
      return;
    }
    const estimate = estimateInletSize(draft.cfm);
    if (estimate) {
      draft.inletSize = estimate;
      draft.confidences.inletSize = ESTIMATED_INLET_CONFIDENCE;
      draft.sources[FieldKind.INLET_SIZE] = CandidateSource.ESTIMATED;
    }
  }
}

/**
 * Accumulates the drafts of one box id across pages.
 */
class MergedRecord {
  private readonly pages = new Set<number>();

  private constructor(
    private readonly boxId: string,
    private cfm: number | null,
    private inletSize: string | null,
    private readonly confidences: FieldConfidences,
  ) {}

  static from(draft: DraftRecord): MergedRecord {
    const merged = new MergedRecord(draft.boxId, draft.cfm, draft.inletSize, {
      ...draft.confidences,
    });
    merged.pages.add(draft.page);
    return merged;
  }

  absorb(draft: DraftRecord): void {
    this.pages.add(draft.page);

    if (draft.confidences.boxId > this.confidences.boxId) {
      this.confidences.boxId = draft.confidences.boxId;
    }
    if (
      draft.cfm !== null &&
      (this.cfm === null || draft.confidences.cfm > this.confidences.cfm)
    ) {
      this.cfm = draft.cfm;
      this.confidences.cfm = draft.confidences.cfm;
    }
    if (
      draft.inletSize !== null &&
      (this.inletSize === null ||
        draft.confidences.inletSize > this.confidences.inletSize)
    ) {
      this.inletSize = draft.inletSize;
      this.confidences.inletSize = draft.confidences.inletSize;
    }
  }

  toRecord(): VavRecord {
    const pages = [...this.pages].sort((a, b) => a - b);
    return {
      boxId: this.boxId,
      cfm: this.cfm,
      inletSize: this.inletSize,
      page: pages[0],
      pages,
      confidence: recordConfidence(this.confidences),
      fieldConfidences: { ...this.confidences },
    };
  }
}
