/**
 * Accession fallback for targets that ChEMBL left without a UniProt accession.
 * Steps run in order (cross-reference, then gene symbol) and each one that was
 * tried is recorded on the annotation's mapping notes.
 */
import { MappingNote, type TargetAnnotation } from '@pathimpact/shared';
import { config } from '../config.js';
import { UpstreamUnavailableError } from '../errors.js';
import { logger, type Logger } from '../logger.js';

export interface AccessionLookup {
  accessionForTarget(targetId: string, signal?: AbortSignal): Promise<string | null>;
  accessionForGeneSymbol(geneSymbol: string, signal?: AbortSignal): Promise<string | null>;
}

export interface AccessionFill {
  annotations: Map<string, TargetAnnotation>;
  // True when any lookup failed on an outage rather than finding nothing
  sourceDown: boolean;
}

// Stand-in for a target the annotation source said nothing about
function bareAnnotation(targetId: string): TargetAnnotation {
  return {
    targetId,
    name: targetId,
    geneSymbol: null,
    accession: null,
    secondaryAccessions: [],
    priorConfidence: null,
    organism: null,
    actionType: null,
    mappingNotes: [],
  };
}

function needsLookup(annotation: TargetAnnotation): boolean {
  if (annotation.accession) return false;
  // Non-human targets are dropped later; no point resolving them
  return !annotation.organism || annotation.organism === config.scoring.humanOrganism;
}

export async function fillMissingAccessions(
  lookup: AccessionLookup,
  targetIds: readonly string[],
  annotations: ReadonlyMap<string, TargetAnnotation>,
  options: { signal?: AbortSignal; log?: Logger } = {}
): Promise<AccessionFill> {
  const { signal } = options;
  const log = options.log ?? logger;
  const filled = new Map<string, TargetAnnotation>();
  let sourceDown = false;

  for (const targetId of targetIds) {
    const annotation = annotations.get(targetId) ?? bareAnnotation(targetId);
    if (!needsLookup(annotation)) {
      filled.set(targetId, annotation);
      continue;
    }

    const steps: Array<{ note: MappingNote; run: () => Promise<string | null> }> = [
      { note: MappingNote.UNIPROT_XREF, run: () => lookup.accessionForTarget(targetId, signal) },
    ];
    const { geneSymbol } = annotation;
    if (geneSymbol) {
      steps.push({
        note: MappingNote.UNIPROT_GENE_SYMBOL,
        run: () => lookup.accessionForGeneSymbol(geneSymbol, signal),
      });
    }

    const notes: MappingNote[] = [...annotation.mappingNotes];
    let accession: string | null = null;
    let failed = false;
    for (const step of steps) {
      try {
        accession = await step.run();
      } catch (error) {
        if (!(error instanceof UpstreamUnavailableError)) throw error;
        log.warn({ targetId, step: step.note, err: error }, 'Accession lookup failed');
        if (!failed) notes.push(MappingNote.UNIPROT_UNAVAILABLE);
        failed = true;
        continue;
      }
      if (accession) {
        notes.push(step.note);
        break;
      }
    }

    if (failed) sourceDown = true;
    if (!accession) notes.push(MappingNote.UNIPROT_UNMAPPED);
    filled.set(targetId, { ...annotation, accession, mappingNotes: notes });
  }

  return { annotations: filled, sourceDown };
}
