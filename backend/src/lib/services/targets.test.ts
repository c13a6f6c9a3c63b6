import { describe, it, expect } from 'vitest';
import type { ActivityRecord, TargetAnnotation } from '@pathimpact/shared';
import {
  aggregateTargets,
  hierarchyMapper,
  selectVisibleTargets,
  type TargetMapper,
} from './targets.js';
import { buildHierarchy } from './hierarchy.js';

function record(targetId: string, potency: number | null, assayId: string, extra: Partial<ActivityRecord> = {}): ActivityRecord {
  return { targetId, potency, assayId, relation: '=', valid: true, ...extra };
}

function annotation(targetId: string, extra: Partial<TargetAnnotation> = {}): TargetAnnotation {
  return {
    targetId,
    name: `${targetId} name`,
    geneSymbol: null,
    accession: null,
    secondaryAccessions: [],
    priorConfidence: 9,
    organism: 'Homo sapiens',
    actionType: null,
    mappingNotes: [],
    ...extra,
  };
}

const mappedEverything: TargetMapper = (a) => ({
  status: 'mapped',
  accessions: a?.accession ? [a.accession] : [],
});

const params = { potencyThreshold: 5, minAssays: 2 };

describe('aggregateTargets', () => {
  it('summarizes potency per target', () => {
    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [
        record('EGFR', 9.0, 'A1'),
        record('EGFR', 9.1, 'A2'),
        record('EGFR', 9.1, 'A3'),
        record('EGFR', 9.3, 'A4'),
      ],
      annotations: new Map([['EGFR', annotation('EGFR', { accession: 'P00533', actionType: 'INHIBITOR' })]]),
      params,
      mapTarget: mappedEverything,
    });

    expect(result.targets).toHaveLength(1);
    const [egfr] = result.targets;
    expect(egfr.medianPotency).toBe(9.1);
    expect(egfr.assayCount).toBe(4);
    expect(egfr.potencyMin).toBe(9.0);
    expect(egfr.potencyMax).toBe(9.3);
    expect(egfr.confidenceTier).toBe('high');
    expect(egfr.lowConfidence).toBe(false);
    expect(egfr.mappingStatus).toBe('mapped');
    expect(egfr.mappedAccessions).toEqual(['P00533']);
    expect(egfr.mappingNotes).toEqual([]);
    expect(egfr.directionEvidence).toBe('positive');
    expect(egfr.sourceAssayIds).toEqual(['A1', 'A2', 'A3', 'A4']);
  });

  it('computes the interquartile range by linear interpolation', () => {
    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [record('T1', 5, 'A1'), record('T1', 6, 'A2'), record('T1', 7, 'A3'), record('T1', 8, 'A4')],
      annotations: new Map(),
      params,
      mapTarget: mappedEverything,
    });
    expect(result.targets[0].medianPotency).toBe(6.5);
    expect(result.targets[0].potencyIqr).toBe(1.5);
  });

  it('drops inexact, flagged and potency-less records', () => {
    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [
        record('T1', 7, 'A1'),
        record('T1', 3, 'A2', { relation: '<' }),
        record('T1', 3, 'A3', { valid: false }),
        record('T1', null, 'A4'),
        record('T2', 6, 'A5', { relation: '>' }),
      ],
      annotations: new Map(),
      params,
      mapTarget: mappedEverything,
    });
    expect(result.targets.map((t) => [t.targetId, t.assayCount])).toEqual([['T1', 1]]);
  });

  it('retains under-replicated targets as low confidence', () => {
    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [record('T1', 7, 'A1')],
      annotations: new Map([['T1', annotation('T1')]]),
      params,
      mapTarget: mappedEverything,
    });
    const [target] = result.targets;
    expect(target.lowConfidence).toBe(true);
    expect(target.confidenceTier).toBe('low');
    expect(target.confidenceReasons).toEqual(['rule:low', 'assay_count<2', 'min_assays_not_met']);

    expect(selectVisibleTargets(result.targets, false)).toEqual({ visible: [], hiddenCount: 1 });
    expect(selectVisibleTargets(result.targets, true).visible).toEqual([target]);
  });

  it('flags targets below min_assays even when the tier is not low', () => {
    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [record('T1', 7, 'A1'), record('T1', 7, 'A2')],
      annotations: new Map([['T1', annotation('T1')]]),
      params: { potencyThreshold: 5, minAssays: 3 },
      mapTarget: mappedEverything,
    });
    expect(result.targets[0].confidenceTier).toBe('high');
    expect(result.targets[0].lowConfidence).toBe(true);
    expect(result.targets[0].confidenceReasons.at(-1)).toBe('min_assays_not_met');
  });

  it('defaults unknown target priors to 8', () => {
    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [record('T1', 7, 'A1'), record('T1', 7, 'A2')],
      annotations: new Map(),
      params,
      mapTarget: mappedEverything,
    });
    expect(result.targets[0].priorConfidence).toBe(8);
    expect(result.targets[0].confidenceTier).toBe('medium');
    expect(result.targets[0].targetName).toBe('T1');
    expect(result.targets[0].directionEvidence).toBe('unknown');
  });

  it('sorts by descending potency with ascending id tie-break', () => {
    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [record('TB', 6, 'A1'), record('TA', 6, 'A2'), record('TC', 8, 'A3')],
      annotations: new Map(),
      params,
      mapTarget: mappedEverything,
    });
    expect(result.targets.map((t) => t.targetId)).toEqual(['TC', 'TA', 'TB']);
  });

  it('excludes non-human targets', () => {
    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [record('RAT1', 8, 'A1'), record('T1', 7, 'A2')],
      annotations: new Map([['RAT1', annotation('RAT1', { organism: 'Rattus norvegicus' })]]),
      params,
      mapTarget: mappedEverything,
    });
    expect(result.targets.map((t) => t.targetId)).toEqual(['T1']);
    expect(result.excludedTargetIds).toEqual(['RAT1']);
  });

  it('truncates to the target budget', () => {
    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [record('T1', 5, 'A1'), record('T2', 6, 'A2'), record('T3', 7, 'A3')],
      annotations: new Map(),
      params,
      mapTarget: mappedEverything,
      maxTargets: 2,
    });
    expect(result.targets.map((t) => t.targetId)).toEqual(['T3', 'T2']);
    expect(result.truncatedCount).toBe(1);
  });

  it('reports limited data when nothing survives', () => {
    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [record('T1', 7, 'A1', { valid: false })],
      annotations: new Map(),
      params,
      mapTarget: mappedEverything,
    });
    expect(result.targets).toEqual([]);
    expect(result.limitedData).toBe(true);
  });

  it('is deterministic for identical input', () => {
    const input = {
      compoundId: 'CHEMBL1',
      records: [record('T2', 6.2, 'A1'), record('T1', 7.4, 'A2'), record('T1', 6.8, 'A3')],
      annotations: new Map([['T1', annotation('T1')]]),
      params,
      mapTarget: mappedEverything,
    };
    expect(JSON.stringify(aggregateTargets(input))).toBe(JSON.stringify(aggregateTargets(input)));
  });
});

describe('aggregateTargets mapping notes', () => {
  it('keeps the accession trail and marks targets that reach no gene product', () => {
    const noGenes: TargetMapper = (a) =>
      a?.targetId === 'T1'
        ? { status: 'mapped', accessions: ['P11111'] }
        : { status: 'unmapped', accessions: [] };

    const result = aggregateTargets({
      compoundId: 'CHEMBL1',
      records: [record('T1', 7, 'A1'), record('T1', 7, 'A2'), record('T2', 6, 'A3'), record('T2', 6, 'A4')],
      annotations: new Map([
        ['T1', annotation('T1', { accession: 'P11111', mappingNotes: ['uniprot_xref_lookup'] })],
        ['T2', annotation('T2', { mappingNotes: ['uniprot_unmapped'] })],
      ]),
      params,
      mapTarget: noGenes,
    });

    expect(result.targets.map((t) => [t.targetId, t.mappingNotes])).toEqual([
      ['T1', ['uniprot_xref_lookup']],
      ['T2', ['uniprot_unmapped', 'unmapped_target']],
    ]);
  });
});

describe('hierarchyMapper', () => {
  const { snapshot } = buildHierarchy(
    {
      release: '90',
      pathways: [{ pathwayId: 'P1', name: 'Signalling', geneProducts: ['P00533', 'Q99999'] }],
      relations: [],
    },
    { version: 'v1', builtAt: '2026-01-01T00:00:00.000Z' }
  );
  const mapTarget = hierarchyMapper(snapshot);

  it('maps through the primary accession', () => {
    expect(mapTarget(annotation('EGFR', { accession: 'P00533' }))).toEqual({
      status: 'mapped',
      accessions: ['P00533'],
    });
  });

  it('falls back to secondary accessions as a partial mapping', () => {
    expect(
      mapTarget(annotation('T9', { accession: 'X00001', secondaryAccessions: ['Q99999', 'Z0', 'Q99999'] }))
    ).toEqual({ status: 'partial', accessions: ['Q99999'] });
  });

  it('marks targets without any hierarchy gene product as unmapped', () => {
    expect(mapTarget(annotation('T9', { accession: 'X00001' }))).toEqual({ status: 'unmapped', accessions: [] });
    expect(mapTarget(undefined)).toEqual({ status: 'unmapped', accessions: [] });
  });
});
