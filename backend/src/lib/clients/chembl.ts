/**
 * ChEMBL REST API: compound search, bioactivities, mechanisms and target details.
 */
import { z } from 'zod';
import {
  MappingNote,
  type ActivityRecord,
  type CompoundSuggestion,
  type IdentityRecord,
  type TargetAnnotation,
  type TargetAnnotationSet,
} from '@pathimpact/shared';
import { config } from '../config.js';
import { buildUrl, getJson } from '../http.js';
import { logger } from '../logger.js';

const SOURCE = 'chembl';
const PAGE_SIZE = 1000;
const SEARCH_LIMIT = 8;
const SUGGEST_LIMIT = 10;
const MAX_SYNONYMS = 10;
// Binding and functional assays; ADMET, toxicity and physicochemical assays never count
const POTENCY_ASSAY_TYPES = new Set(['B', 'F']);

const numeric = z.union([z.number(), z.string()]).nullish();

const moleculeSchema = z.object({
  molecule_chembl_id: z.string(),
  pref_name: z.string().nullish(),
  max_phase: numeric,
  molecule_hierarchy: z.object({ parent_chembl_id: z.string().nullish() }).nullish(),
  molecule_structures: z.object({ standard_inchi_key: z.string().nullish() }).nullish(),
  molecule_synonyms: z.array(z.object({ molecule_synonym: z.string().nullish() })).nullish(),
});

const moleculeListSchema = z.object({ molecules: z.array(moleculeSchema).default([]) });

const activityListSchema = z.object({
  activities: z
    .array(
      z.object({
        target_chembl_id: z.string().nullish(),
        assay_chembl_id: z.string().nullish(),
        assay_type: z.string().nullish(),
        pchembl_value: numeric,
        standard_relation: z.string().nullish(),
        data_validity_comment: z.string().nullish(),
      })
    )
    .default([]),
  page_meta: z.object({ next: z.string().nullish() }).nullish(),
});

const mechanismListSchema = z.object({
  mechanisms: z
    .array(
      z.object({
        target_chembl_id: z.string().nullish(),
        action_type: z.string().nullish(),
        mechanism_of_action: z.string().nullish(),
      })
    )
    .default([]),
});

const targetSchema = z.object({
  target_chembl_id: z.string(),
  pref_name: z.string().nullish(),
  target_type: z.string().nullish(),
  organism: z.string().nullish(),
  target_components: z
    .array(
      z.object({
        accession: z.string().nullish(),
        target_component_synonyms: z
          .array(z.object({ component_synonym: z.string().nullish(), syn_type: z.string().nullish() }))
          .nullish(),
      })
    )
    .default([]),
});

const statusSchema = z.object({ chembl_db_version: z.string().nullish() });

type Molecule = z.infer<typeof moleculeSchema>;
type Target = z.infer<typeof targetSchema>;

export interface Mechanisms {
  // Target id -> first curated action type
  actions: Map<string, string>;
  mechanismOfAction: string | null;
}

function toNumber(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

// Salts and other forms collapse onto their parent compound
function toIdentityRecord(molecule: Molecule): IdentityRecord {
  const canonicalId = molecule.molecule_hierarchy?.parent_chembl_id ?? molecule.molecule_chembl_id;
  const synonyms = (molecule.molecule_synonyms ?? [])
    .map((entry) => entry.molecule_synonym)
    .filter((synonym): synonym is string => !!synonym)
    .slice(0, MAX_SYNONYMS);
  return {
    canonicalId,
    displayName: molecule.pref_name ?? canonicalId,
    structureKey: molecule.molecule_structures?.standard_inchi_key ?? canonicalId,
    synonyms,
    clinicalPhase: toNumber(molecule.max_phase),
  };
}

// Prior confidence by target type: single proteins are the most specific assignment
export function targetPrior(targetType: string | null | undefined): number | null {
  if (!targetType) return null;
  return targetType.toLowerCase() === 'single protein' ? 9 : 8;
}

function geneSymbolOf(target: Target): string | null {
  for (const synonym of target.target_components[0]?.target_component_synonyms ?? []) {
    const type = (synonym.syn_type ?? '').toUpperCase();
    if ((type === 'GENE_SYMBOL' || type === 'GENE SYMBOL') && synonym.component_synonym) {
      return synonym.component_synonym;
    }
  }
  return null;
}

export function toTargetAnnotation(target: Target, actionType: string | null): TargetAnnotation {
  const accessions = target.target_components
    .map((component) => component.accession)
    .filter((accession): accession is string => !!accession);
  return {
    targetId: target.target_chembl_id,
    name: target.pref_name ?? target.target_chembl_id,
    geneSymbol: geneSymbolOf(target),
    accession: accessions[0] ?? null,
    secondaryAccessions: accessions.slice(1),
    priorConfidence: targetPrior(target.target_type),
    organism: target.organism ?? null,
    actionType,
    mappingNotes: accessions.length > 0 ? [MappingNote.CHEMBL_ACCESSION] : [],
  };
}

export class ChemblClient {
  constructor(
    private readonly baseUrl: string = config.upstream.chemblBaseUrl,
    private readonly timeoutMs: number = config.upstream.requestTimeoutMs
  ) {}

  private url(path: string, query?: Record<string, string | number | undefined>): string {
    return buildUrl(this.baseUrl, path, query);
  }

  async searchByName(normalizedQuery: string): Promise<IdentityRecord[]> {
    const body = await getJson(
      SOURCE,
      this.url('/molecule/search.json', { q: normalizedQuery, limit: SEARCH_LIMIT }),
      moleculeListSchema,
      { timeoutMs: this.timeoutMs }
    );
    return (body?.molecules ?? []).map(toIdentityRecord);
  }

  // Raw molecule matches for autocomplete; salts are not collapsed
  async suggest(query: string): Promise<CompoundSuggestion[]> {
    const body = await getJson(
      SOURCE,
      this.url('/molecule/search.json', { q: query, limit: SUGGEST_LIMIT }),
      moleculeListSchema,
      { timeoutMs: this.timeoutMs }
    );
    const seen = new Set<string>();
    const suggestions: CompoundSuggestion[] = [];
    for (const molecule of body?.molecules ?? []) {
      if (seen.has(molecule.molecule_chembl_id)) continue;
      seen.add(molecule.molecule_chembl_id);
      suggestions.push({
        compoundId: molecule.molecule_chembl_id,
        displayName: molecule.pref_name ?? molecule.molecule_chembl_id,
      });
    }
    return suggestions;
  }

  async lookupByStructureKey(structureKey: string): Promise<IdentityRecord[]> {
    const body = await getJson(
      SOURCE,
      this.url('/molecule.json', { molecule_structures__standard_inchi_key: structureKey }),
      moleculeListSchema,
      { timeoutMs: this.timeoutMs }
    );
    return (body?.molecules ?? []).map(toIdentityRecord);
  }

  async fetchActivities(canonicalId: string): Promise<ActivityRecord[]> {
    const records: ActivityRecord[] = [];
    for (let offset = 0; offset < config.upstream.maxActivityRecords; offset += PAGE_SIZE) {
      const body = await getJson(
        SOURCE,
        this.url('/activity.json', {
          molecule_chembl_id: canonicalId,
          standard_type__in: 'IC50,EC50,Ki,Kd',
          limit: PAGE_SIZE,
          offset,
        }),
        activityListSchema,
        { timeoutMs: this.timeoutMs }
      );
      const page = body?.activities ?? [];
      for (const activity of page) {
        if (!activity.target_chembl_id) continue;
        records.push({
          targetId: activity.target_chembl_id,
          potency: toNumber(activity.pchembl_value),
          assayId: activity.assay_chembl_id ?? 'unknown',
          relation: activity.standard_relation ?? '',
          valid: !activity.data_validity_comment && POTENCY_ASSAY_TYPES.has(activity.assay_type ?? ''),
        });
      }
      if (page.length < PAGE_SIZE || !body?.page_meta?.next) break;
    }
    logger.debug({ canonicalId, records: records.length }, 'Fetched ChEMBL activities');
    return records;
  }

  // Action types come from curated mechanisms; targets without one stay null
  async fetchMechanisms(canonicalId: string, signal?: AbortSignal): Promise<Mechanisms> {
    const body = await getJson(
      SOURCE,
      this.url('/mechanism.json', { molecule_chembl_id: canonicalId }),
      mechanismListSchema,
      { timeoutMs: this.timeoutMs, signal }
    );
    const actions = new Map<string, string>();
    let mechanismOfAction: string | null = null;
    for (const mechanism of body?.mechanisms ?? []) {
      if (mechanism.target_chembl_id && mechanism.action_type && !actions.has(mechanism.target_chembl_id)) {
        actions.set(mechanism.target_chembl_id, mechanism.action_type);
      }
      if (!mechanismOfAction && mechanism.mechanism_of_action) {
        mechanismOfAction = mechanism.mechanism_of_action;
      }
    }
    return { actions, mechanismOfAction };
  }

  async fetchTarget(targetId: string, signal?: AbortSignal): Promise<Target | null> {
    return getJson(SOURCE, this.url(`/target/${encodeURIComponent(targetId)}.json`), targetSchema, {
      timeoutMs: this.timeoutMs,
      signal,
    });
  }

  async fetchTargetAnnotations(
    canonicalId: string,
    targetIds: readonly string[],
    signal?: AbortSignal
  ): Promise<TargetAnnotationSet> {
    const { actions, mechanismOfAction } = await this.fetchMechanisms(canonicalId, signal);
    const annotations: TargetAnnotation[] = [];
    for (const targetId of targetIds) {
      const target = await this.fetchTarget(targetId, signal);
      if (target) annotations.push(toTargetAnnotation(target, actions.get(targetId) ?? null));
    }
    return { mechanismOfAction, annotations };
  }

  async releaseVersion(): Promise<string | null> {
    const body = await getJson(SOURCE, this.url('/status.json'), statusSchema, { timeoutMs: this.timeoutMs });
    return body?.chembl_db_version ?? null;
  }
}
