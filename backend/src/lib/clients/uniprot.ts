/**
 * UniProtKB REST search, used when ChEMBL carries no accession for a target.
 */
import { z } from 'zod';
import { config } from '../config.js';
import { buildUrl, getJson } from '../http.js';

const SOURCE = 'uniprot';

const searchSchema = z.object({
  results: z.array(z.object({ primaryAccession: z.string() })).default([]),
});

const entrySchema = z.object({ primaryAccession: z.string() });

export class UniProtClient {
  constructor(
    private readonly baseUrl: string = config.upstream.uniprotBaseUrl,
    private readonly timeoutMs: number = config.upstream.requestTimeoutMs,
    private readonly taxonId: string = config.etl.speciesTaxonId
  ) {}

  private async firstAccession(query: string, signal?: AbortSignal): Promise<string | null> {
    const body = await getJson(
      SOURCE,
      buildUrl(this.baseUrl, '/uniprotkb/search', { query, fields: 'accession', size: 1, format: 'json' }),
      searchSchema,
      { timeoutMs: this.timeoutMs, signal }
    );
    return body?.results[0]?.primaryAccession ?? null;
  }

  async accessionForTarget(targetId: string, signal?: AbortSignal): Promise<string | null> {
    return this.firstAccession(`xref:ChEMBL-${targetId} AND organism_id:${this.taxonId}`, signal);
  }

  async accessionForGeneSymbol(geneSymbol: string, signal?: AbortSignal): Promise<string | null> {
    return this.firstAccession(`gene_exact:${geneSymbol} AND organism_id:${this.taxonId}`, signal);
  }

  // Fetches a well-known entry; any answer other than an outage counts as up
  async ping(): Promise<void> {
    await getJson(SOURCE, buildUrl(this.baseUrl, '/uniprotkb/P00533.json', { fields: 'accession' }), entrySchema, {
      timeoutMs: this.timeoutMs,
    });
  }
}
