// Environment configuration
export const config = {
  // AWS Region
  region: process.env.AWS_REGION || 'us-east-1',

  // DynamoDB Tables
  tables: {
    analyses: process.env.ANALYSES_TABLE || 'PathImpactAnalyses',
    shares: process.env.SHARES_TABLE || 'PathImpactShares',
    compounds: process.env.COMPOUNDS_TABLE || 'PathImpactCompounds',
    hierarchy: process.env.HIERARCHY_TABLE || 'PathImpactHierarchy',
    jobs: process.env.JOBS_TABLE || 'PathImpactJobs',
  },

  // S3 Buckets
  buckets: {
    hierarchy: process.env.HIERARCHY_BUCKET || 'pathimpact-hierarchy',
  },

  // Upstream data sources
  upstream: {
    chemblBaseUrl: process.env.CHEMBL_BASE_URL || 'https://www.ebi.ac.uk/chembl/api/data',
    reactomeBaseUrl: process.env.REACTOME_BASE_URL || 'https://reactome.org/ContentService',
    uniprotBaseUrl: process.env.UNIPROT_BASE_URL || 'https://rest.uniprot.org',
    pathwayUrlBase: 'https://reactome.org/content/detail/',
    requestTimeoutMs: Number(process.env.UPSTREAM_TIMEOUT_MS || 15_000),
    annotationBudgetMs: Number(process.env.ANNOTATION_BUDGET_MS || 20_000),
    accessionBudgetMs: Number(process.env.ACCESSION_BUDGET_MS || 10_000),
    maxAttempts: 3,
    initialBackoffMs: 500,
    maxActivityRecords: 5000,
  },

  // Scoring defaults (overridable per request within validated bounds)
  scoring: {
    potencyThreshold: 5.0,
    minAssays: 2,
    includeLowConfidence: false,
    topPathways: 20,
    minDepth: 3,
    maxDepth: 5,
    maxTargets: 50,
    defaultTargetConfidence: 8,
    humanOrganism: 'Homo sapiens',
  },

  // ETL settings
  etl: {
    speciesTaxonId: process.env.ETL_SPECIES_TAXON || '9606',
    maxAccessions: Number(process.env.ETL_MAX_ACCESSIONS || 5000),
  },

  attribution:
    'Data sources: ChEMBL (CC BY-SA 3.0, EMBL-EBI), Reactome (CC0), UniProt (CC BY 4.0), ' +
    'OpenTargets (Open Access), PubChem (Public Domain).',

  exportVersion: 1,

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;
