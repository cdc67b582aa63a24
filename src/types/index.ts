/**
 * Core type definitions
 */

// DNS Record Types
export const DNS_RECORD_TYPES = [
  'A',
  'AAAA',
  'CNAME',
  'MX',
  'TXT',
  'NS',
  'SRV',
  'TLSA',
  'CAA',
  'HTTPS',
  'SVCB',
] as const;

export type DnsRecordType = (typeof DNS_RECORD_TYPES)[number];

/**
 * A record as it exists at the registrar.
 * `name` is relative to the domain: '' is the apex, '*' the wildcard.
 */
export interface DnsRecord {
  id?: string;
  domain: string;
  name: string;
  type: DnsRecordType;
  content: string;
  ttl: number;
  /** MX and SRV only */
  priority?: number;
  notes?: string;
}

export interface DnsRecordInput {
  name: string;
  type: DnsRecordType;
  content: string;
  ttl?: number;
  priority?: number;
  notes?: string;
}

export interface Domain {
  name: string;
  status?: string;
  expiresAt?: string;
  nameservers?: string[];
}

// SPF chain types
export interface SpfChainSpec {
  domain: string;
  /** 1–10 */
  chainLength: number;
  /** Body of the terminal link, written verbatim */
  finalDirective: string;
  /** Adds a `*` TXT record redirecting every subdomain into the chain */
  wildcardRedirect?: boolean;
  ttl?: number;
}

export type ChainRecordRole = 'link' | 'wildcard' | 'apex';

export interface GeneratedChainRecord {
  subdomainName: string;
  txtBody: string;
  role: ChainRecordRole;
  /** 1-based position for links, 0 for the wildcard and apex records */
  position: number;
}

// Bulk request types
export interface SpfChainRequest {
  kind: 'spfChain';
  chainLength: number;
  finalDirective?: string;
  wildcardRedirect?: boolean;
  ttl?: number;
}

export interface TemplateRequest {
  kind: 'template';
  records: DnsRecordInput[];
  /** Every existing record of these types is deleted before writing */
  replaceTypes?: DnsRecordType[];
  /** Delete existing records at a templated name/type that no desired record matched */
  pruneUnmatched?: boolean;
}

export type BulkRequest = SpfChainRequest | TemplateRequest;

export interface ReconciliationPlan {
  toDelete: DnsRecord[];
  toUpdate?: Array<{ existing: DnsRecord; desired: DnsRecordInput }>;
  toCreate: DnsRecordInput[];
  /**
   * The last N creates reference the ones before them (SPF wildcard and
   * apex records). They are skipped once any earlier create has failed.
   */
  dependentCreates?: number;
}

// Outcome types
export type DomainStatus = 'success' | 'partialFailure' | 'failure' | 'cancelled';

export type RecordOperation = 'list' | 'backup' | 'generate' | 'delete' | 'update' | 'create';

export interface RecordFailure {
  operation: RecordOperation;
  record?: DnsRecord | DnsRecordInput;
  code: string;
  message: string;
}

export interface DomainOutcome {
  domain: string;
  status: DomainStatus;
  recordsDeleted: number;
  recordsCreated: number;
  recordsUpdated: number;
  deleted: DnsRecord[];
  created: DnsRecord[];
  updated: DnsRecord[];
  failures: RecordFailure[];
  errorDetail?: string;
  chain?: GeneratedChainRecord[];
  backupPath?: string;
}

export interface BatchSummary {
  total: number;
  success: number;
  partialFailure: number;
  failure: number;
  cancelled: number;
}

export interface BatchResult {
  batchId: string;
  startedAt: Date;
  finishedAt: Date;
  status: DomainStatus;
  summary: BatchSummary;
  outcomes: DomainOutcome[];
}

// Export types
export type ExportFormat = 'json' | 'csv' | 'zone';
