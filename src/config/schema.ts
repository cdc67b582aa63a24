/**
 * Zod schemas for configuration validation
 */
import { z } from 'zod';
import { DNS_RECORD_TYPES } from '../types/index.js';

// Log level schema
export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

// DNS record type schema
export const dnsRecordTypeSchema = z.enum(DNS_RECORD_TYPES);

// Base application config schema
export const appConfigSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  logPretty: z.boolean().default(true),
  backupDir: z.string().min(1).optional(),
  nameserverPollInterval: z.coerce.number().int().min(1000).default(300000),
});

// Registrar connection schema
export const registrarConfigSchema = z.object({
  apiKey: z.string().min(1),
  secretApiKey: z.string().min(1),
  apiUrl: z.string().url().default('https://api.porkbun.com/api/json/v3'),
  timeoutMs: z.coerce.number().int().min(1000).default(15000),
  retryAttempts: z.coerce.number().int().min(1).max(10).default(3),
  backoffBaseMs: z.coerce.number().int().min(0).default(500),
  // 0 disables the shared token bucket
  requestsPerSecond: z.coerce.number().min(0).default(2),
  burst: z.coerce.number().int().min(1).default(5),
});

// Bulk run schema
export const bulkConfigSchema = z.object({
  maxConcurrentDomains: z.coerce.number().int().min(1).max(50).default(5),
  defaultTtl: z.coerce.number().int().min(1).default(600),
  txtMaxLength: z.coerce.number().int().min(1).default(2048),
});

// SPF chain schema
export const spfConfigSchema = z.object({
  chainLength: z.coerce.number().int().min(1).max(10).default(4),
  finalDirective: z.string().min(1).optional(),
  anchorDomain: z.string().min(1).optional(),
  labelLength: z.coerce.number().int().min(30).max(63).default(32),
  maxAttemptsPerLabel: z.coerce.number().int().min(1).default(100),
});

// Bulk request schemas
export const dnsRecordInputSchema = z.object({
  name: z.string(),
  type: dnsRecordTypeSchema,
  content: z.string().min(1),
  ttl: z.number().int().min(1).optional(),
  priority: z.number().int().min(0).max(65535).optional(),
  notes: z.string().optional(),
});

export const dnsRecordSchema = dnsRecordInputSchema.extend({
  id: z.string().optional(),
  domain: z.string().min(1),
  ttl: z.number().int().min(1),
});

export const spfChainRequestSchema = z.object({
  kind: z.literal('spfChain'),
  chainLength: z.number().int().min(1).max(10),
  finalDirective: z.string().trim().min(1).optional(),
  wildcardRedirect: z.boolean().optional(),
  ttl: z.number().int().min(1).optional(),
});

export const templateRequestSchema = z.object({
  kind: z.literal('template'),
  records: z.array(dnsRecordInputSchema).min(1),
  replaceTypes: z.array(dnsRecordTypeSchema).optional(),
  pruneUnmatched: z.boolean().optional(),
});

export const bulkRequestSchema = z.discriminatedUnion('kind', [spfChainRequestSchema, templateRequestSchema]);

// Export types inferred from schemas
export type AppConfig = z.infer<typeof appConfigSchema>;
export type RegistrarConfig = z.infer<typeof registrarConfigSchema>;
export type BulkConfig = z.infer<typeof bulkConfigSchema>;
export type SpfConfig = z.infer<typeof spfConfigSchema>;
