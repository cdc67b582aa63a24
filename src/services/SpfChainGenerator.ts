/**
 * SPF Chain Generator
 *
 * Builds a chain of TXT records under randomized subdomains. The apex
 * record includes link 1, each link includes the next, and the last link
 * carries the caller's final directive verbatim:
 *
 *   @          v=spf1 include:<label1>.example.com ~all
 *   <label1>   v=spf1 include:<label2>.example.com ~all
 *   <labelN>   <final directive>
 */
import { randomInt } from 'crypto';
import { GenerationExhaustedError, ValidationError, type FieldIssue } from '../core/errors.js';
import type { GeneratedChainRecord, SpfChainSpec } from '../types/index.js';
import { isHostname, normalizeHostname } from '../utils/dns.js';

/** Returns an integer in [0, max) */
export type RandomSource = (max: number) => number;

export interface SpfChainGeneratorOptions {
  labelLength?: number;
  maxAttemptsPerLabel?: number;
  random?: RandomSource;
}

export const LABEL_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
export const SINGLE_LINK_NAME = '_spf';
export const MIN_CHAIN_LENGTH = 1;
export const MAX_CHAIN_LENGTH = 10;
export const MIN_LABEL_LENGTH = 30;
export const MAX_LABEL_LENGTH = 63;

const DEFAULT_LABEL_LENGTH = 32;
const DEFAULT_MAX_ATTEMPTS_PER_LABEL = 100;

export const cryptoRandomSource: RandomSource = (max) => randomInt(max);

export function includeBody(label: string, domain: string): string {
  return `v=spf1 include:${label}.${domain} ~all`;
}

export function redirectBody(label: string, domain: string): string {
  return `v=spf1 redirect=${label}.${domain}`;
}

/**
 * Reject a spec that cannot produce a chain. Throws ValidationError.
 */
export function validateChainSpec(spec: SpfChainSpec, options: SpfChainGeneratorOptions = {}): void {
  const issues: FieldIssue[] = [];
  const labelLength = options.labelLength ?? DEFAULT_LABEL_LENGTH;
  const maxAttempts = options.maxAttemptsPerLabel ?? DEFAULT_MAX_ATTEMPTS_PER_LABEL;

  if (!isHostname(spec.domain)) {
    issues.push({ field: 'domain', message: `Invalid domain: ${spec.domain}` });
  }
  if (!Number.isInteger(spec.chainLength) || spec.chainLength < MIN_CHAIN_LENGTH || spec.chainLength > MAX_CHAIN_LENGTH) {
    issues.push({
      field: 'chainLength',
      message: `Chain length must be an integer between ${MIN_CHAIN_LENGTH} and ${MAX_CHAIN_LENGTH}, got ${spec.chainLength}`,
    });
  }
  if (spec.finalDirective.trim().length === 0) {
    issues.push({ field: 'finalDirective', message: 'Final directive is required' });
  }
  if (spec.ttl !== undefined && !(Number.isInteger(spec.ttl) && spec.ttl > 0)) {
    issues.push({ field: 'ttl', message: 'TTL must be a positive integer' });
  }
  if (!Number.isInteger(labelLength) || labelLength < MIN_LABEL_LENGTH || labelLength > MAX_LABEL_LENGTH) {
    issues.push({
      field: 'labelLength',
      message: `Label length must be between ${MIN_LABEL_LENGTH} and ${MAX_LABEL_LENGTH}`,
    });
  }
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    issues.push({ field: 'maxAttemptsPerLabel', message: 'Max attempts per label must be at least 1' });
  }

  if (issues.length > 0) {
    throw ValidationError.fromIssues('SPF chain spec', issues);
  }
}

function randomLabel(length: number, random: RandomSource): string {
  let label = '';
  for (let i = 0; i < length; i++) {
    label += LABEL_ALPHABET.charAt(random(LABEL_ALPHABET.length));
  }
  return label;
}

/**
 * Generate the chain records for `spec`.
 *
 * Labels never repeat within the chain and never match `existingNames`
 * (compared case-insensitively). Records come back in write order:
 * links 1..N, then the wildcard redirect when requested, then the apex.
 */
export function generateSpfChain(
  spec: SpfChainSpec,
  existingNames: Iterable<string>,
  options: SpfChainGeneratorOptions = {}
): GeneratedChainRecord[] {
  validateChainSpec(spec, options);

  const domain = normalizeHostname(spec.domain);
  const labelLength = options.labelLength ?? DEFAULT_LABEL_LENGTH;
  const maxAttempts = options.maxAttemptsPerLabel ?? DEFAULT_MAX_ATTEMPTS_PER_LABEL;
  const random = options.random ?? cryptoRandomSource;

  const taken = new Set<string>();
  for (const name of existingNames) {
    taken.add(name.toLowerCase());
  }

  const labels: string[] = [];
  if (spec.chainLength === 1) {
    if (taken.has(SINGLE_LINK_NAME)) {
      throw ValidationError.fromIssues('SPF chain spec', [
        { field: 'chainLength', message: `Name ${SINGLE_LINK_NAME} is already in use on ${domain}` },
      ]);
    }
    labels.push(SINGLE_LINK_NAME);
  } else {
    for (let position = 1; position <= spec.chainLength; position++) {
      let label: string | undefined;
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const candidate = randomLabel(labelLength, random);
        if (!taken.has(candidate)) {
          label = candidate;
          break;
        }
      }
      if (label === undefined) {
        throw new GenerationExhaustedError(maxAttempts, position);
      }
      taken.add(label);
      labels.push(label);
    }
  }

  const records = labels.map((label, index): GeneratedChainRecord => {
    const next = labels[index + 1];
    return {
      subdomainName: label,
      txtBody: next === undefined ? spec.finalDirective : includeBody(next, domain),
      role: 'link',
      position: index + 1,
    };
  });

  const [first] = labels;
  if (first === undefined) {
    return records;
  }

  if (spec.wildcardRedirect) {
    records.push({ subdomainName: '*', txtBody: redirectBody(first, domain), role: 'wildcard', position: 0 });
  }
  records.push({ subdomainName: '', txtBody: includeBody(first, domain), role: 'apex', position: 0 });

  return records;
}
