#!/usr/bin/env node
/**
 * Bulk DNS Manager - Entry Point
 *
 * Replaces the SPF records of the named domains (or every registrar
 * domain with --all) with a freshly generated include chain.
 *
 *   bulk-dns-manager example.com example.org --chain-length 4
 *   bulk-dns-manager --all --wildcard --final-directive "v=spf1 include:_spf.mail.example ~all"
 */
import { parseArgs } from 'util';
import { createApplication, logger, symbols, RegistrarError } from './core/index.js';
import { domainsToRetry } from './services/BulkOrchestrator.js';

function parseCommandLine(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      all: { type: 'boolean', default: false },
      'chain-length': { type: 'string' },
      'final-directive': { type: 'string' },
      wildcard: { type: 'boolean', default: false },
      ttl: { type: 'string' },
    },
  });

  const toInt = (value: string | undefined): number | undefined => (value === undefined ? undefined : Number(value));

  return {
    domains: positionals,
    all: values.all ?? false,
    chainLength: toInt(values['chain-length']),
    finalDirective: values['final-directive'],
    wildcardRedirect: values.wildcard ?? false,
    ttl: toInt(values.ttl),
  };
}

async function main(): Promise<void> {
  const args = parseCommandLine(process.argv.slice(2));
  const app = createApplication();
  app.setupShutdownHandlers();

  await app.start();
  const domains = await app.resolveDomains(args.domains, args.all);

  const result = await app.runSpfChain(domains, {
    chainLength: args.chainLength,
    finalDirective: args.finalDirective,
    wildcardRedirect: args.wildcardRedirect,
    ttl: args.ttl,
  });

  for (const outcome of result.outcomes) {
    const symbol = outcome.status === 'success' ? symbols.success : symbols.error;
    logger.info(
      {
        domain: outcome.domain,
        status: outcome.status,
        deleted: outcome.recordsDeleted,
        created: outcome.recordsCreated,
      },
      `${symbol} ${outcome.errorDetail ?? 'SPF chain written'}`
    );
  }

  const retry = domainsToRetry(result);
  if (retry.length > 0) {
    logger.warn({ count: retry.length, domains: retry }, 'Some domains did not complete');
    process.exitCode = 1;
  }
  await app.shutdown('finished');
}

main().catch((error: unknown) => {
  if (error instanceof RegistrarError) {
    logger.fatal({ code: error.code }, error.message);
  } else {
    logger.fatal({ error }, 'Bulk DNS manager failed');
  }
  process.exitCode = 1;
});
