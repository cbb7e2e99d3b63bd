#!/usr/bin/env node
import { loadConfig } from './config';
import { bootstrap } from './index';
import { ScanService, createScanDependencies } from './services/scan.service';
import { NAMESPACES } from './types/domain';
import { isIsoDate } from './utils/date';
import { loadEnv } from './utils/env';
import { Logger, logger } from './utils/logger';

export type CliFlags = Record<string, string | boolean>;

export function parseFlags(argv: string[]): CliFlags {
  const flags: CliFlags = {};
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (next && !next.startsWith('--')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = true;
    }
  }
  return flags;
}

function printHelp(): void {
  console.log('Usage: drop-scanner [options]');
  console.log('');
  console.log('  --date YYYY-MM-DD  Scan domains releasing on this date (default: tomorrow, UTC)');
  console.log('  --dry-run          Print the summary without writing reports');
  console.log('  --test-fetch       Only fetch the drop lists and print their sizes');
  console.log('  --serve            Start the HTTP API instead of scanning');
  console.log('  --help             Show this message');
}

export async function runCli(argv: string[]): Promise<number> {
  const flags = parseFlags(argv);
  if (flags.help) {
    printHelp();
    return 0;
  }

  if (flags.serve) {
    await bootstrap();
    return 0;
  }

  loadEnv();
  const config = loadConfig();
  Logger.setLevel(config.logLevel);
  const deps = createScanDependencies(config);

  if (flags['test-fetch']) {
    for (const namespace of NAMESPACES) {
      const records = await deps.dropLists.fetch(namespace);
      console.log(`  .${namespace}: ${records.length} domains in drop list`);
    }
    return 0;
  }

  const date = typeof flags.date === 'string' ? flags.date : undefined;
  if (flags.date !== undefined && (date === undefined || !isIsoDate(date))) {
    console.error('--date expects a calendar date as YYYY-MM-DD');
    return 2;
  }

  const result = await new ScanService(deps).run({
    targetDate: date,
    dryRun: flags['dry-run'] === true,
  });

  console.log('');
  console.log(result.summary);
  if (result.paths) {
    console.log('');
    console.log(`CSV:  ${result.paths.csvPath}`);
    console.log(`JSON: ${result.paths.jsonPath}`);
  }
  return 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      if (code !== 0) process.exitCode = code;
    })
    .catch((error) => {
      logger.error('Scan failed', { error });
      process.exit(1);
    });
}
