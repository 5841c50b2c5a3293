#!/usr/bin/env node
// spdx-sbom-check <path> [options]
// Exit codes: 0 compliant, 1 violations or unreadable documents, 2 configuration or usage error.

import { SpdxComplianceChecker } from './index';
import { ConfigurationError, errorMessage } from './errors';
import { RuleSetSelection, Severity } from './types';
import { OutputFormat, writeCsvReports, writeJsonReport } from './report';
import { DEFAULT_JSON_REPORT } from './constants';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  target?: string;
  policy?: string | null; // null = --policy none
  ruleSets: RuleSetSelection;
  failOn?: Severity;
  maxParallel?: number;
  format: OutputFormat;
  jsonReport?: string;
  csvDir?: string;
  listRules: boolean;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: spdx-sbom-check <file-or-directory> [options]

Options:
  --policy <file|none>        policy file (YAML or JSON); "none" disables policy rules
  --rule-sets <set>           specification | policy | both (default both)
  --fail-on <severity>        error | warning (default warning)
  --max-parallel <n>          documents validated concurrently
  --format <format>           table | json | yaml (default table)
  --json-report [file]        write the JSON report (default ${DEFAULT_JSON_REPORT})
  --csv-dir <dir>             write <document>_exceptions.csv files for failing documents
  --list-rules                print the enabled rules and exit
  --verbose                   progress logging
  --help                      show this message`;

const FLAGS_WITH_VALUE = ['policy', 'rule-sets', 'fail-on', 'max-parallel', 'format', 'csv-dir'];

function oneOf<T extends string>(flag: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find(a => a === value);
  if (!match) throw new UsageError(`--${flag} must be one of ${allowed.join(', ')}, got "${value}"`);
  return match;
}

export function parseArgs(argv: string[]): CliArgs {
  const map = new Map<string, string>();
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      positional.push(token);
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (FLAGS_WITH_VALUE.includes(key)) {
      if (next === undefined || next.startsWith('--')) throw new UsageError(`--${key} requires a value`);
      map.set(key, next);
      i += 1;
    } else if (key === 'json-report') {
      if (next !== undefined && !next.startsWith('--') && next.toLowerCase().endsWith('.json')) {
        map.set(key, next);
        i += 1;
      } else {
        map.set(key, DEFAULT_JSON_REPORT);
      }
    } else if (['list-rules', 'verbose', 'help'].includes(key)) {
      map.set(key, 'true');
    } else {
      throw new UsageError(`Unknown option --${key}`);
    }
  }
  if (positional.length > 1) throw new UsageError(`Expected one path, got ${positional.length}`);

  const policy = map.get('policy');
  const maxParallelRaw = map.get('max-parallel');
  const maxParallel = maxParallelRaw === undefined ? undefined : parseInt(maxParallelRaw, 10);
  if (maxParallel !== undefined && (isNaN(maxParallel) || maxParallel < 1)) throw new UsageError('--max-parallel must be a positive integer');
  const failOn = map.get('fail-on');

  const args: CliArgs = {
    target: positional[0],
    policy: policy === undefined ? undefined : policy.toLowerCase() === 'none' ? null : policy,
    ruleSets: oneOf('rule-sets', map.get('rule-sets') || 'both', ['specification', 'policy', 'both'] as const),
    failOn: failOn === undefined ? undefined : oneOf('fail-on', failOn, ['error', 'warning'] as const),
    maxParallel,
    format: oneOf('format', map.get('format') || 'table', ['table', 'json', 'yaml'] as const),
    jsonReport: map.get('json-report'),
    csvDir: map.get('csv-dir'),
    listRules: map.has('list-rules'),
    verbose: map.has('verbose'),
    help: map.has('help')
  };
  if (!args.target && !args.listRules && !args.help) throw new UsageError('Missing path to an SPDX JSON file or directory');
  return args;
}

export async function main(argv = process.argv.slice(2)): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (e) {
    console.error(`❌ ${errorMessage(e)}\n\n${USAGE}`);
    return 2;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const checker = new SpdxComplianceChecker({
    policy: args.policy,
    ruleSets: args.ruleSets,
    failOn: args.failOn,
    maxParallel: args.maxParallel,
    verbose: args.verbose
  });
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    if (args.listRules) {
      for (const rule of await checker.listRules()) {
        console.log(`${rule.code}\t${rule.severity}\t${rule.target}\t${rule.name}`);
      }
      return 0;
    }
    if (!args.target) throw new UsageError('Missing path to an SPDX JSON file or directory');
    const summary = await checker.checkCompliance(args.target, { signal: controller.signal });
    checker.displayResults(summary, args.format);
    if (args.jsonReport) {
      await writeJsonReport(summary, args.jsonReport);
      if (args.verbose) console.log(`📝 JSON report written to ${args.jsonReport}`);
    }
    if (args.csvDir) {
      const files = await writeCsvReports(summary, args.csvDir);
      if (args.verbose) console.log(`📝 ${files.length} CSV file(s) written to ${args.csvDir}`);
    }
    return summary.exitCode;
  } catch (e) {
    if (e instanceof ConfigurationError || e instanceof UsageError) console.error(`❌ ${e.message}`);
    else console.error(`❌ Run aborted: ${errorMessage(e)}`);
    return 2;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(err => {
      console.error(`❌ ${errorMessage(err)}`);
      process.exitCode = 2;
    });
}
