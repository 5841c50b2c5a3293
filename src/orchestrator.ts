// Run orchestration: validates a batch of documents with bounded parallelism,
// cooperative cancellation between documents and a submission-ordered merge.

import { DocumentInput, DocumentStage, RunOptions, RunSummary, Severity, ValidationReport, Violation } from './types';
import { normalizeDocument } from './model/normalize';
import { buildReferenceIndex } from './resolver/reference-index';
import { evaluateDocument } from './engine';
import { RuleRegistry } from './rules/rule-registry';
import { createSpecificationRuleSet } from './rules/spec-rules';
import { createPolicyRuleSet } from './policy/policy-rules';
import { parsePolicyConfig, PolicyConfig } from './policy/policy-config';
import { DEFAULT_FAIL_ON, DEFAULT_MAX_PARALLEL, SEVERITY_RANK } from './constants';
import { errorMessage } from './errors';

export function resolveRuleSets(policyConfig: PolicyConfig, options: RunOptions = {}): RuleRegistry[] {
  const selection = options.ruleSets || 'both';
  const ruleSets: RuleRegistry[] = [];
  if (selection !== 'policy') ruleSets.push(createSpecificationRuleSet());
  if (selection !== 'specification') ruleSets.push(createPolicyRuleSet(policyConfig));
  return ruleSets.map(r => r.filter(options.rules));
}

async function validateOne(input: DocumentInput, ruleSets: RuleRegistry[], options: RunOptions): Promise<ValidationReport> {
  const stage = (s: DocumentStage) => options.onStage?.(input.documentId, s);
  let raw: unknown;
  try {
    raw = 'content' in input ? input.content : await input.load();
  } catch (e) {
    if (options.verbose) console.warn(`⚠️  ${input.documentId}: ${errorMessage(e)}`);
    stage('reported');
    return { documentId: input.documentId, status: 'unreadable', violations: [], error: errorMessage(e) };
  }
  stage('loaded');
  let violations: Violation[];
  try {
    const document = normalizeDocument(raw);
    const index = buildReferenceIndex(document);
    stage('resolved');
    violations = evaluateDocument(input.documentId, document, index, ruleSets);
    stage('evaluated');
  } catch (e) {
    console.warn(`⚠️  ${input.documentId}: validation pipeline failed: ${errorMessage(e)}`);
    stage('reported');
    return { documentId: input.documentId, status: 'unreadable', violations: [], error: `Validation pipeline failed: ${errorMessage(e)}` };
  }
  const report: ValidationReport = { documentId: input.documentId, status: violations.length ? 'fail' : 'pass', violations };
  if (options.verbose) console.log(`📊 ${input.documentId}: ${violations.length} violation(s)`);
  stage('reported');
  return report;
}

export function summarize(reports: ValidationReport[], failOn: Severity, cancelled: boolean): RunSummary {
  const all: Violation[] = reports.flatMap(r => r.violations);
  const count = (status: ValidationReport['status']) => reports.filter(r => r.status === status).length;
  const totals = {
    documents: reports.length,
    passed: count('pass'),
    failed: count('fail'),
    unreadable: count('unreadable'),
    skipped: count('skipped'),
    errors: all.filter(v => v.severity === 'error').length,
    warnings: all.filter(v => v.severity === 'warning').length
  };
  const threshold = SEVERITY_RANK[failOn];
  const failing = totals.unreadable > 0 || totals.skipped > 0 || all.some(v => SEVERITY_RANK[v.severity] >= threshold);
  return {
    status: totals.passed === reports.length ? 'pass' : 'fail',
    exitCode: failing ? 1 : 0,
    cancelled,
    documents: reports,
    totals
  };
}

// Validates every document; throws ConfigurationError before touching any document
// when the policy configuration is malformed.
export async function runValidation(documents: DocumentInput[], policyConfig: unknown, options: RunOptions = {}): Promise<RunSummary> {
  const config = parsePolicyConfig(policyConfig);
  const ruleSets = resolveRuleSets(config, options);
  const maxParallel = options.maxParallel && options.maxParallel > 0 ? options.maxParallel : DEFAULT_MAX_PARALLEL;
  const reports: Array<ValidationReport | undefined> = new Array(documents.length).fill(undefined);
  const queue = documents.map((input, index) => ({ input, index }));
  const running: Promise<void>[] = [];
  let cancelled = false;

  while (queue.length || running.length) {
    while (queue.length && running.length < maxParallel) {
      if (options.signal?.aborted) {
        cancelled = true;
        break;
      }
      const next = queue.shift();
      if (!next) break;
      const p: Promise<void> = validateOne(next.input, ruleSets, options)
        .then(report => {
          reports[next.index] = report;
        })
        .finally(() => {
          const idx = running.indexOf(p);
          if (idx >= 0) running.splice(idx, 1);
        });
      running.push(p);
    }
    if (cancelled && !running.length) break;
    if (running.length) await Promise.race(running);
  }

  if (cancelled && options.verbose) console.warn(`⚠️  Validation cancelled, ${queue.length} document(s) skipped`);
  const merged = reports.map(
    (report, i): ValidationReport => report || { documentId: documents[i].documentId, status: 'skipped', violations: [] }
  );
  return summarize(merged, options.failOn || DEFAULT_FAIL_ON, cancelled);
}
