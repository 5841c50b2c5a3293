import { DocumentInput, RunOptions, RunSummary } from './types';
import { discoverDocuments } from './loader';
import { runValidation, resolveRuleSets } from './orchestrator';
import { DEFAULT_POLICY_FILE, loadPolicyConfig, parsePolicyConfig, PolicyConfig } from './policy/policy-config';
import { RuleInfo } from './rules/rule-registry';
import { displayResults, OutputFormat } from './report';

export interface CheckOptions extends RunOptions {
  // Policy file path, parsed config, or null for no policy rules. Defaults to the shipped minimum-required-values policy.
  policy?: string | PolicyConfig | null;
  extension?: string;
}

export class SpdxComplianceChecker {
  constructor(private readonly defaults: CheckOptions = {}) {}

  async resolvePolicy(policy: CheckOptions['policy'] = this.defaults.policy): Promise<PolicyConfig> {
    if (policy === null) return {};
    if (policy === undefined) return loadPolicyConfig(DEFAULT_POLICY_FILE);
    if (typeof policy === 'string') return loadPolicyConfig(policy);
    return parsePolicyConfig(policy);
  }

  // Validates a single SPDX JSON file or every file of a directory.
  async checkCompliance(target: string, options: CheckOptions = {}): Promise<RunSummary> {
    const merged = { ...this.defaults, ...options };
    const policy = await this.resolvePolicy(merged.policy);
    const documents = await discoverDocuments(target, { extension: merged.extension, verbose: merged.verbose });
    if (merged.verbose) console.log(`🔍 Validating ${documents.length} document(s) from ${target}`);
    return runValidation(documents, policy, merged);
  }

  async validateDocuments(documents: DocumentInput[], options: CheckOptions = {}): Promise<RunSummary> {
    const merged = { ...this.defaults, ...options };
    return runValidation(documents, await this.resolvePolicy(merged.policy), merged);
  }

  async listRules(options: CheckOptions = {}): Promise<RuleInfo[]> {
    const merged = { ...this.defaults, ...options };
    return resolveRuleSets(await this.resolvePolicy(merged.policy), merged).flatMap(r => r.list());
  }

  displayResults(summary: RunSummary, format: OutputFormat = 'table'): void {
    displayResults(summary, format);
  }
}

export * from './types';
export { LoadError, ConfigurationError } from './errors';
export { normalizeDocument } from './model/normalize';
export type { SpdxDocument, SpdxPackage, SpdxFile, SpdxSnippet, SpdxRelationship, ExtractedLicensingInfo } from './model/spdx-document';
export { buildReferenceIndex, ReferenceIndex } from './resolver/reference-index';
export type { ElementResolution, DuplicateIdentifier } from './resolver/reference-index';
export { RuleRegistry, RULE_ERROR_CODE } from './rules/rule-registry';
export type { Rule, AnyRule, RuleInfo, Finding } from './rules/rule-registry';
export { createSpecificationRuleSet, SPEC_RULES } from './rules/spec-rules';
export { createPolicyRuleSet, compilePolicyRules } from './policy/policy-rules';
export { parsePolicyConfig, loadPolicyConfig, PolicyConfigSchema, DEFAULT_POLICY_FILE } from './policy/policy-config';
export type { PolicyConfig, PolicyRequirement, PolicyCheck, PolicyGuard } from './policy/policy-config';
export { parseLicenseExpression, LicenseExpressionError } from './license/license-expression';
export { evaluateDocument } from './engine';
export { runValidation } from './orchestrator';
export { loadDocumentsFromDirectory, discoverDocuments } from './loader';
export { serializeRunSummary, renderConsoleReport, toCsvRows, formatCsv, writeCsvReports, writeJsonReport } from './report';
export type { OutputFormat, SerializedRunSummary } from './report';
