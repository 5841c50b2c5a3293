// Rule registry shared by the specification and policy rule sets.
// A rule targets one entity kind and returns findings; the registry runs every
// rule registered for a target's kind in registration order and turns a crashing
// rule into a single internal finding instead of aborting the document.

import { EntityKind, RuleFilters, Severity } from '../types';
import { TargetOf, EntityTarget } from '../model/entities';
import { SpdxDocument } from '../model/spdx-document';
import { ReferenceIndex } from '../resolver/reference-index';
import { errorMessage } from '../errors';
import { RULE_CODE_PREFIX } from '../constants';

export const RULE_ERROR_CODE = `${RULE_CODE_PREFIX}/internal/rule-error`;

export interface RuleContext {
  document: SpdxDocument;
  index: ReferenceIndex;
}

export interface Finding {
  field: string; // relative to the target's location ('' = the entity itself)
  message: string;
}

export interface Rule<K extends EntityKind> {
  code: string; // stable code, e.g. SPDX-2.3/6.2/value or POLICY/Package/supplier/nonPlaceholder
  name: string;
  description: string;
  target: K;
  severity: Severity;
  evaluate: (target: TargetOf<K>, context: RuleContext) => Finding[];
}

export type AnyRule = { [K in EntityKind]: Rule<K> }[EntityKind];

export interface RuleHit {
  ruleCode: string;
  severity: Severity;
  field: string;
  message: string;
}

export interface RuleInfo {
  code: string;
  name: string;
  description: string;
  target: EntityKind;
  severity: Severity;
  ruleSet: string;
}

function runRules<K extends EntityKind>(rules: Rule<K>[], target: TargetOf<K>, context: RuleContext): RuleHit[] {
  const hits: RuleHit[] = [];
  for (const rule of rules) {
    try {
      for (const finding of rule.evaluate(target, context)) {
        hits.push({ ruleCode: rule.code, severity: rule.severity, field: finding.field, message: finding.message });
      }
    } catch (e) {
      hits.push({ ruleCode: RULE_ERROR_CODE, severity: 'error', field: '', message: `Rule ${rule.code} failed: ${errorMessage(e)}` });
    }
  }
  return hits;
}

function matchesPrefix(code: string, prefixes: string[]) {
  return prefixes.some(p => code === p || code.startsWith(p.endsWith('/') ? p : p + '/'));
}

export class RuleRegistry {
  private readonly byKind: { [K in EntityKind]: Rule<K>[] } = {
    document: [],
    package: [],
    file: [],
    snippet: [],
    extractedLicensingInfo: [],
    relationship: []
  };
  private readonly ordered: AnyRule[] = [];

  constructor(readonly name: string, rules: AnyRule[] = []) {
    rules.forEach(rule => this.register(rule));
  }

  register(rule: AnyRule): this {
    switch (rule.target) {
      case 'document': this.byKind.document.push(rule); break;
      case 'package': this.byKind.package.push(rule); break;
      case 'file': this.byKind.file.push(rule); break;
      case 'snippet': this.byKind.snippet.push(rule); break;
      case 'extractedLicensingInfo': this.byKind.extractedLicensingInfo.push(rule); break;
      case 'relationship': this.byKind.relationship.push(rule); break;
    }
    this.ordered.push(rule);
    return this;
  }

  get size(): number {
    return this.ordered.length;
  }

  list(): RuleInfo[] {
    return this.ordered.map(r => ({ code: r.code, name: r.name, description: r.description, target: r.target, severity: r.severity, ruleSet: this.name }));
  }

  // Include / exclude by rule code or code prefix (exclude wins).
  filter(filters?: RuleFilters): RuleRegistry {
    if (!filters || (!filters.include?.length && !filters.exclude?.length)) return this;
    const include = filters.include || [];
    const exclude = filters.exclude || [];
    const kept = this.ordered.filter(r => (!include.length || matchesPrefix(r.code, include)) && !matchesPrefix(r.code, exclude));
    return new RuleRegistry(this.name, kept);
  }

  evaluate(target: EntityTarget, context: RuleContext): RuleHit[] {
    switch (target.kind) {
      case 'document': return runRules(this.byKind.document, target, context);
      case 'package': return runRules(this.byKind.package, target, context);
      case 'file': return runRules(this.byKind.file, target, context);
      case 'snippet': return runRules(this.byKind.snippet, target, context);
      case 'extractedLicensingInfo': return runRules(this.byKind.extractedLicensingInfo, target, context);
      case 'relationship': return runRules(this.byKind.relationship, target, context);
    }
  }
}
