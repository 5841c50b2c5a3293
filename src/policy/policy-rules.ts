// Compiles a validated policy configuration into the `policy` rule set.
// Policy rules are warnings; they never look at SPDX semantics, only at the
// configured field paths of the typed model.

import { EntityKind } from '../types';
import { ModelNode } from '../model/spdx-document';
import { isJsonObject } from '../model/normalize';
import { ENTITY_TYPE_NAMES } from '../model/entities';
import { isPlaceholder } from '../constants';
import { isBlank } from '../rules/rule-helpers';
import { AnyRule, Rule, RuleRegistry } from '../rules/rule-registry';
import { PolicyCheck, PolicyConfig, PolicyGuard, PolicyRequirement } from './policy-config';

export const PRIMARY_PACKAGE_CODE = 'POLICY/Document/primaryPackageFirst';

const MODEL_KEYS = ['location', 'extras', 'malformed', 'isObject'];

// Reads a dotted field path off a model node. Keys the model does not know are
// looked up in `extras` at each level.
export function readFieldPath(node: ModelNode, fieldPath: string): unknown {
  let current: unknown = node;
  for (const segment of fieldPath.split('.')) {
    if (!isJsonObject(current)) return undefined;
    let next = MODEL_KEYS.includes(segment) ? undefined : current[segment];
    const extras = current.extras;
    if (next === undefined && isJsonObject(extras)) next = extras[segment];
    current = next;
  }
  return current === null ? undefined : current;
}

function containsPlaceholder(value: unknown): boolean {
  if (typeof value === 'string') return isPlaceholder(value);
  if (Array.isArray(value)) return value.some(v => typeof v === 'string' && isPlaceholder(v));
  return false;
}

export function checkName(check: PolicyCheck): 'required' | 'nonPlaceholder' | 'oneOf' {
  return typeof check === 'string' ? check : 'oneOf';
}

export function passesCheck(check: PolicyCheck, value: unknown): boolean {
  if (check === 'required') return !isBlank(value);
  if (check === 'nonPlaceholder') return !isBlank(value) && !containsPlaceholder(value);
  if (value === undefined) return true;
  const values: unknown[] = Array.isArray(value) ? value : [value];
  return values.every(v => check.oneOf.some(allowed => allowed === v));
}

function describeFailure(entityType: string, requirement: PolicyRequirement, value: unknown): string {
  const subject = `${entityType} ${requirement.fieldPath}`;
  const check = requirement.check;
  if (check === 'required' || isBlank(value)) return `${subject} is required`;
  if (check === 'nonPlaceholder') return `${subject} must not be NOASSERTION or NONE, found ${JSON.stringify(value)}`;
  return `${subject} must be one of ${check.oneOf.map(v => JSON.stringify(v)).join(', ')}, found ${JSON.stringify(value)}`;
}

export function policyRuleCode(entityType: string, requirement: PolicyRequirement): string {
  return requirement.code || `POLICY/${entityType}/${requirement.fieldPath}/${checkName(requirement.check)}`;
}

function guardsOf(requirement: PolicyRequirement): PolicyGuard[] {
  const when = requirement.when;
  if (!when) return [];
  return Array.isArray(when) ? when : [when];
}

function policyRule<K extends EntityKind>(kind: K, requirement: PolicyRequirement): Rule<K> {
  const entityType = ENTITY_TYPE_NAMES[kind];
  const guards = guardsOf(requirement);
  const condition = guards.map(g => `${g.fieldPath} passes ${checkName(g.check)}`).join(' or ');
  return {
    code: policyRuleCode(entityType, requirement),
    name: `${entityType} ${requirement.fieldPath} ${checkName(requirement.check)}`,
    description: condition
      ? `${entityType} ${requirement.fieldPath} must pass ${checkName(requirement.check)} when ${condition}`
      : `${entityType} ${requirement.fieldPath} must pass ${checkName(requirement.check)}`,
    target: kind,
    severity: 'warning',
    evaluate: ({ entity }) => {
      if (guards.length && !guards.some(g => passesCheck(g.check, readFieldPath(entity, g.fieldPath)))) return [];
      const value = readFieldPath(entity, requirement.fieldPath);
      if (passesCheck(requirement.check, value)) return [];
      return [{ field: requirement.fieldPath, message: requirement.message || describeFailure(entityType, requirement, value) }];
    }
  };
}

// Needs exactly one described element; describes cardinality is a specification rule.
const primaryPackageRule: Rule<'document'> = {
  code: PRIMARY_PACKAGE_CODE,
  name: 'Primary package first',
  description: 'The package the document describes must be the first entry of packages',
  target: 'document',
  severity: 'warning',
  evaluate: ({ entity }, { index }) => {
    const described = index.describedElementIds();
    const [first] = entity.packages;
    if (described.length !== 1 || !first || !first.SPDXID) return [];
    if (described[0] === first.SPDXID) return [];
    return [
      {
        field: 'packages',
        message: `The document describes ${described[0]}, but the first package is ${first.SPDXID}. Either the DESCRIBES relationship is incorrect or the top-level package is not first in packages.`
      }
    ];
  }
};

export function compilePolicyRules(config: PolicyConfig): AnyRule[] {
  const rules: AnyRule[] = [];
  if (config.primaryPackageFirst) rules.push(primaryPackageRule);
  (config.Document || []).forEach(r => rules.push(policyRule('document', r)));
  (config.Package || []).forEach(r => rules.push(policyRule('package', r)));
  (config.File || []).forEach(r => rules.push(policyRule('file', r)));
  (config.Snippet || []).forEach(r => rules.push(policyRule('snippet', r)));
  (config.ExtractedLicensingInfo || []).forEach(r => rules.push(policyRule('extractedLicensingInfo', r)));
  (config.Relationship || []).forEach(r => rules.push(policyRule('relationship', r)));
  return rules;
}

export function createPolicyRuleSet(config: PolicyConfig): RuleRegistry {
  return new RuleRegistry('policy', compilePolicyRules(config));
}
