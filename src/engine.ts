// Rule engine: evaluates one normalized document against the enabled rule sets.
// Entities are visited in appearance order; for each entity the rule sets run in
// the order given (specification before policy), each in registration order.

import { Violation } from './types';
import { SpdxDocument } from './model/spdx-document';
import { ReferenceIndex } from './resolver/reference-index';
import { RuleRegistry } from './rules/rule-registry';
import { describeJsonType } from './model/normalize';
import { joinPath } from './format';
import { RULE_CODE_PREFIX } from './constants';

export const ROOT_STRUCTURE_CODE = `${RULE_CODE_PREFIX}/structure/root`;

function violation(fields: Violation): Violation {
  return Object.freeze({ ...fields });
}

export function evaluateDocument(documentId: string, document: SpdxDocument, index: ReferenceIndex, ruleSets: RuleRegistry[]): Violation[] {
  // A non-object root has no entities to walk.
  if (!document.isObject) {
    const actual = document.malformed.length ? document.malformed[0].actual : describeJsonType(undefined);
    return [violation({ documentId, ruleCode: ROOT_STRUCTURE_CODE, severity: 'error', entitySpdxId: '', fieldPath: '', message: `SPDX document must be a JSON object, found ${actual}` })];
  }
  const violations: Violation[] = [];
  const context = { document, index };
  for (const target of index.targets) {
    for (const ruleSet of ruleSets) {
      for (const hit of ruleSet.evaluate(target, context)) {
        violations.push(
          violation({
            documentId,
            ruleCode: hit.ruleCode,
            severity: hit.severity,
            entitySpdxId: target.spdxId,
            fieldPath: joinPath(target.location, hit.field),
            message: hit.message
          })
        );
      }
    }
  }
  return violations;
}
