// Rule factories reused across entity kinds.

import { EntityKind } from '../types';
import { EntityByKind } from '../model/entities';
import { Checksum, ModelNode } from '../model/spdx-document';
import { CHECKSUM_ALGORITHMS, NOASSERTION, NONE, RULE_CODE_PREFIX } from '../constants';
import { parseLicenseExpression, collectLicenseTerms, LicenseExpressionError, LicenseTerms } from '../license/license-expression';
import { lookupExceptionId, lookupLicenseId } from '../license/license-list';
import { describeLocation, quote } from '../format';
import { Finding, Rule, RuleContext } from './rule-registry';

export const ENTITY_LABELS: Record<EntityKind, string> = {
  document: 'Document',
  package: 'Package',
  file: 'File',
  snippet: 'Snippet',
  extractedLicensingInfo: 'Extracted licensing info',
  relationship: 'Relationship'
};

export function specCode(clause: string, aspect: string): string {
  return `${RULE_CODE_PREFIX}/${clause}/${aspect}`;
}

// True when `field` (or something beneath it) was dropped during normalization.
export function isMalformed(node: ModelNode, field: string): boolean {
  return node.malformed.some(m => m.field === field || m.field.startsWith(field + '.') || m.field.startsWith(field + '['));
}

export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

export function isAbsoluteUri(value: string): boolean {
  if (!/^[A-Za-z][A-Za-z0-9+.-]*:/.test(value) || /\s/.test(value)) return false;
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

export function structureRule<K extends EntityKind>(kind: K): Rule<K> {
  return {
    code: specCode('structure', 'type'),
    name: `${ENTITY_LABELS[kind]} field types`,
    description: 'Fields must carry the JSON type defined by the SPDX 2.3 JSON schema',
    target: kind,
    severity: 'error',
    evaluate: ({ entity }) => entity.malformed.map(m => ({ field: m.field, message: `${m.field} must be ${m.expected}, found ${m.actual}` }))
  };
}

export function duplicateRule<K extends EntityKind>(kind: K): Rule<K> {
  return {
    code: specCode('id', 'duplicate'),
    name: `${ENTITY_LABELS[kind]} identifier uniqueness`,
    description: 'SPDX identifiers, license ids and external document ids must be unique within a document',
    target: kind,
    severity: 'error',
    evaluate: ({ location }, { index }) =>
      index.duplicatesAt(location).map(d => ({ field: d.field, message: `${d.id} is already declared at ${describeLocation(d.firstLocation)}` }))
  };
}

export function requiredRule<K extends EntityKind>(kind: K, clause: string, field: string, read: (entity: EntityByKind[K]) => unknown): Rule<K> {
  return {
    code: specCode(clause, 'required'),
    name: `${ENTITY_LABELS[kind]} ${field}`,
    description: `${ENTITY_LABELS[kind]} must have a ${field} (clause ${clause})`,
    target: kind,
    severity: 'error',
    evaluate: ({ entity }) => {
      if (isMalformed(entity, field) || !isBlank(read(entity))) return [];
      return [{ field, message: `${ENTITY_LABELS[kind]} is missing mandatory field ${field}` }];
    }
  };
}

// Checks a present string value against a predicate.
export function formatRule<K extends EntityKind>(
  kind: K,
  code: string,
  field: string,
  read: (entity: EntityByKind[K]) => string | undefined,
  accepts: (value: string) => boolean,
  expectation: string
): Rule<K> {
  return {
    code,
    name: `${ENTITY_LABELS[kind]} ${field} format`,
    description: `${field} must be ${expectation}`,
    target: kind,
    severity: 'error',
    evaluate: ({ entity }) => {
      const value = read(entity);
      if (value === undefined || value.trim() === '' || accepts(value)) return [];
      return [{ field, message: `${field} must be ${expectation}, found ${quote(value)}` }];
    }
  };
}

// Placeholder-or-predicate helper for NONE / NOASSERTION capable fields.
export function orPlaceholder(accepts: (value: string) => boolean, ...placeholders: string[]): (value: string) => boolean {
  return value => placeholders.includes(value) || accepts(value);
}
export const ANY_PLACEHOLDER = [NONE, NOASSERTION];

export function checksumFindings(checksums: Checksum[] | undefined, field: string, check: 'algorithm' | 'format'): Finding[] {
  const findings: Finding[] = [];
  (checksums || []).forEach((checksum, i) => {
    const at = `${field}[${i}]`;
    const spec = checksum.algorithm ? CHECKSUM_ALGORITHMS.get(checksum.algorithm) : undefined;
    if (check === 'algorithm') {
      if (!checksum.algorithm) findings.push({ field: `${at}.algorithm`, message: 'Checksum is missing its algorithm' });
      else if (!spec) findings.push({ field: `${at}.algorithm`, message: `Unknown checksum algorithm ${quote(checksum.algorithm)}` });
      return;
    }
    const value = checksum.checksumValue;
    if (!value) {
      findings.push({ field: `${at}.checksumValue`, message: 'Checksum is missing its checksumValue' });
      return;
    }
    if (!spec) return;
    if (!/^[0-9a-f]+$/.test(value) || value.length < spec.minHexLength || value.length > spec.maxHexLength) {
      const length = spec.minHexLength === spec.maxHexLength ? `${spec.minHexLength}` : `${spec.minHexLength}-${spec.maxHexLength}`;
      findings.push({ field: `${at}.checksumValue`, message: `${spec.algorithm} checksum must be ${length} lowercase hexadecimal characters` });
    }
  });
  return findings;
}

export function checksumRules<K extends EntityKind>(kind: K, clause: string, read: (entity: EntityByKind[K]) => Checksum[] | undefined): Rule<K>[] {
  return (['algorithm', 'format'] as const).map((check): Rule<K> => ({
    code: specCode(clause, check),
    name: `${ENTITY_LABELS[kind]} checksum ${check}`,
    description: check === 'algorithm' ? 'Checksum algorithms must be one of the SPDX 2.3 algorithms' : 'Checksum values must be lowercase hex of the algorithm length',
    target: kind,
    severity: 'error',
    evaluate: ({ entity }) => checksumFindings(read(entity), 'checksums', check)
  }));
}

export interface LicenseField {
  field: string;
  value: string;
}

// Fields holding license expressions; placeholders are not parsed.
export function licenseFields(fields: Array<[string, string | string[] | undefined]>): LicenseField[] {
  const out: LicenseField[] = [];
  for (const [field, value] of fields) {
    if (typeof value === 'string') out.push({ field, value });
    else if (value) value.forEach((v, i) => out.push({ field: `${field}[${i}]`, value: v }));
  }
  return out.filter(f => f.value.trim() !== '' && !ANY_PLACEHOLDER.includes(f.value.trim()));
}

function parsedTerms(field: LicenseField): LicenseTerms | LicenseExpressionError {
  try {
    return collectLicenseTerms(parseLicenseExpression(field.value));
  } catch (e) {
    if (e instanceof LicenseExpressionError) return e;
    throw e;
  }
}

export function licenseRules<K extends EntityKind>(kind: K, read: (entity: EntityByKind[K]) => LicenseField[]): Rule<K>[] {
  const base = { target: kind, severity: 'error' as const };
  const eachParsed = (entity: EntityByKind[K], visit: (field: string, terms: LicenseTerms) => Finding[]): Finding[] =>
    read(entity).flatMap(f => {
      const terms = parsedTerms(f);
      return terms instanceof LicenseExpressionError ? [] : visit(f.field, terms);
    });
  return [
    {
      ...base,
      code: specCode('annex-D', 'syntax'),
      name: `${ENTITY_LABELS[kind]} license expression syntax`,
      description: 'License fields must hold valid SPDX license expressions',
      evaluate: ({ entity }) =>
        read(entity).flatMap(f => {
          const terms = parsedTerms(f);
          if (!(terms instanceof LicenseExpressionError)) return [];
          return [{ field: f.field, message: `Invalid license expression ${quote(f.value)}: ${terms.message} at position ${terms.position}` }];
        })
    },
    {
      ...base,
      code: specCode('annex-D', 'unknown-identifier'),
      name: `${ENTITY_LABELS[kind]} license list identifiers`,
      description: 'License and exception identifiers must be on the SPDX License List',
      evaluate: ({ entity }) =>
        eachParsed(entity, (field, terms) => [
          ...terms.licenses.filter(l => !lookupLicenseId(l.id)).map(l => ({ field, message: `Unknown license identifier ${quote(l.id)}` })),
          ...terms.exceptions.filter(x => !lookupExceptionId(x)).map(x => ({ field, message: `Unknown license exception ${quote(x)}` }))
        ])
    },
    {
      ...base,
      code: specCode('10.1', 'unresolved-license-ref'),
      name: `${ENTITY_LABELS[kind]} license references`,
      description: 'LicenseRef- identifiers must match an extracted licensing info or a declared external document',
      evaluate: ({ entity }, { index }: RuleContext) =>
        eachParsed(entity, (field, terms) =>
          terms.licenseRefs.flatMap(ref => {
            if (ref.documentRef) {
              return index.resolveExternalDocument(ref.documentRef)
                ? []
                : [{ field, message: `${ref.documentRef}:${ref.licenseRef} refers to an undeclared external document ${ref.documentRef}` }];
            }
            return index.resolveLicenseRef(ref.licenseRef) ? [] : [{ field, message: `${ref.licenseRef} has no matching hasExtractedLicensingInfos entry` }];
          })
        )
    }
  ];
}
