// SPDX 2.3 specification rule set. Every rule is severity `error` and carries a
// code of the form SPDX-2.3/<clause>/<aspect>. Rules run per entity, in the
// order listed here, after the document has been normalized and indexed.

import {
  ACTOR_PATTERN,
  CREATOR_PATTERN,
  DATA_LICENSE,
  DOCUMENT_REF_PATTERN,
  DOCUMENT_SPDX_ID,
  DOWNLOAD_LOCATION_PATTERN,
  canonicalRefCategory,
  EXTERNAL_REF_CATEGORIES,
  EXTERNAL_REF_TYPES,
  FILE_TYPES,
  LICENSE_LIST_VERSION_PATTERN,
  LICENSE_REF_PATTERN,
  NOASSERTION,
  PRIMARY_PACKAGE_PURPOSES,
  RELATIONSHIP_TYPES,
  SPDX_ID_PATTERN,
  SUPPORTED_SPDX_VERSIONS,
  TIMESTAMP_PATTERN,
  VERIFICATION_CODE_PATTERN
} from '../constants';
import { SnippetPointer } from '../model/spdx-document';
import { EntityByKind } from '../model/entities';
import { missingList, quote } from '../format';
import { AnyRule, Finding, Rule, RuleRegistry } from './rule-registry';
import {
  ANY_PLACEHOLDER,
  checksumFindings,
  checksumRules,
  duplicateRule,
  formatRule,
  isAbsoluteUri,
  isMalformed,
  licenseFields,
  licenseRules,
  orPlaceholder,
  requiredRule,
  specCode,
  structureRule
} from './rule-helpers';
import { ReferenceIndex } from '../resolver/reference-index';
import { EntityKind } from '../types';

const UNRESOLVED_ELEMENT = specCode('11.1', 'unresolved-element');

// The date must exist: 2024-02-30T00:00:00Z parses, but as March 1st.
const isTimestamp = (value: string) => {
  if (!TIMESTAMP_PATTERN.test(value)) return false;
  const date = new Date(value);
  return !isNaN(date.getTime()) && `${date.toISOString().slice(0, 19)}Z` === value;
};
const isSpdxId = (value: string) => SPDX_ID_PATTERN.test(value);

function elementFindings(index: ReferenceIndex, field: string, id: string, allowSpecial: boolean): Finding[] {
  const resolution = index.resolveElementReference(id, allowSpecial);
  if (resolution.kind !== 'unresolved') return [];
  return [{ field, message: `${quote(id)} does not resolve: ${resolution.reason}` }];
}

function valueRule<K extends EntityKind>(
  kind: K,
  clause: string,
  field: string,
  read: (entity: EntityByKind[K]) => string | undefined,
  allowed: (value: string) => boolean,
  expectation: string
): Rule<K> {
  return formatRule(kind, specCode(clause, 'value'), field, read, allowed, expectation);
}

// ---- Document (clause 6) ----

const documentRules: Rule<'document'>[] = [
  structureRule('document'),
  duplicateRule('document'),
  requiredRule('document', '6.1', 'spdxVersion', d => d.spdxVersion),
  valueRule('document', '6.1', 'spdxVersion', d => d.spdxVersion, v => SUPPORTED_SPDX_VERSIONS.includes(v), `one of ${SUPPORTED_SPDX_VERSIONS.join(', ')}`),
  requiredRule('document', '6.2', 'dataLicense', d => d.dataLicense),
  valueRule('document', '6.2', 'dataLicense', d => d.dataLicense, v => v === DATA_LICENSE, DATA_LICENSE),
  requiredRule('document', '6.3', 'SPDXID', d => d.SPDXID),
  valueRule('document', '6.3', 'SPDXID', d => d.SPDXID, v => v === DOCUMENT_SPDX_ID, DOCUMENT_SPDX_ID),
  requiredRule('document', '6.4', 'name', d => d.name),
  requiredRule('document', '6.5', 'documentNamespace', d => d.documentNamespace),
  formatRule('document', specCode('6.5', 'format'), 'documentNamespace', d => d.documentNamespace, v => isAbsoluteUri(v) && !v.includes('#'), 'an absolute URI without a "#" fragment'),
  {
    code: specCode('6.6', 'external-document-ref'),
    name: 'External document references',
    description: 'Each external document reference needs a DocumentRef- id, a document URI and a SHA1 checksum',
    target: 'document',
    severity: 'error',
    evaluate: ({ entity }) => {
      const findings: Finding[] = [];
      (entity.externalDocumentRefs || []).forEach((ref, i) => {
        const at = `externalDocumentRefs[${i}]`;
        if (!ref.externalDocumentId) {
          if (!isMalformed(entity, `${at}.externalDocumentId`)) findings.push({ field: `${at}.externalDocumentId`, message: 'External document reference is missing externalDocumentId' });
        } else if (!DOCUMENT_REF_PATTERN.test(ref.externalDocumentId)) {
          findings.push({ field: `${at}.externalDocumentId`, message: `externalDocumentId must match DocumentRef-[idstring], found ${quote(ref.externalDocumentId)}` });
        }
        if (!ref.spdxDocument) {
          if (!isMalformed(entity, `${at}.spdxDocument`)) findings.push({ field: `${at}.spdxDocument`, message: 'External document reference is missing spdxDocument' });
        } else if (!isAbsoluteUri(ref.spdxDocument) || ref.spdxDocument.includes('#')) {
          findings.push({ field: `${at}.spdxDocument`, message: `spdxDocument must be an absolute URI without a "#" fragment, found ${quote(ref.spdxDocument)}` });
        }
        if (!ref.checksum) {
          if (!isMalformed(entity, `${at}.checksum`)) findings.push({ field: `${at}.checksum`, message: 'External document reference is missing its checksum' });
          return;
        }
        if (ref.checksum.algorithm !== 'SHA1') {
          findings.push({ field: `${at}.checksum.algorithm`, message: `External document checksum must use SHA1, found ${quote(ref.checksum.algorithm || '')}` });
          return;
        }
        for (const f of checksumFindings([ref.checksum], 'checksum', 'format')) {
          findings.push({ field: `${at}.${f.field.replace('checksum[0]', 'checksum')}`, message: f.message });
        }
      });
      return findings;
    }
  },
  formatRule(
    'document',
    specCode('6.7', 'format'),
    'creationInfo.licenseListVersion',
    d => d.creationInfo?.licenseListVersion,
    v => LICENSE_LIST_VERSION_PATTERN.test(v),
    'a <major>.<minor> version'
  ),
  {
    code: specCode('6.8', 'creation-info'),
    name: 'Creation information',
    description: 'A document has exactly one creationInfo block',
    target: 'document',
    severity: 'error',
    evaluate: ({ entity }) =>
      entity.creationInfo || isMalformed(entity, 'creationInfo') ? [] : [{ field: 'creationInfo', message: 'Document is missing mandatory field creationInfo' }]
  },
  {
    code: specCode('6.8', 'required'),
    name: 'Document creators',
    description: 'creationInfo.creators lists at least one creator',
    target: 'document',
    severity: 'error',
    evaluate: ({ entity }) => {
      const info = entity.creationInfo;
      if (!info || isMalformed(entity, 'creationInfo.creators') || (info.creators && info.creators.length)) return [];
      return [{ field: 'creationInfo.creators', message: 'creationInfo must list at least one creator' }];
    }
  },
  {
    code: specCode('6.8', 'format'),
    name: 'Document creator format',
    description: 'Creators are written as "Person: ...", "Organization: ..." or "Tool: ..."',
    target: 'document',
    severity: 'error',
    evaluate: ({ entity }) =>
      (entity.creationInfo?.creators || []).flatMap((creator, i) =>
        CREATOR_PATTERN.test(creator) ? [] : [{ field: `creationInfo.creators[${i}]`, message: `Creator must start with Person:, Organization: or Tool:, found ${quote(creator)}` }]
      )
  },
  {
    code: specCode('6.9', 'required'),
    name: 'Document creation time',
    description: 'creationInfo.created is mandatory',
    target: 'document',
    severity: 'error',
    evaluate: ({ entity }) => {
      const info = entity.creationInfo;
      if (!info || info.created || isMalformed(entity, 'creationInfo.created')) return [];
      return [{ field: 'creationInfo.created', message: 'creationInfo is missing mandatory field created' }];
    }
  },
  formatRule('document', specCode('6.9', 'format'), 'creationInfo.created', d => d.creationInfo?.created, isTimestamp, 'a UTC timestamp YYYY-MM-DDThh:mm:ssZ'),
  {
    code: specCode('11.1', 'describes'),
    name: 'Described element',
    description: 'A document describes exactly one element (documentDescribes, DESCRIBES or DESCRIBED_BY)',
    target: 'document',
    severity: 'error',
    evaluate: (_target, { index }) => {
      const described = index.describedElementIds();
      if (described.length === 1) return [];
      const found = described.length ? `${described.length} (${described.join(', ')})` : 'none';
      return [{ field: 'relationships', message: `Document must describe exactly one element, found ${found}` }];
    }
  },
  {
    code: UNRESOLVED_ELEMENT,
    name: 'documentDescribes references',
    description: 'Every documentDescribes entry names an element of this or a declared external document',
    target: 'document',
    severity: 'error',
    evaluate: ({ entity }, { index }) => (entity.documentDescribes || []).flatMap((id, i) => elementFindings(index, `documentDescribes[${i}]`, id, false))
  }
];

// ---- Package (clause 7) ----

const packageRules: Rule<'package'>[] = [
  structureRule('package'),
  duplicateRule('package'),
  requiredRule('package', '7.1', 'name', p => p.name),
  requiredRule('package', '7.2', 'SPDXID', p => p.SPDXID),
  formatRule('package', specCode('7.2', 'format'), 'SPDXID', p => p.SPDXID, isSpdxId, 'SPDXRef-[idstring]'),
  formatRule('package', specCode('7.5', 'format'), 'supplier', p => p.supplier, orPlaceholder(v => ACTOR_PATTERN.test(v), NOASSERTION), 'NOASSERTION or "Person: ..." / "Organization: ..."'),
  formatRule('package', specCode('7.6', 'format'), 'originator', p => p.originator, orPlaceholder(v => ACTOR_PATTERN.test(v), NOASSERTION), 'NOASSERTION or "Person: ..." / "Organization: ..."'),
  requiredRule('package', '7.7', 'downloadLocation', p => p.downloadLocation),
  formatRule('package', specCode('7.7', 'format'), 'downloadLocation', p => p.downloadLocation, orPlaceholder(v => DOWNLOAD_LOCATION_PATTERN.test(v), ...ANY_PLACEHOLDER), 'NONE, NOASSERTION or a download URL'),
  {
    code: specCode('7.8', 'files-analyzed'),
    name: 'Package filesAnalyzed consistency',
    description: 'Packages with filesAnalyzed=false carry no verification code, file license info or files',
    target: 'package',
    severity: 'error',
    evaluate: ({ entity }) => {
      if (entity.filesAnalyzed !== false) return [];
      const findings: Finding[] = [];
      if (entity.packageVerificationCode) findings.push({ field: 'packageVerificationCode', message: 'packageVerificationCode must be omitted when filesAnalyzed is false' });
      if (entity.licenseInfoFromFiles?.length) findings.push({ field: 'licenseInfoFromFiles', message: 'licenseInfoFromFiles must be omitted when filesAnalyzed is false' });
      if (entity.hasFiles?.length) findings.push({ field: 'hasFiles', message: 'hasFiles must be empty when filesAnalyzed is false' });
      return findings;
    }
  },
  {
    code: specCode('7.9', 'format'),
    name: 'Package verification code',
    description: 'packageVerificationCodeValue is 40 lowercase hex characters',
    target: 'package',
    severity: 'error',
    evaluate: ({ entity }) => {
      const code = entity.packageVerificationCode;
      if (!code) return [];
      const value = code.packageVerificationCodeValue;
      if (!value) {
        return isMalformed(entity, 'packageVerificationCode.packageVerificationCodeValue')
          ? []
          : [{ field: 'packageVerificationCode.packageVerificationCodeValue', message: 'packageVerificationCode is missing packageVerificationCodeValue' }];
      }
      return VERIFICATION_CODE_PATTERN.test(value)
        ? []
        : [{ field: 'packageVerificationCode.packageVerificationCodeValue', message: `Verification code must be 40 lowercase hexadecimal characters, found ${quote(value)}` }];
    }
  },
  ...checksumRules('package', '7.10', p => p.checksums),
  formatRule('package', specCode('7.11', 'format'), 'homepage', p => p.homepage, orPlaceholder(isAbsoluteUri, ...ANY_PLACEHOLDER), 'NONE, NOASSERTION or an absolute URL'),
  ...licenseRules('package', p =>
    licenseFields([
      ['licenseConcluded', p.licenseConcluded],
      ['licenseInfoFromFiles', p.licenseInfoFromFiles],
      ['licenseDeclared', p.licenseDeclared]
    ])
  ),
  {
    code: specCode('7.21', 'external-ref'),
    name: 'Package external references',
    description: 'External references carry a known category, a type and a locator',
    target: 'package',
    severity: 'error',
    evaluate: ({ entity }) =>
      (entity.externalRefs || []).flatMap((ref, i): Finding[] => {
        const at = `externalRefs[${i}]`;
        const missing = missingList([!ref.referenceCategory && 'referenceCategory', !ref.referenceType && 'referenceType', !ref.referenceLocator && 'referenceLocator']);
        const findings: Finding[] = missing ? [{ field: at, message: `External reference is missing ${missing}` }] : [];
        if (ref.referenceCategory && !EXTERNAL_REF_CATEGORIES.has(ref.referenceCategory)) {
          findings.push({ field: `${at}.referenceCategory`, message: `Unknown external reference category ${quote(ref.referenceCategory)}` });
        }
        if (ref.referenceLocator && /\s/.test(ref.referenceLocator)) {
          findings.push({ field: `${at}.referenceLocator`, message: 'referenceLocator must not contain whitespace' });
        }
        return findings;
      })
  },
  {
    code: specCode('7.21', 'type'),
    name: 'Package external reference types',
    description: 'referenceType is an annex F type of its category; OTHER accepts any type',
    target: 'package',
    severity: 'error',
    evaluate: ({ entity }) =>
      (entity.externalRefs || []).flatMap((ref, i): Finding[] => {
        if (!ref.referenceCategory || !ref.referenceType || !EXTERNAL_REF_CATEGORIES.has(ref.referenceCategory)) return [];
        const category = canonicalRefCategory(ref.referenceCategory);
        if (category === 'OTHER') return [];
        const known = EXTERNAL_REF_TYPES.get(ref.referenceType);
        if (known && known.category === category) return [];
        const field = `externalRefs[${i}].referenceType`;
        if (known) return [{ field, message: `${quote(ref.referenceType)} is a ${known.category} reference type, not ${category}` }];
        const allowed = [...EXTERNAL_REF_TYPES.values()].filter(t => t.category === category).map(t => t.type);
        return [{ field, message: `Unknown ${category} reference type ${quote(ref.referenceType)}, expected one of ${allowed.join(', ')}` }];
      })
  },
  {
    code: specCode('7.21', 'locator'),
    name: 'Package external reference locators',
    description: 'referenceLocator follows the annex F format of its referenceType',
    target: 'package',
    severity: 'error',
    evaluate: ({ entity }) =>
      (entity.externalRefs || []).flatMap((ref, i): Finding[] => {
        const locator = ref.referenceLocator;
        const known = ref.referenceType ? EXTERNAL_REF_TYPES.get(ref.referenceType) : undefined;
        if (!locator || /\s/.test(locator) || !known || !ref.referenceCategory) return [];
        if (canonicalRefCategory(ref.referenceCategory) !== known.category) return [];
        if (known.uri ? isAbsoluteUri(locator) : known.pattern.test(locator)) return [];
        return [{ field: `externalRefs[${i}].referenceLocator`, message: `${quote(locator)} is not a valid ${known.type} locator` }];
      })
  },
  valueRule('package', '7.24', 'primaryPackagePurpose', p => p.primaryPackagePurpose, v => PRIMARY_PACKAGE_PURPOSES.has(v), 'a primary package purpose defined by SPDX 2.3'),
  formatRule('package', specCode('7.25', 'format'), 'releaseDate', p => p.releaseDate, isTimestamp, 'a UTC timestamp YYYY-MM-DDThh:mm:ssZ'),
  formatRule('package', specCode('7.26', 'format'), 'builtDate', p => p.builtDate, isTimestamp, 'a UTC timestamp YYYY-MM-DDThh:mm:ssZ'),
  formatRule('package', specCode('7.27', 'format'), 'validUntilDate', p => p.validUntilDate, isTimestamp, 'a UTC timestamp YYYY-MM-DDThh:mm:ssZ'),
  {
    code: UNRESOLVED_ELEMENT,
    name: 'Package hasFiles references',
    description: 'Every hasFiles entry names a file of this document',
    target: 'package',
    severity: 'error',
    evaluate: ({ entity }, { index }) =>
      (entity.hasFiles || []).flatMap((id, i): Finding[] => {
        const target = index.resolve(id);
        if (!target) return [{ field: `hasFiles[${i}]`, message: `${quote(id)} does not resolve: no file with this SPDXID exists in the document` }];
        return target.kind === 'file' ? [] : [{ field: `hasFiles[${i}]`, message: `${quote(id)} refers to a ${target.kind}, not a file` }];
      })
  }
];

// ---- File (clause 8) ----

const fileRules: Rule<'file'>[] = [
  structureRule('file'),
  duplicateRule('file'),
  requiredRule('file', '8.1', 'fileName', f => f.fileName),
  formatRule('file', specCode('8.1', 'format'), 'fileName', f => f.fileName, v => !v.startsWith('/'), 'a relative path such as ./src/main.c'),
  requiredRule('file', '8.2', 'SPDXID', f => f.SPDXID),
  formatRule('file', specCode('8.2', 'format'), 'SPDXID', f => f.SPDXID, isSpdxId, 'SPDXRef-[idstring]'),
  {
    code: specCode('8.3', 'value'),
    name: 'File types',
    description: 'fileTypes entries are SPDX 2.3 file types',
    target: 'file',
    severity: 'error',
    evaluate: ({ entity }) =>
      (entity.fileTypes || []).flatMap((type, i) => (FILE_TYPES.has(type) ? [] : [{ field: `fileTypes[${i}]`, message: `Unknown file type ${quote(type)}` }]))
  },
  requiredRule('file', '8.4', 'checksums', f => f.checksums),
  {
    code: specCode('8.4', 'sha1'),
    name: 'File SHA1 checksum',
    description: 'Every file carries a SHA1 checksum',
    target: 'file',
    severity: 'error',
    evaluate: ({ entity }) => {
      const checksums = entity.checksums;
      if (!checksums || !checksums.length || checksums.some(c => c.algorithm === 'SHA1')) return [];
      return [{ field: 'checksums', message: 'File checksums must include a SHA1 checksum' }];
    }
  },
  ...checksumRules('file', '8.4', f => f.checksums),
  ...licenseRules('file', f =>
    licenseFields([
      ['licenseConcluded', f.licenseConcluded],
      ['licenseInfoInFiles', f.licenseInfoInFiles]
    ])
  )
];

// ---- Snippet (clause 9) ----

function pointerFindings(pointer: SnippetPointer | undefined, at: string, snippetFromFile: string | undefined): Finding[] {
  if (!pointer) return [{ field: at, message: `Snippet range is missing ${at.slice(at.lastIndexOf('.') + 1)}` }];
  const findings: Finding[] = [];
  const hasOffset = pointer.offset !== undefined;
  const hasLine = pointer.lineNumber !== undefined;
  if (hasOffset === hasLine) findings.push({ field: at, message: 'Snippet pointer needs exactly one of offset or lineNumber' });
  const position = pointer.offset ?? pointer.lineNumber;
  if (position !== undefined && position < 1) findings.push({ field: at, message: `Snippet pointer position must be at least 1, found ${position}` });
  if (pointer.reference !== undefined && snippetFromFile && pointer.reference !== snippetFromFile) {
    findings.push({ field: `${at}.reference`, message: `Snippet pointer reference ${quote(pointer.reference)} does not match snippetFromFile ${quote(snippetFromFile)}` });
  }
  return findings;
}

const snippetRules: Rule<'snippet'>[] = [
  structureRule('snippet'),
  duplicateRule('snippet'),
  requiredRule('snippet', '9.1', 'SPDXID', s => s.SPDXID),
  formatRule('snippet', specCode('9.1', 'format'), 'SPDXID', s => s.SPDXID, isSpdxId, 'SPDXRef-[idstring]'),
  requiredRule('snippet', '9.2', 'snippetFromFile', s => s.snippetFromFile),
  {
    code: specCode('9.2', 'unresolved-file'),
    name: 'Snippet source file',
    description: 'snippetFromFile names a file of this or a declared external document',
    target: 'snippet',
    severity: 'error',
    evaluate: ({ entity }, { index }) => {
      const id = entity.snippetFromFile;
      if (!id) return [];
      const resolution = index.resolveElementReference(id);
      if (resolution.kind === 'unresolved') return [{ field: 'snippetFromFile', message: `${quote(id)} does not resolve: ${resolution.reason}` }];
      if (resolution.kind === 'local' && resolution.target.kind !== 'file') {
        return [{ field: 'snippetFromFile', message: `${quote(id)} refers to a ${resolution.target.kind}, not a file` }];
      }
      return [];
    }
  },
  requiredRule('snippet', '9.3', 'ranges', s => s.ranges),
  {
    code: specCode('9.3', 'format'),
    name: 'Snippet ranges',
    description: 'Each range has start and end pointers of the same kind with start <= end',
    target: 'snippet',
    severity: 'error',
    evaluate: ({ entity }) =>
      (entity.ranges || []).flatMap((range, i) => {
        const at = `ranges[${i}]`;
        const findings = [
          ...pointerFindings(range.startPointer, `${at}.startPointer`, entity.snippetFromFile),
          ...pointerFindings(range.endPointer, `${at}.endPointer`, entity.snippetFromFile)
        ];
        const start = range.startPointer;
        const end = range.endPointer;
        if (findings.length || !start || !end) return findings;
        if ((start.offset === undefined) !== (end.offset === undefined)) {
          findings.push({ field: at, message: 'Snippet range start and end must both use offset or both use lineNumber' });
        } else {
          const from = start.offset ?? start.lineNumber ?? 0;
          const to = end.offset ?? end.lineNumber ?? 0;
          if (from > to) findings.push({ field: at, message: `Snippet range starts at ${from} after it ends at ${to}` });
        }
        return findings;
      })
  },
  ...licenseRules('snippet', s =>
    licenseFields([
      ['licenseConcluded', s.licenseConcluded],
      ['licenseInfoInSnippets', s.licenseInfoInSnippets]
    ])
  )
];

// ---- Other licensing information (clause 10) ----

const extractedLicensingRules: Rule<'extractedLicensingInfo'>[] = [
  structureRule('extractedLicensingInfo'),
  duplicateRule('extractedLicensingInfo'),
  requiredRule('extractedLicensingInfo', '10.1', 'licenseId', l => l.licenseId),
  formatRule('extractedLicensingInfo', specCode('10.1', 'format'), 'licenseId', l => l.licenseId, v => LICENSE_REF_PATTERN.test(v), 'LicenseRef-[idstring]'),
  requiredRule('extractedLicensingInfo', '10.2', 'extractedText', l => l.extractedText)
];

// ---- Relationships (clause 11) ----

const relationshipRules: Rule<'relationship'>[] = [
  structureRule('relationship'),
  {
    code: specCode('11.1', 'required'),
    name: 'Relationship fields',
    description: 'Relationships name both elements and a relationship type',
    target: 'relationship',
    severity: 'error',
    evaluate: ({ entity }) => {
      const missing = (['spdxElementId', 'relationshipType', 'relatedSpdxElement'] as const).filter(f => !entity[f] && !isMalformed(entity, f));
      return missing.length ? [{ field: missing[0], message: `Relationship is missing ${missingList(missing)}` }] : [];
    }
  },
  valueRule('relationship', '11.1', 'relationshipType', r => r.relationshipType, v => RELATIONSHIP_TYPES.has(v), 'an SPDX 2.3 relationship type'),
  {
    code: UNRESOLVED_ELEMENT,
    name: 'Relationship endpoints',
    description: 'Both relationship endpoints resolve within the document or a declared external document',
    target: 'relationship',
    severity: 'error',
    evaluate: ({ entity }, { index }) => [
      ...(entity.spdxElementId ? elementFindings(index, 'spdxElementId', entity.spdxElementId, false) : []),
      ...(entity.relatedSpdxElement ? elementFindings(index, 'relatedSpdxElement', entity.relatedSpdxElement, true) : [])
    ]
  }
];

export const SPEC_RULES: AnyRule[] = [
  ...documentRules,
  ...packageRules,
  ...fileRules,
  ...snippetRules,
  ...extractedLicensingRules,
  ...relationshipRules
];

export function createSpecificationRuleSet(): RuleRegistry {
  return new RuleRegistry('specification', SPEC_RULES);
}
