// Deserialization boundary: turns an untyped JSON value into the typed document model.
// Never throws. Values of the wrong JSON type are recorded on the owning node's
// `malformed` list and left out of the model, so downstream rules see them as absent.

import {
  Checksum,
  CreationInfo,
  ExternalDocumentRef,
  ExternalRef,
  ExtractedLicensingInfo,
  MalformedField,
  SnippetPointer,
  SnippetRange,
  SpdxDocument,
  SpdxFile,
  SpdxPackage,
  SpdxRelationship,
  SpdxSnippet
} from './spdx-document';

type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

const DOCUMENT_KEYS = ['spdxVersion', 'dataLicense', 'SPDXID', 'name', 'documentNamespace', 'comment', 'creationInfo', 'externalDocumentRefs', 'documentDescribes', 'packages', 'files', 'snippets', 'relationships', 'hasExtractedLicensingInfos'];
const CREATION_INFO_KEYS = ['created', 'creators', 'licenseListVersion', 'comment'];
const PACKAGE_KEYS = ['SPDXID', 'name', 'versionInfo', 'packageFileName', 'supplier', 'originator', 'downloadLocation', 'filesAnalyzed', 'packageVerificationCode', 'checksums', 'homepage', 'sourceInfo', 'licenseConcluded', 'licenseInfoFromFiles', 'licenseDeclared', 'licenseComments', 'copyrightText', 'summary', 'description', 'comment', 'externalRefs', 'attributionTexts', 'primaryPackagePurpose', 'releaseDate', 'builtDate', 'validUntilDate', 'hasFiles'];
const FILE_KEYS = ['SPDXID', 'fileName', 'fileTypes', 'checksums', 'licenseConcluded', 'licenseInfoInFiles', 'licenseComments', 'copyrightText', 'comment', 'noticeText', 'fileContributors', 'attributionTexts'];
const SNIPPET_KEYS = ['SPDXID', 'name', 'snippetFromFile', 'ranges', 'licenseConcluded', 'licenseInfoInSnippets', 'licenseComments', 'copyrightText', 'comment'];
const RELATIONSHIP_KEYS = ['spdxElementId', 'relationshipType', 'relatedSpdxElement', 'comment'];
const EXTRACTED_LICENSE_KEYS = ['licenseId', 'extractedText', 'name', 'seeAlsos', 'comment'];

// Reads typed fields off one JSON object, reporting type mismatches to `owner`.
class FieldReader {
  constructor(
    private readonly source: JsonObject,
    private readonly owner: { malformed: MalformedField[] },
    private readonly prefix = ''
  ) {}

  private present(key: string): unknown {
    const value = this.source[key];
    return value === null ? undefined : value;
  }

  private mismatch(field: string, expected: string, value: unknown): undefined {
    this.owner.malformed.push({ field: this.prefix + field, expected, actual: describeJsonType(value) });
    return undefined;
  }

  string(key: string): string | undefined {
    const value = this.present(key);
    if (value === undefined || typeof value === 'string') return value;
    return this.mismatch(key, 'string', value);
  }

  boolean(key: string): boolean | undefined {
    const value = this.present(key);
    if (value === undefined || typeof value === 'boolean') return value;
    return this.mismatch(key, 'boolean', value);
  }

  integer(key: string): number | undefined {
    const value = this.present(key);
    if (value === undefined) return undefined;
    if (typeof value === 'number' && Number.isInteger(value)) return value;
    return this.mismatch(key, 'integer', value);
  }

  list(key: string): unknown[] | undefined {
    const value = this.present(key);
    if (value === undefined || Array.isArray(value)) return value;
    return this.mismatch(key, 'array', value);
  }

  stringList(key: string): string[] | undefined {
    const items = this.list(key);
    if (!items) return undefined;
    const out: string[] = [];
    items.forEach((item, i) => {
      if (typeof item === 'string') out.push(item);
      else this.mismatch(`${key}[${i}]`, 'string', item);
    });
    return out;
  }

  // Maps each object element through `read`; non-object elements are reported and dropped.
  objectList<T>(key: string, read: (reader: FieldReader) => T): T[] | undefined {
    const items = this.list(key);
    if (!items) return undefined;
    const out: T[] = [];
    items.forEach((item, i) => {
      if (isJsonObject(item)) out.push(read(new FieldReader(item, this.owner, `${this.prefix}${key}[${i}].`)));
      else this.mismatch(`${key}[${i}]`, 'object', item);
    });
    return out;
  }

  object(key: string): FieldReader | undefined {
    const value = this.present(key);
    if (value === undefined) return undefined;
    if (isJsonObject(value)) return new FieldReader(value, this.owner, `${this.prefix}${key}.`);
    return this.mismatch(key, 'object', value);
  }

  // Raw elements of an entity list, with non-objects reported against the owner.
  entities(key: string): { raw: JsonObject; index: number }[] {
    const items = this.list(key) || [];
    const out: { raw: JsonObject; index: number }[] = [];
    items.forEach((item, index) => {
      if (isJsonObject(item)) out.push({ raw: item, index });
      else this.mismatch(`${key}[${index}]`, 'object', item);
    });
    return out;
  }

  extras(known: readonly string[]): Record<string, unknown> {
    const extras: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(this.source)) {
      if (!known.includes(key)) extras[key] = value;
    }
    return extras;
  }
}

function readChecksum(r: FieldReader): Checksum {
  return { algorithm: r.string('algorithm'), checksumValue: r.string('checksumValue') };
}

function readPointer(r: FieldReader | undefined): SnippetPointer | undefined {
  if (!r) return undefined;
  return { reference: r.string('reference'), offset: r.integer('offset'), lineNumber: r.integer('lineNumber') };
}

function readCreationInfo(r: FieldReader): CreationInfo {
  return {
    created: r.string('created'),
    creators: r.stringList('creators'),
    licenseListVersion: r.string('licenseListVersion'),
    comment: r.string('comment'),
    extras: r.extras(CREATION_INFO_KEYS)
  };
}

function readExternalDocumentRef(r: FieldReader): ExternalDocumentRef {
  const checksum = r.object('checksum');
  return {
    externalDocumentId: r.string('externalDocumentId'),
    spdxDocument: r.string('spdxDocument'),
    checksum: checksum ? readChecksum(checksum) : undefined
  };
}

function readPackage(raw: JsonObject, location: string): SpdxPackage {
  const malformed: MalformedField[] = [];
  const r = new FieldReader(raw, { malformed });
  const code = r.object('packageVerificationCode');
  return {
    location,
    malformed,
    SPDXID: r.string('SPDXID'),
    name: r.string('name'),
    versionInfo: r.string('versionInfo'),
    packageFileName: r.string('packageFileName'),
    supplier: r.string('supplier'),
    originator: r.string('originator'),
    downloadLocation: r.string('downloadLocation'),
    filesAnalyzed: r.boolean('filesAnalyzed'),
    packageVerificationCode: code
      ? { packageVerificationCodeValue: code.string('packageVerificationCodeValue'), packageVerificationCodeExcludedFiles: code.stringList('packageVerificationCodeExcludedFiles') }
      : undefined,
    checksums: r.objectList('checksums', readChecksum),
    homepage: r.string('homepage'),
    sourceInfo: r.string('sourceInfo'),
    licenseConcluded: r.string('licenseConcluded'),
    licenseInfoFromFiles: r.stringList('licenseInfoFromFiles'),
    licenseDeclared: r.string('licenseDeclared'),
    licenseComments: r.string('licenseComments'),
    copyrightText: r.string('copyrightText'),
    summary: r.string('summary'),
    description: r.string('description'),
    comment: r.string('comment'),
    externalRefs: r.objectList<ExternalRef>('externalRefs', ref => ({
      referenceCategory: ref.string('referenceCategory'),
      referenceType: ref.string('referenceType'),
      referenceLocator: ref.string('referenceLocator'),
      comment: ref.string('comment')
    })),
    attributionTexts: r.stringList('attributionTexts'),
    primaryPackagePurpose: r.string('primaryPackagePurpose'),
    releaseDate: r.string('releaseDate'),
    builtDate: r.string('builtDate'),
    validUntilDate: r.string('validUntilDate'),
    hasFiles: r.stringList('hasFiles'),
    extras: r.extras(PACKAGE_KEYS)
  };
}

function readFile(raw: JsonObject, location: string): SpdxFile {
  const malformed: MalformedField[] = [];
  const r = new FieldReader(raw, { malformed });
  return {
    location,
    malformed,
    SPDXID: r.string('SPDXID'),
    fileName: r.string('fileName'),
    fileTypes: r.stringList('fileTypes'),
    checksums: r.objectList('checksums', readChecksum),
    licenseConcluded: r.string('licenseConcluded'),
    licenseInfoInFiles: r.stringList('licenseInfoInFiles'),
    licenseComments: r.string('licenseComments'),
    copyrightText: r.string('copyrightText'),
    comment: r.string('comment'),
    noticeText: r.string('noticeText'),
    fileContributors: r.stringList('fileContributors'),
    attributionTexts: r.stringList('attributionTexts'),
    extras: r.extras(FILE_KEYS)
  };
}

function readSnippet(raw: JsonObject, location: string): SpdxSnippet {
  const malformed: MalformedField[] = [];
  const r = new FieldReader(raw, { malformed });
  return {
    location,
    malformed,
    SPDXID: r.string('SPDXID'),
    name: r.string('name'),
    snippetFromFile: r.string('snippetFromFile'),
    ranges: r.objectList<SnippetRange>('ranges', range => ({
      startPointer: readPointer(range.object('startPointer')),
      endPointer: readPointer(range.object('endPointer'))
    })),
    licenseConcluded: r.string('licenseConcluded'),
    licenseInfoInSnippets: r.stringList('licenseInfoInSnippets'),
    licenseComments: r.string('licenseComments'),
    copyrightText: r.string('copyrightText'),
    comment: r.string('comment'),
    extras: r.extras(SNIPPET_KEYS)
  };
}

function readRelationship(raw: JsonObject, location: string): SpdxRelationship {
  const malformed: MalformedField[] = [];
  const r = new FieldReader(raw, { malformed });
  return {
    location,
    malformed,
    spdxElementId: r.string('spdxElementId'),
    relationshipType: r.string('relationshipType'),
    relatedSpdxElement: r.string('relatedSpdxElement'),
    comment: r.string('comment'),
    extras: r.extras(RELATIONSHIP_KEYS)
  };
}

function readExtractedLicense(raw: JsonObject, location: string): ExtractedLicensingInfo {
  const malformed: MalformedField[] = [];
  const r = new FieldReader(raw, { malformed });
  return {
    location,
    malformed,
    licenseId: r.string('licenseId'),
    extractedText: r.string('extractedText'),
    name: r.string('name'),
    seeAlsos: r.stringList('seeAlsos'),
    comment: r.string('comment'),
    extras: r.extras(EXTRACTED_LICENSE_KEYS)
  };
}

export function normalizeDocument(raw: unknown): SpdxDocument {
  const malformed: MalformedField[] = [];
  if (!isJsonObject(raw)) {
    malformed.push({ field: '', expected: 'object', actual: describeJsonType(raw) });
    return { location: '', extras: {}, malformed, isObject: false, packages: [], files: [], snippets: [], relationships: [], hasExtractedLicensingInfos: [] };
  }
  const r = new FieldReader(raw, { malformed });
  const creationInfo = r.object('creationInfo');
  return {
    location: '',
    malformed,
    isObject: true,
    spdxVersion: r.string('spdxVersion'),
    dataLicense: r.string('dataLicense'),
    SPDXID: r.string('SPDXID'),
    name: r.string('name'),
    documentNamespace: r.string('documentNamespace'),
    comment: r.string('comment'),
    creationInfo: creationInfo ? readCreationInfo(creationInfo) : undefined,
    externalDocumentRefs: r.objectList('externalDocumentRefs', readExternalDocumentRef),
    documentDescribes: r.stringList('documentDescribes'),
    packages: r.entities('packages').map(e => readPackage(e.raw, `packages[${e.index}]`)),
    files: r.entities('files').map(e => readFile(e.raw, `files[${e.index}]`)),
    snippets: r.entities('snippets').map(e => readSnippet(e.raw, `snippets[${e.index}]`)),
    relationships: r.entities('relationships').map(e => readRelationship(e.raw, `relationships[${e.index}]`)),
    hasExtractedLicensingInfos: r.entities('hasExtractedLicensingInfos').map(e => readExtractedLicense(e.raw, `hasExtractedLicensingInfos[${e.index}]`)),
    extras: r.extras(DOCUMENT_KEYS)
  };
}
