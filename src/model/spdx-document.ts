// Typed in-memory view of an SPDX 2.3 JSON document.
// Property names follow the SPDX JSON serialization so that policy field paths
// can address the model directly. Every optional field is explicit; keys the
// model does not know are preserved in `extras` and never validated.

export interface MalformedField {
  field: string; // relative to the owning node's location
  expected: string;
  actual: string;
}

export interface ModelNode {
  location: string; // absolute JSON path of the node ('' for the document root)
  extras: Record<string, unknown>;
  malformed: MalformedField[];
}

export interface Checksum {
  algorithm?: string;
  checksumValue?: string;
}

export interface CreationInfo {
  created?: string;
  creators?: string[];
  licenseListVersion?: string;
  comment?: string;
  extras: Record<string, unknown>;
}

export interface ExternalDocumentRef {
  externalDocumentId?: string;
  spdxDocument?: string;
  checksum?: Checksum;
}

export interface PackageVerificationCode {
  packageVerificationCodeValue?: string;
  packageVerificationCodeExcludedFiles?: string[];
}

export interface ExternalRef {
  referenceCategory?: string;
  referenceType?: string;
  referenceLocator?: string;
  comment?: string;
}

export interface SpdxPackage extends ModelNode {
  SPDXID?: string;
  name?: string;
  versionInfo?: string;
  packageFileName?: string;
  supplier?: string;
  originator?: string;
  downloadLocation?: string;
  filesAnalyzed?: boolean;
  packageVerificationCode?: PackageVerificationCode;
  checksums?: Checksum[];
  homepage?: string;
  sourceInfo?: string;
  licenseConcluded?: string;
  licenseInfoFromFiles?: string[];
  licenseDeclared?: string;
  licenseComments?: string;
  copyrightText?: string;
  summary?: string;
  description?: string;
  comment?: string;
  externalRefs?: ExternalRef[];
  attributionTexts?: string[];
  primaryPackagePurpose?: string;
  releaseDate?: string;
  builtDate?: string;
  validUntilDate?: string;
  hasFiles?: string[];
}

export interface SpdxFile extends ModelNode {
  SPDXID?: string;
  fileName?: string;
  fileTypes?: string[];
  checksums?: Checksum[];
  licenseConcluded?: string;
  licenseInfoInFiles?: string[];
  licenseComments?: string;
  copyrightText?: string;
  comment?: string;
  noticeText?: string;
  fileContributors?: string[];
  attributionTexts?: string[];
}

export interface SnippetPointer {
  reference?: string;
  offset?: number;
  lineNumber?: number;
}

export interface SnippetRange {
  startPointer?: SnippetPointer;
  endPointer?: SnippetPointer;
}

export interface SpdxSnippet extends ModelNode {
  SPDXID?: string;
  name?: string;
  snippetFromFile?: string;
  ranges?: SnippetRange[];
  licenseConcluded?: string;
  licenseInfoInSnippets?: string[];
  licenseComments?: string;
  copyrightText?: string;
  comment?: string;
}

export interface SpdxRelationship extends ModelNode {
  spdxElementId?: string;
  relationshipType?: string;
  relatedSpdxElement?: string;
  comment?: string;
}

export interface ExtractedLicensingInfo extends ModelNode {
  licenseId?: string;
  extractedText?: string;
  name?: string;
  seeAlsos?: string[];
  comment?: string;
}

export interface SpdxDocument extends ModelNode {
  isObject: boolean; // false when the deserialized root was not a JSON object
  spdxVersion?: string;
  dataLicense?: string;
  SPDXID?: string;
  name?: string;
  documentNamespace?: string;
  comment?: string;
  creationInfo?: CreationInfo;
  externalDocumentRefs?: ExternalDocumentRef[];
  documentDescribes?: string[];
  packages: SpdxPackage[];
  files: SpdxFile[];
  snippets: SpdxSnippet[];
  relationships: SpdxRelationship[];
  hasExtractedLicensingInfos: ExtractedLicensingInfo[];
}
