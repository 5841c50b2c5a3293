// Centralized SPDX constants, enumerations & environment-derived defaults

import spdx23 from './data/spdx-2.3.json';
import { Severity } from './types';

export const SPDX_VERSION = 'SPDX-2.3';
export const SUPPORTED_SPDX_VERSIONS = [SPDX_VERSION];
export const RULE_CODE_PREFIX = SPDX_VERSION; // every specification rule code starts with this

export const DATA_LICENSE = 'CC0-1.0';
export const DOCUMENT_SPDX_ID = 'SPDXRef-DOCUMENT';

export const NOASSERTION = 'NOASSERTION';
export const NONE = 'NONE';
export const PLACEHOLDER_VALUES = [NOASSERTION, NONE];

// Identifier & value patterns (SPDX 2.3 clauses 3, 6, 7, 10 and Annex D)
export const SPDX_ID_PATTERN = /^SPDXRef-[A-Za-z0-9.-]+$/;
export const DOCUMENT_REF_PATTERN = /^DocumentRef-[A-Za-z0-9.-]+$/;
export const LICENSE_REF_PATTERN = /^LicenseRef-[A-Za-z0-9.-]+$/;
export const EXTERNAL_ELEMENT_PATTERN = /^(DocumentRef-[A-Za-z0-9.-]+):(SPDXRef-[A-Za-z0-9.-]+)$/;
export const CREATOR_PATTERN = /^(Person|Organization|Tool):\s*\S.*$/;
export const ACTOR_PATTERN = /^(Person|Organization):\s*\S.*$/;
export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;
export const LICENSE_LIST_VERSION_PATTERN = /^\d+\.\d+$/;
export const VERIFICATION_CODE_PATTERN = /^[0-9a-f]{40}$/;
export const DOWNLOAD_LOCATION_PATTERN = /^((git|hg|svn|bzr)\+)?[A-Za-z][A-Za-z0-9+.-]*:\/\/\S+$|^git\+git@[^\s:]+:\S+$/;

export const RELATIONSHIP_TYPES: ReadonlySet<string> = new Set(spdx23.relationshipTypes);
export const FILE_TYPES: ReadonlySet<string> = new Set(spdx23.fileTypes);
export const PRIMARY_PACKAGE_PURPOSES: ReadonlySet<string> = new Set(spdx23.primaryPackagePurposes);
export const EXTERNAL_REF_CATEGORIES: ReadonlySet<string> = new Set(spdx23.externalRefCategories);

// Annex F reference types. `uri` types take any absolute URI as locator.
export interface ExternalRefTypeSpec {
  type: string;
  category: string;
  pattern: RegExp;
  uri: boolean;
}
export const EXTERNAL_REF_TYPES: ReadonlyMap<string, ExternalRefTypeSpec> = new Map(
  spdx23.externalRefTypes.map((t): [string, ExternalRefTypeSpec] => [t.type, { ...t, pattern: new RegExp(t.pattern) }])
);

// PACKAGE_MANAGER and PACKAGE-MANAGER name the same category.
export function canonicalRefCategory(category: string): string {
  return category.replace(/_/g, '-');
}

export interface ChecksumAlgorithmSpec {
  algorithm: string;
  minHexLength: number;
  maxHexLength: number;
}
export const CHECKSUM_ALGORITHMS: ReadonlyMap<string, ChecksumAlgorithmSpec> = new Map(
  spdx23.checksumAlgorithms.map((a): [string, ChecksumAlgorithmSpec] => [a.algorithm, a])
);

// Discovery & output defaults
export const SPDX_EXTENSION = '.spdx.json';
export const DEFAULT_JSON_REPORT = 'results.json';

export const DEFAULT_MAX_PARALLEL = (() => {
  const env = process.env.SBOM_CHECK_MAX_PARALLEL;
  const parsed = env ? parseInt(env, 10) : NaN;
  if (!isNaN(parsed) && parsed > 0) return parsed;
  return 4;
})();

export const DEFAULT_FAIL_ON: Severity = process.env.SBOM_CHECK_FAIL_ON === 'error' ? 'error' : 'warning';

export const SEVERITY_RANK: Record<Severity, number> = { warning: 1, error: 2 };

export const SEVERITY_EMOJI: Record<Severity, string> = {
  error: '🔴',
  warning: '🟡'
};

export function isPlaceholder(value: string): boolean {
  return PLACEHOLDER_VALUES.includes(value.trim().toUpperCase());
}
