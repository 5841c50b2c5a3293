// Shared result and option types for SBOM validation runs.

export type Severity = 'error' | 'warning'; // error = SPDX specification, warning = configured policy

export type RuleSetSelection = 'specification' | 'policy' | 'both';

export type EntityKind = 'document' | 'package' | 'file' | 'snippet' | 'extractedLicensingInfo' | 'relationship';

export interface Violation {
  readonly documentId: string;
  readonly ruleCode: string;
  readonly severity: Severity;
  readonly entitySpdxId: string; // empty when the entity carries no usable SPDXID
  readonly fieldPath: string; // absolute JSON path, e.g. packages[0].supplier
  readonly message: string;
}

export type DocumentStatus = 'pass' | 'fail' | 'unreadable' | 'skipped';

export interface ValidationReport {
  documentId: string;
  status: DocumentStatus;
  violations: Violation[];
  error?: string; // load failure or pipeline crash (status=unreadable)
}

export interface RunSummary {
  status: 'pass' | 'fail';
  exitCode: 0 | 1;
  cancelled: boolean;
  documents: ValidationReport[];
  totals: {
    documents: number;
    passed: number;
    failed: number;
    unreadable: number;
    skipped: number;
    errors: number;
    warnings: number;
  };
}

// Per-document pipeline stages; every document passes through all four in order.
export type DocumentStage = 'loaded' | 'resolved' | 'evaluated' | 'reported';

export type DocumentInput =
  | { documentId: string; content: unknown }
  | { documentId: string; load: () => Promise<unknown> };

export interface RuleFilters {
  include?: string[]; // rule code prefixes to keep
  exclude?: string[]; // rule code prefixes to drop
}

export interface RunOptions {
  ruleSets?: RuleSetSelection;
  failOn?: Severity; // minimum severity that turns the exit code non-zero
  maxParallel?: number; // documents validated concurrently
  signal?: AbortSignal; // checked between documents
  rules?: RuleFilters;
  verbose?: boolean;
  onStage?: (documentId: string, stage: DocumentStage) => void;
}
