// Report output: stable JSON shape, console rendering, CSV exception files.

import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { RunSummary, Severity, ValidationReport } from './types';
import { SEVERITY_EMOJI } from './constants';

export type OutputFormat = 'table' | 'json' | 'yaml';

export interface SerializedViolation {
  ruleCode: string;
  severity: Severity;
  entitySpdxId: string;
  fieldPath: string;
  message: string;
}

export interface SerializedDocument {
  documentId: string;
  status: ValidationReport['status'];
  error?: string;
  violations: SerializedViolation[];
}

export interface SerializedRunSummary {
  status: RunSummary['status'];
  documents: SerializedDocument[];
}

// Fixed key order so identical runs produce byte-identical JSON.
export function serializeRunSummary(summary: RunSummary): SerializedRunSummary {
  return {
    status: summary.status,
    documents: summary.documents.map(report => {
      const doc: SerializedDocument = { documentId: report.documentId, status: report.status, violations: [] };
      if (report.error !== undefined) doc.error = report.error;
      doc.violations = report.violations.map(v => ({
        ruleCode: v.ruleCode,
        severity: v.severity,
        entitySpdxId: v.entitySpdxId,
        fieldPath: v.fieldPath,
        message: v.message
      }));
      return doc;
    })
  };
}

const SEVERITY_ORDER: Severity[] = ['error', 'warning'];

// Grouped by document, then severity (errors first); entity order within a group.
export function renderConsoleReport(summary: RunSummary): string[] {
  const lines: string[] = [];
  for (const report of summary.documents) {
    switch (report.status) {
      case 'pass':
        lines.push(`✅ ${report.documentId}: compliant`);
        continue;
      case 'skipped':
        lines.push(`⏭️  ${report.documentId}: skipped (run cancelled)`);
        continue;
      case 'unreadable':
        lines.push(`❌ ${report.documentId}: unreadable - ${report.error || 'unknown error'}`);
        continue;
      case 'fail':
        break;
    }
    const errors = report.violations.filter(v => v.severity === 'error').length;
    lines.push(`❌ ${report.documentId}: ${errors} error(s), ${report.violations.length - errors} warning(s)`);
    for (const severity of SEVERITY_ORDER) {
      const group = report.violations.filter(v => v.severity === severity);
      if (!group.length) continue;
      lines.push(`  ${SEVERITY_EMOJI[severity]} ${severity === 'error' ? 'ERRORS' : 'WARNINGS'}`);
      for (const v of group) {
        const subject = [v.entitySpdxId, v.fieldPath].filter(Boolean).join(' ') || '(document)';
        lines.push(`    [${v.ruleCode}] ${subject}: ${v.message}`);
      }
    }
  }
  return lines;
}

export function displayResults(summary: RunSummary, format: OutputFormat = 'table'): void {
  if (format === 'json') {
    console.log(JSON.stringify(serializeRunSummary(summary), null, 2));
    return;
  }
  if (format === 'yaml') {
    console.log(yaml.dump(serializeRunSummary(summary)));
    return;
  }
  console.log('\n' + '='.repeat(60));
  console.log('🎯 SPDX SBOM COMPLIANCE REPORT');
  console.log('='.repeat(60));
  renderConsoleReport(summary).forEach(line => console.log(line));
  console.log('─'.repeat(60));
  const t = summary.totals;
  console.log('SUMMARY:');
  console.log(`Documents: ${t.documents} (passed ${t.passed}, failed ${t.failed}, unreadable ${t.unreadable}, skipped ${t.skipped})`);
  console.log(`Violations: ${t.errors} error(s), ${t.warnings} warning(s)`);
  if (summary.cancelled) console.log('⚠️  Run was cancelled before every document was validated');
  console.log(`Status: ${summary.status === 'pass' ? '✅ PASSED' : '❌ FAILED'}`);
}

export const CSV_HEADER = ['ruleCode', 'severity', 'entitySpdxId', 'fieldPath', 'message'];

export function toCsvRows(report: ValidationReport): string[][] {
  const rows = report.violations.map(v => [v.ruleCode, v.severity, v.entitySpdxId, v.fieldPath, v.message]);
  if (report.error !== undefined) rows.unshift(['LOAD_ERROR', 'error', '', '', report.error]);
  return [CSV_HEADER, ...rows];
}

function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(rows: string[][]): string {
  return rows.map(row => row.map(csvCell).join(',')).join('\n') + '\n';
}

// One `<documentId>_exceptions.csv` per document that did not pass validation.
export async function writeCsvReports(summary: RunSummary, dir: string): Promise<string[]> {
  await fs.ensureDir(dir);
  const written: string[] = [];
  for (const report of summary.documents) {
    if (report.status !== 'fail' && report.status !== 'unreadable') continue;
    const file = path.join(dir, `${report.documentId}_exceptions.csv`);
    await fs.writeFile(file, formatCsv(toCsvRows(report)), 'utf8');
    written.push(file);
  }
  return written;
}

export async function writeJsonReport(summary: RunSummary, file: string): Promise<void> {
  await fs.ensureDir(path.dirname(path.resolve(file)));
  await fs.writeJson(file, serializeRunSummary(summary), { spaces: 4 });
}
