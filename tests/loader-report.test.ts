import * as fs from 'fs-extra';
import * as path from 'path';
import { discoverDocuments, loadDocumentsFromDirectory, loadJsonDocument } from '../src/loader';
import { runValidation, summarize } from '../src/orchestrator';
import { formatCsv, renderConsoleReport, serializeRunSummary, toCsvRows, writeCsvReports, writeJsonReport } from '../src/report';
import { LoadError } from '../src/errors';
import { DEFAULT_POLICY_FILE, loadPolicyConfig } from '../src/policy/policy-config';
import { ValidationReport } from '../src/types';
import { input, validDocument } from './helpers/documents';

const TEMP_DIR = path.join(__dirname, 'temp-loader');
const SUPPLIER_POLICY = { Package: [{ fieldPath: 'supplier', check: 'nonPlaceholder' }] };

function failingDocument() {
  const doc = validDocument();
  doc.packages[0].supplier = 'NOASSERTION';
  doc.relationships.push({ spdxElementId: 'SPDXRef-Package-app', relationshipType: 'DEPENDS_ON', relatedSpdxElement: 'SPDXRef-Missing' });
  return doc;
}

describe('Document discovery', () => {
  beforeAll(async () => {
    await fs.remove(TEMP_DIR);
    await fs.ensureDir(path.join(TEMP_DIR, 'docs', 'nested'));
    await fs.writeJson(path.join(TEMP_DIR, 'docs', 'b.spdx.json'), validDocument());
    await fs.writeFile(path.join(TEMP_DIR, 'docs', 'a.spdx.json'), '{');
    await fs.writeFile(path.join(TEMP_DIR, 'docs', 'notes.txt'), 'not an sbom');
  });

  afterAll(async () => {
    await fs.remove(TEMP_DIR);
  });

  it('lists every entry sorted by name without descending into subdirectories', async () => {
    const inputs = await loadDocumentsFromDirectory(path.join(TEMP_DIR, 'docs'));
    expect(inputs.map(i => i.documentId)).toEqual(['a.spdx.json', 'b.spdx.json', 'nested', 'notes.txt']);
  });

  it('turns unreadable files into per-document load errors', async () => {
    const summary = await runValidation(await discoverDocuments(path.join(TEMP_DIR, 'docs')), {});
    expect(summary.documents.map(d => [d.documentId, d.status])).toEqual([
      ['a.spdx.json', 'unreadable'],
      ['b.spdx.json', 'pass'],
      ['nested', 'unreadable'],
      ['notes.txt', 'unreadable']
    ]);
    expect(summary.documents[0].error?.startsWith('a.spdx.json is not valid JSON: ')).toBe(true);
    expect(summary.documents[2].error).toBe("File nested not recognized. Please ensure your files are SPDX JSON format and end with '.spdx.json'.");
    expect(summary.documents[3].error).toBe("File notes.txt not recognized. Please ensure your files are SPDX JSON format and end with '.spdx.json'.");
  });

  it('validates a directory end to end with the shipped policy', async () => {
    const dir = path.join(TEMP_DIR, 'run');
    await fs.ensureDir(dir);
    await fs.writeJson(path.join(dir, 'complete.spdx.json'), validDocument());
    const missing = validDocument();
    delete missing.dataLicense;
    await fs.writeJson(path.join(dir, 'no-data-license.spdx.json'), missing);

    const summary = await runValidation(await discoverDocuments(dir), await loadPolicyConfig(DEFAULT_POLICY_FILE));
    expect(summary.status).toBe('fail');
    expect(summary.exitCode).toBe(1);
    expect(summary.documents).toEqual([
      { documentId: 'complete.spdx.json', status: 'pass', violations: [] },
      {
        documentId: 'no-data-license.spdx.json',
        status: 'fail',
        violations: [
          {
            documentId: 'no-data-license.spdx.json',
            ruleCode: 'SPDX-2.3/6.2/required',
            severity: 'error',
            entitySpdxId: 'SPDXRef-DOCUMENT',
            fieldPath: 'dataLicense',
            message: 'Document is missing mandatory field dataLicense'
          }
        ]
      }
    ]);
  });

  it('accepts a single file and rejects missing paths', async () => {
    const file = path.join(TEMP_DIR, 'docs', 'b.spdx.json');
    const inputs = await discoverDocuments(file);
    expect(inputs.map(i => i.documentId)).toEqual(['b.spdx.json']);
    await expect(discoverDocuments(path.join(TEMP_DIR, 'nope'))).rejects.toThrow(`Path not found: ${path.join(TEMP_DIR, 'nope')}`);
  });

  it('raises LoadError for a file that cannot be read', async () => {
    await expect(loadJsonDocument(path.join(TEMP_DIR, 'gone.spdx.json'))).rejects.toBeInstanceOf(LoadError);
  });
});

describe('Reports', () => {
  afterAll(async () => {
    await fs.remove(TEMP_DIR);
  });

  it('renders errors before warnings for each document', async () => {
    const run = await runValidation([input('doc.spdx.json', failingDocument())], SUPPLIER_POLICY);
    const summary = summarize(
      [
        { documentId: 'ok.spdx.json', status: 'pass', violations: [] },
        ...run.documents,
        { documentId: 'bad.spdx.json', status: 'unreadable', violations: [], error: 'Cannot read bad.spdx.json' },
        { documentId: 'late.spdx.json', status: 'skipped', violations: [] }
      ],
      'warning',
      true
    );
    expect(renderConsoleReport(summary)).toEqual([
      '✅ ok.spdx.json: compliant',
      '❌ doc.spdx.json: 1 error(s), 1 warning(s)',
      '  🔴 ERRORS',
      '    [SPDX-2.3/11.1/unresolved-element] SPDXRef-Package-app relationships[1].relatedSpdxElement: "SPDXRef-Missing" does not resolve: no element with this SPDXID exists in the document',
      '  🟡 WARNINGS',
      '    [POLICY/Package/supplier/nonPlaceholder] SPDXRef-Package-app packages[0].supplier: Package supplier must not be NOASSERTION or NONE, found "NOASSERTION"',
      '❌ bad.spdx.json: unreadable - Cannot read bad.spdx.json',
      '⏭️  late.spdx.json: skipped (run cancelled)'
    ]);
  });

  it('serializes identical runs identically', async () => {
    const first = await runValidation([input('doc.spdx.json', failingDocument())], SUPPLIER_POLICY);
    const second = await runValidation([input('doc.spdx.json', failingDocument())], SUPPLIER_POLICY);
    expect(JSON.stringify(serializeRunSummary(first))).toBe(JSON.stringify(serializeRunSummary(second)));
    expect(Object.keys(serializeRunSummary(first).documents[0].violations[0])).toEqual(['ruleCode', 'severity', 'entitySpdxId', 'fieldPath', 'message']);
  });

  it('writes the JSON report with four-space indentation', async () => {
    const summary = await runValidation([input('doc.spdx.json', validDocument())], {});
    const file = path.join(TEMP_DIR, 'out', 'results.json');
    await writeJsonReport(summary, file);
    expect(await fs.readJson(file)).toEqual({ status: 'pass', documents: [{ documentId: 'doc.spdx.json', status: 'pass', violations: [] }] });
    const text = await fs.readFile(file, 'utf8');
    expect(text.split('\n')[1]).toBe('    "status": "pass",');
  });

  it('quotes CSV cells that need it', () => {
    expect(formatCsv([['a,b', 'say "hi"', 'plain']])).toBe('"a,b","say ""hi""",plain\n');
  });

  it('puts the load error first in a CSV exception file', () => {
    const report: ValidationReport = { documentId: 'bad.spdx.json', status: 'unreadable', violations: [], error: 'Cannot read bad.spdx.json' };
    expect(formatCsv(toCsvRows(report))).toBe('ruleCode,severity,entitySpdxId,fieldPath,message\nLOAD_ERROR,error,,,Cannot read bad.spdx.json\n');
  });

  it('writes one exception file per document that did not pass', async () => {
    const dir = path.join(TEMP_DIR, 'out', 'csv');
    const summary = summarize(
      [
        { documentId: 'ok.spdx.json', status: 'pass', violations: [] },
        {
          documentId: 'doc.spdx.json',
          status: 'fail',
          violations: [
            {
              documentId: 'doc.spdx.json',
              ruleCode: 'SPDX-2.3/6.2/value',
              severity: 'error',
              entitySpdxId: 'SPDXRef-DOCUMENT',
              fieldPath: 'dataLicense',
              message: 'dataLicense must be CC0-1.0, found "CC-BY-4.0"'
            }
          ]
        },
        { documentId: 'bad.spdx.json', status: 'unreadable', violations: [], error: 'Cannot read bad.spdx.json' }
      ],
      'warning',
      false
    );
    const written = await writeCsvReports(summary, dir);
    expect(written).toEqual([path.join(dir, 'doc.spdx.json_exceptions.csv'), path.join(dir, 'bad.spdx.json_exceptions.csv')]);
    expect(await fs.readFile(written[0], 'utf8')).toBe(
      'ruleCode,severity,entitySpdxId,fieldPath,message\nSPDX-2.3/6.2/value,error,SPDXRef-DOCUMENT,dataLicense,"dataLicense must be CC0-1.0, found ""CC-BY-4.0"""\n'
    );
  });
});
