import * as fs from 'fs-extra';
import * as path from 'path';
import { runValidation } from '../src/orchestrator';
import { ConfigurationError } from '../src/errors';
import { DEFAULT_POLICY_FILE, loadPolicyConfig, parsePolicyConfig, PolicyConfig } from '../src/policy/policy-config';
import { compilePolicyRules, passesCheck, PRIMARY_PACKAGE_CODE, policyRuleCode, readFieldPath } from '../src/policy/policy-rules';
import { normalizeDocument } from '../src/model/normalize';
import { Violation } from '../src/types';
import { input, validDocument, validPackage, violationsOf } from './helpers/documents';

const TEMP_DIR = path.join(__dirname, 'temp-policy');

async function policyViolations(doc: unknown, config: unknown): Promise<Violation[]> {
  const summary = await runValidation([input('doc.spdx.json', doc)], config, { ruleSets: 'policy' });
  return violationsOf(summary, 'doc.spdx.json');
}

describe('Policy configuration', () => {
  afterAll(async () => {
    await fs.remove(TEMP_DIR);
  });

  it('treats an empty configuration as no requirements', () => {
    expect(parsePolicyConfig(null)).toEqual({});
    expect(parsePolicyConfig(undefined)).toEqual({});
    expect(compilePolicyRules({})).toEqual([]);
  });

  it('rejects unknown entity types', () => {
    let caught: unknown;
    try {
      parsePolicyConfig({ Widget: [] });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0].startsWith('(root): ')).toBe(true);
      expect(caught.message.startsWith('Invalid policy configuration\n - (root): ')).toBe(true);
    }
  });

  it('rejects unknown checks with the offending path', () => {
    let caught: unknown;
    try {
      parsePolicyConfig({ Package: [{ fieldPath: 'supplier', check: 'present' }] }, 'policy file p.yaml');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.message.startsWith('Invalid policy file p.yaml')).toBe(true);
      expect(caught.issues.some(i => i.startsWith('Package.0.check: '))).toBe(true);
    }
  });

  it('rejects malformed field paths and empty oneOf lists', () => {
    expect(() => parsePolicyConfig({ File: [{ fieldPath: 'checksums[0]', check: 'required' }] })).toThrow(ConfigurationError);
    expect(() => parsePolicyConfig({ File: [{ fieldPath: 'fileTypes', check: { oneOf: [] } }] })).toThrow(ConfigurationError);
  });

  it('fails the run before any document is loaded', async () => {
    const load = jest.fn(async () => validDocument());
    await expect(runValidation([{ documentId: 'a.spdx.json', load }], { Package: 'supplier' })).rejects.toBeInstanceOf(ConfigurationError);
    expect(load).not.toHaveBeenCalled();
  });

  it('loads YAML and JSON policy files', async () => {
    await fs.ensureDir(TEMP_DIR);
    const yamlFile = path.join(TEMP_DIR, 'policy.yaml');
    const jsonFile = path.join(TEMP_DIR, 'policy.json');
    await fs.writeFile(yamlFile, 'Package:\n  - fieldPath: supplier\n    check: nonPlaceholder\n');
    await fs.writeJson(jsonFile, { File: [{ fieldPath: 'fileTypes', check: { oneOf: ['SOURCE'] } }] });
    expect(await loadPolicyConfig(yamlFile)).toEqual({ Package: [{ fieldPath: 'supplier', check: 'nonPlaceholder' }] });
    expect(await loadPolicyConfig(jsonFile)).toEqual({ File: [{ fieldPath: 'fileTypes', check: { oneOf: ['SOURCE'] } }] });
  });

  it('reports missing and unparsable policy files as configuration errors', async () => {
    await fs.ensureDir(TEMP_DIR);
    const missing = path.join(TEMP_DIR, 'missing.yaml');
    await expect(loadPolicyConfig(missing)).rejects.toThrow(`Policy file not found: ${missing}`);
    const broken = path.join(TEMP_DIR, 'broken.json');
    await fs.writeFile(broken, '{ "Package": ');
    await expect(loadPolicyConfig(broken)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('ships a default policy that a complete document satisfies', async () => {
    const config = await loadPolicyConfig(DEFAULT_POLICY_FILE);
    expect(config.Package?.map(r => policyRuleCode('Package', r))).toEqual([
      'POLICY/Package/supplier/nonPlaceholder',
      'POLICY/Package/filesAnalyzed/oneOf',
      'POLICY/Package/copyrightText/licensed'
    ]);
    expect(config.primaryPackageFirst).toBe(true);
    const summary = await runValidation([input('doc.spdx.json', validDocument())], config);
    expect(summary.status).toBe('pass');
    expect(summary.exitCode).toBe(0);
  });

  it('warns once for a package with both licenses and no copyright text under the default policy', async () => {
    const doc = validDocument();
    delete doc.packages[0].copyrightText;
    const config = await loadPolicyConfig(DEFAULT_POLICY_FILE);
    expect(await policyViolations(doc, config)).toEqual([
      {
        documentId: 'doc.spdx.json',
        ruleCode: 'POLICY/Package/copyrightText/licensed',
        severity: 'warning',
        entitySpdxId: 'SPDXRef-Package-app',
        fieldPath: 'packages[0].copyrightText',
        message: 'This package has declared licenses but no copyright text populated.'
      }
    ]);
  });

  it('treats an empty section as no requirements', async () => {
    await fs.ensureDir(TEMP_DIR);
    const file = path.join(TEMP_DIR, 'sections.yaml');
    await fs.writeFile(file, 'Package:\nFile:\n  - fieldPath: fileName\n    check: required\n');
    const config = await loadPolicyConfig(file);
    expect(config).toEqual({ Package: null, File: [{ fieldPath: 'fileName', check: 'required' }] });
    expect(compilePolicyRules(config).map(r => r.code)).toEqual(['POLICY/File/fileName/required']);
  });

  it('rejects an empty guard list', () => {
    expect(() => parsePolicyConfig({ Package: [{ fieldPath: 'copyrightText', check: 'required', when: [] }] })).toThrow(ConfigurationError);
  });
});

describe('Policy rules', () => {
  it('reads dotted paths through the typed model and extras', () => {
    const json = validDocument();
    json.packages[0].owner = 'team-a';
    const doc = normalizeDocument(json);
    expect(readFieldPath(doc, 'creationInfo.licenseListVersion')).toBe('3.22');
    expect(readFieldPath(doc.packages[0], 'owner')).toBe('team-a');
    expect(readFieldPath(doc.packages[0], 'location')).toBeUndefined();
    expect(readFieldPath(doc.packages[0], 'supplier.name')).toBeUndefined();
  });

  it('evaluates the three checks', () => {
    expect(passesCheck('required', '')).toBe(false);
    expect(passesCheck('required', [])).toBe(false);
    expect(passesCheck('required', false)).toBe(true);
    expect(passesCheck('nonPlaceholder', ' noassertion ')).toBe(false);
    expect(passesCheck('nonPlaceholder', ['MIT', 'NONE'])).toBe(false);
    expect(passesCheck('nonPlaceholder', 'Organization: Example Org')).toBe(true);
    expect(passesCheck({ oneOf: [true] }, true)).toBe(true);
    expect(passesCheck({ oneOf: [true] }, 'true')).toBe(false);
    expect(passesCheck({ oneOf: ['SOURCE'] }, undefined)).toBe(true);
  });

  it('reports a placeholder supplier as a warning with the default code', async () => {
    const doc = validDocument();
    doc.packages[0].supplier = 'noassertion';
    const config: PolicyConfig = { Package: [{ fieldPath: 'supplier', check: 'nonPlaceholder' }] };
    expect(await policyViolations(doc, config)).toEqual([
      {
        documentId: 'doc.spdx.json',
        ruleCode: 'POLICY/Package/supplier/nonPlaceholder',
        severity: 'warning',
        entitySpdxId: 'SPDXRef-Package-app',
        fieldPath: 'packages[0].supplier',
        message: 'Package supplier must not be NOASSERTION or NONE, found "noassertion"'
      }
    ]);
  });

  it('checks every element of a list against oneOf and skips absent values', async () => {
    const doc = validDocument();
    doc.files[0].fileTypes = ['SOURCE', 'BINARY'];
    delete doc.packages[0].primaryPackagePurpose;
    const config: PolicyConfig = {
      Package: [{ fieldPath: 'primaryPackagePurpose', check: { oneOf: ['LIBRARY'] } }],
      File: [{ fieldPath: 'fileTypes', check: { oneOf: ['SOURCE', 'TEXT'] } }]
    };
    const violations = await policyViolations(doc, config);
    expect(violations.map(v => [v.ruleCode, v.fieldPath, v.message])).toEqual([
      ['POLICY/File/fileTypes/oneOf', 'files[0].fileTypes', 'File fileTypes must be one of "SOURCE", "TEXT", found ["SOURCE","BINARY"]']
    ]);
  });

  it('applies a requirement only when its guard passes', async () => {
    const config: PolicyConfig = {
      Package: [{ fieldPath: 'copyrightText', check: 'required', when: { fieldPath: 'licenseDeclared', check: 'nonPlaceholder' } }]
    };
    const guarded = validDocument();
    guarded.packages[0] = validPackage({ licenseDeclared: 'NOASSERTION', copyrightText: undefined });
    expect(await policyViolations(guarded, config)).toEqual([]);

    const applied = validDocument();
    applied.packages[0] = validPackage({ copyrightText: '' });
    expect((await policyViolations(applied, config)).map(v => v.message)).toEqual(['Package copyrightText is required']);
  });

  it('applies a requirement when any guard of a list passes', async () => {
    const config: PolicyConfig = {
      Package: [
        {
          fieldPath: 'copyrightText',
          check: 'required',
          when: [
            { fieldPath: 'licenseConcluded', check: 'nonPlaceholder' },
            { fieldPath: 'licenseDeclared', check: 'nonPlaceholder' }
          ]
        }
      ]
    };
    const neither = validDocument();
    neither.packages[0] = validPackage({ licenseConcluded: 'NOASSERTION', licenseDeclared: 'NONE', copyrightText: undefined });
    expect(await policyViolations(neither, config)).toEqual([]);

    const declaredOnly = validDocument();
    declaredOnly.packages[0] = validPackage({ licenseConcluded: 'NOASSERTION', copyrightText: undefined });
    expect((await policyViolations(declaredOnly, config)).map(v => v.ruleCode)).toEqual(['POLICY/Package/copyrightText/required']);
    expect(compilePolicyRules(config)[0].description).toBe(
      'Package copyrightText must pass required when licenseConcluded passes nonPlaceholder or licenseDeclared passes nonPlaceholder'
    );
  });

  it('warns when the described package is not the first package', async () => {
    const doc = validDocument();
    doc.packages.unshift(validPackage({ SPDXID: 'SPDXRef-Package-lib', name: 'example-lib', hasFiles: [] }));
    expect(await policyViolations(doc, { primaryPackageFirst: true })).toEqual([
      {
        documentId: 'doc.spdx.json',
        ruleCode: PRIMARY_PACKAGE_CODE,
        severity: 'warning',
        entitySpdxId: 'SPDXRef-DOCUMENT',
        fieldPath: 'packages',
        message:
          'The document describes SPDXRef-Package-app, but the first package is SPDXRef-Package-lib. Either the DESCRIBES relationship is incorrect or the top-level package is not first in packages.'
      }
    ]);
    expect(await policyViolations(doc, { primaryPackageFirst: false })).toEqual([]);
    expect(await policyViolations(validDocument(), { primaryPackageFirst: true })).toEqual([]);
  });

  it('leaves package order alone when the document describes several elements', async () => {
    const doc = validDocument();
    doc.packages.unshift(validPackage({ SPDXID: 'SPDXRef-Package-lib', name: 'example-lib', hasFiles: [] }));
    doc.relationships.push({ spdxElementId: 'SPDXRef-DOCUMENT', relationshipType: 'DESCRIBES', relatedSpdxElement: 'SPDXRef-Package-lib' });
    expect(await policyViolations(doc, { primaryPackageFirst: true })).toEqual([]);
  });

  it('uses the configured code and message', async () => {
    const doc = validDocument();
    delete doc.creationInfo.licenseListVersion;
    const config: PolicyConfig = {
      Document: [{ fieldPath: 'creationInfo.licenseListVersion', check: 'required', code: 'ORG/license-list', message: 'Record the license list version.' }]
    };
    expect(await policyViolations(doc, config)).toEqual([
      {
        documentId: 'doc.spdx.json',
        ruleCode: 'ORG/license-list',
        severity: 'warning',
        entitySpdxId: 'SPDXRef-DOCUMENT',
        fieldPath: 'creationInfo.licenseListVersion',
        message: 'Record the license list version.'
      }
    ]);
  });

  it('reads extension fields and never model bookkeeping', async () => {
    const doc = validDocument();
    doc.packages.push(validPackage({ SPDXID: 'SPDXRef-Package-lib', owner: 'team-b', hasFiles: [] }));
    const config: PolicyConfig = {
      Package: [
        { fieldPath: 'owner', check: 'required' },
        { fieldPath: 'location', check: 'required' }
      ]
    };
    const violations = await policyViolations(doc, config);
    expect(violations.map(v => [v.entitySpdxId, v.ruleCode])).toEqual([
      ['SPDXRef-Package-app', 'POLICY/Package/owner/required'],
      ['SPDXRef-Package-app', 'POLICY/Package/location/required'],
      ['SPDXRef-Package-lib', 'POLICY/Package/location/required']
    ]);
  });

  it('runs after the specification rules for the same entity', async () => {
    const doc = validDocument();
    doc.packages[0].supplier = 'NOASSERTION';
    doc.packages[0].downloadLocation = 'not a url';
    const summary = await runValidation([input('doc.spdx.json', doc)], { Package: [{ fieldPath: 'supplier', check: 'nonPlaceholder' }] });
    expect(violationsOf(summary, 'doc.spdx.json').map(v => [v.ruleCode, v.severity])).toEqual([
      ['SPDX-2.3/7.7/format', 'error'],
      ['POLICY/Package/supplier/nonPlaceholder', 'warning']
    ]);
  });
});
