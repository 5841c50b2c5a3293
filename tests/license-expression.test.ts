import { collectLicenseTerms, LicenseExpressionError, parseLicenseExpression } from '../src/license/license-expression';
import { lookupExceptionId, lookupLicenseId } from '../src/license/license-list';

describe('License expression parser', () => {
  it('binds AND tighter than OR', () => {
    const node = parseLicenseExpression('MIT OR Apache-2.0 AND BSD-3-Clause');
    expect(node).toEqual({
      type: 'or',
      left: { type: 'license', id: 'MIT', orLater: false },
      right: {
        type: 'and',
        left: { type: 'license', id: 'Apache-2.0', orLater: false },
        right: { type: 'license', id: 'BSD-3-Clause', orLater: false }
      }
    });
  });

  it('lets parentheses override precedence', () => {
    expect(parseLicenseExpression('(MIT OR Apache-2.0) AND BSD-3-Clause')).toEqual({
      type: 'and',
      left: {
        type: 'or',
        left: { type: 'license', id: 'MIT', orLater: false },
        right: { type: 'license', id: 'Apache-2.0', orLater: false }
      },
      right: { type: 'license', id: 'BSD-3-Clause', orLater: false }
    });
  });

  it('parses WITH exceptions, or-later and license references', () => {
    expect(parseLicenseExpression('GPL-2.0-or-later WITH Classpath-exception-2.0')).toEqual({
      type: 'with',
      license: { type: 'license', id: 'GPL-2.0-or-later', orLater: false },
      exception: 'Classpath-exception-2.0'
    });
    expect(parseLicenseExpression('GPL-2.0+')).toEqual({ type: 'license', id: 'GPL-2.0', orLater: true });
    expect(parseLicenseExpression('DocumentRef-ext:LicenseRef-Custom')).toEqual({
      type: 'licenseRef',
      licenseRef: 'LicenseRef-Custom',
      documentRef: 'DocumentRef-ext'
    });
  });

  it('accepts lower case operators but not mixed case', () => {
    expect(parseLicenseExpression('mit or apache-2.0').type).toBe('or');
    expect(() => parseLicenseExpression('MIT Or Apache-2.0')).toThrow('unexpected "Or"');
  });

  it('reports syntax errors with a position', () => {
    const cases: Array<[string, string, number]> = [
      ['', 'empty license expression', 0],
      ['(MIT', 'expected ")" but expression ended', 4],
      ['MIT AND', 'expected license identifier but expression ended', 7],
      ['MIT$', 'invalid characters in "MIT$"', 0],
      ['LicenseRef-', 'malformed license reference "LicenseRef-"', 0]
    ];
    for (const [text, message, position] of cases) {
      let caught: unknown;
      try {
        parseLicenseExpression(text);
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(LicenseExpressionError);
      if (caught instanceof LicenseExpressionError) {
        expect(caught.message).toBe(message);
        expect(caught.position).toBe(position);
      }
    }
  });

  it('rejects WITH after a parenthesised group', () => {
    expect(() => parseLicenseExpression('(MIT OR Apache-2.0) WITH Classpath-exception-2.0')).toThrow(
      'WITH must follow a single license identifier'
    );
  });

  it('collects leaves left to right', () => {
    const terms = collectLicenseTerms(parseLicenseExpression('MIT AND (LicenseRef-A OR GPL-2.0-only WITH Classpath-exception-2.0)'));
    expect(terms).toEqual({
      licenses: [
        { id: 'MIT', orLater: false },
        { id: 'GPL-2.0-only', orLater: false }
      ],
      licenseRefs: [{ licenseRef: 'LicenseRef-A' }],
      exceptions: ['Classpath-exception-2.0']
    });
  });
});

describe('License list lookups', () => {
  it('matches identifiers case-insensitively and returns the canonical id', () => {
    expect(lookupLicenseId('mit')).toBe('MIT');
    expect(lookupLicenseId('Apache-2.0')).toBe('Apache-2.0');
    expect(lookupLicenseId('Not-A-Real-License')).toBeUndefined();
  });

  it('includes deprecated identifiers and exceptions', () => {
    expect(lookupLicenseId('GPL-2.0')).toBe('GPL-2.0');
    expect(lookupExceptionId('classpath-exception-2.0')).toBe('Classpath-exception-2.0');
    expect(lookupExceptionId('MIT')).toBeUndefined();
  });
});
