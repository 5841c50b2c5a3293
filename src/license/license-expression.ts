// SPDX license expression parser (SPDX 2.3 Annex D).
//
//   compound := and-expr ("OR" and-expr)*
//   and-expr := with-expr ("AND" with-expr)*
//   with-expr := primary ("WITH" exception-id)?
//   primary  := "(" compound ")" | simple
//   simple   := license-id ["+"] | ["DocumentRef-" idstring ":"] "LicenseRef-" idstring
//
// Operators must be written all upper or all lower case.

export type SimpleLicense =
  | { type: 'license'; id: string; orLater: boolean }
  | { type: 'licenseRef'; licenseRef: string; documentRef?: string };

export type LicenseNode =
  | SimpleLicense
  | { type: 'with'; license: SimpleLicense; exception: string }
  | { type: 'and' | 'or'; left: LicenseNode; right: LicenseNode };

export class LicenseExpressionError extends Error {
  constructor(message: string, readonly position: number) {
    super(message);
    this.name = 'LicenseExpressionError';
  }
}

interface Token {
  value: string;
  position: number;
}

const TOKEN_CHARS = /^[A-Za-z0-9.:+-]+$/;
const LICENSE_ID = /^[A-Za-z0-9.-]+$/;
const LICENSE_REF = /^(?:DocumentRef-([A-Za-z0-9.-]+):)?(LicenseRef-[A-Za-z0-9.-]+)$/;
type Operator = 'AND' | 'OR' | 'WITH';
const OPERATORS: ReadonlyMap<string, Operator> = new Map<string, Operator>([
  ['AND', 'AND'], ['and', 'AND'],
  ['OR', 'OR'], ['or', 'OR'],
  ['WITH', 'WITH'], ['with', 'WITH']
]);

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  const re = /\(|\)|[^\s()]+/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    const value = m[0];
    if (value !== '(' && value !== ')' && !TOKEN_CHARS.test(value)) {
      throw new LicenseExpressionError(`invalid characters in "${value}"`, m.index);
    }
    tokens.push({ value, position: m.index });
  }
  return tokens;
}

class Parser {
  private pos = 0;
  constructor(private readonly tokens: Token[], private readonly length: number) {}

  parse(): LicenseNode {
    if (!this.tokens.length) throw new LicenseExpressionError('empty license expression', 0);
    const node = this.compound();
    const rest = this.peek();
    if (rest) throw new LicenseExpressionError(`unexpected "${rest.value}"`, rest.position);
    return node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(expected: string): Token {
    const token = this.tokens[this.pos];
    if (!token) throw new LicenseExpressionError(`expected ${expected} but expression ended`, this.length);
    this.pos++;
    return token;
  }

  private operator(): Operator | undefined {
    const token = this.peek();
    return token ? OPERATORS.get(token.value) : undefined;
  }

  private compound(): LicenseNode {
    let left = this.andExpr();
    while (this.operator() === 'OR') {
      this.pos++;
      left = { type: 'or', left, right: this.andExpr() };
    }
    return left;
  }

  private andExpr(): LicenseNode {
    let left = this.withExpr();
    while (this.operator() === 'AND') {
      this.pos++;
      left = { type: 'and', left, right: this.withExpr() };
    }
    return left;
  }

  private withExpr(): LicenseNode {
    const token = this.peek();
    if (token && token.value === '(') {
      this.pos++;
      const inner = this.compound();
      const close = this.next('")"');
      if (close.value !== ')') throw new LicenseExpressionError(`expected ")" but found "${close.value}"`, close.position);
      if (this.operator() === 'WITH') {
        throw new LicenseExpressionError('WITH must follow a single license identifier', this.tokens[this.pos].position);
      }
      return inner;
    }
    const license = this.simple();
    if (this.operator() !== 'WITH') return license;
    this.pos++;
    const exception = this.next('license exception identifier');
    if (OPERATORS.has(exception.value) || !LICENSE_ID.test(exception.value)) {
      throw new LicenseExpressionError(`invalid license exception "${exception.value}"`, exception.position);
    }
    return { type: 'with', license, exception: exception.value };
  }

  private simple(): SimpleLicense {
    const token = this.next('license identifier');
    if (token.value === '(' || token.value === ')' || OPERATORS.has(token.value)) {
      throw new LicenseExpressionError(`expected license identifier but found "${token.value}"`, token.position);
    }
    if (token.value.includes('LicenseRef-') || token.value.startsWith('DocumentRef-')) {
      const ref = LICENSE_REF.exec(token.value);
      if (!ref) throw new LicenseExpressionError(`malformed license reference "${token.value}"`, token.position);
      return ref[1] ? { type: 'licenseRef', licenseRef: ref[2], documentRef: `DocumentRef-${ref[1]}` } : { type: 'licenseRef', licenseRef: ref[2] };
    }
    const orLater = token.value.endsWith('+');
    const id = orLater ? token.value.slice(0, -1) : token.value;
    if (!LICENSE_ID.test(id)) throw new LicenseExpressionError(`malformed license identifier "${token.value}"`, token.position);
    return { type: 'license', id, orLater };
  }
}

export function parseLicenseExpression(text: string): LicenseNode {
  return new Parser(tokenize(text), text.length).parse();
}

export interface LicenseTerms {
  licenses: { id: string; orLater: boolean }[];
  licenseRefs: { licenseRef: string; documentRef?: string }[];
  exceptions: string[];
}

// Leaves of an expression in left-to-right order.
export function collectLicenseTerms(node: LicenseNode, terms: LicenseTerms = { licenses: [], licenseRefs: [], exceptions: [] }): LicenseTerms {
  switch (node.type) {
    case 'license':
      terms.licenses.push({ id: node.id, orLater: node.orLater });
      break;
    case 'licenseRef':
      terms.licenseRefs.push(node.documentRef ? { licenseRef: node.licenseRef, documentRef: node.documentRef } : { licenseRef: node.licenseRef });
      break;
    case 'with':
      collectLicenseTerms(node.license, terms);
      terms.exceptions.push(node.exception);
      break;
    default:
      collectLicenseTerms(node.left, terms);
      collectLicenseTerms(node.right, terms);
  }
  return terms;
}
