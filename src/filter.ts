/**
 * Custom filter expressions
 *
 * A small boolean language over exchange attributes, compiled once when the
 * configuration is applied:
 *
 *   ~d api\.example\.com & ~m POST
 *   !~a & (~c 200 | ~c 201)
 *   ~ts json | "graphql"
 *
 * Operators: `!` not, `&` and, `|` or, parentheses. Two terms side by side
 * are joined with `&`. A bare word or quoted string matches the URL.
 */

import { FilterSyntaxError } from './errors.js';
import { classify, type StaticResourceRules } from './classify.js';
import { decodeBody, getHeader } from './http.js';
import type { Exchange } from './types.js';

export type FilterPredicate = (exchange: Exchange) => boolean;

type Side = 'either' | 'request' | 'response';

type FilterNode =
  | { kind: 'all' }
  | { kind: 'asset' }
  | { kind: 'noResponse' }
  | { kind: 'hasResponse' }
  | { kind: 'code'; code: number }
  | { kind: 'method' | 'url' | 'domain' | 'path' | 'src'; pattern: RegExp }
  | { kind: 'header' | 'body' | 'contentType'; side: Side; pattern: RegExp }
  | { kind: 'not'; operand: FilterNode }
  | { kind: 'and' | 'or'; left: FilterNode; right: FilterNode };

type Token =
  | { type: 'op'; value: '!' | '&' | '|' | '(' | ')'; pos: number }
  | { type: 'filter'; value: string; pos: number }
  | { type: 'word'; value: string; pos: number };

const NO_ARG_FILTERS = new Set(['~all', '~a', '~q', '~s']);

const REGEX_FILTERS: Record<string, (pattern: RegExp) => FilterNode> = {
  '~m': pattern => ({ kind: 'method', pattern }),
  '~u': pattern => ({ kind: 'url', pattern }),
  '~d': pattern => ({ kind: 'domain', pattern }),
  '~p': pattern => ({ kind: 'path', pattern }),
  '~src': pattern => ({ kind: 'src', pattern }),
  '~h': pattern => ({ kind: 'header', side: 'either', pattern }),
  '~hq': pattern => ({ kind: 'header', side: 'request', pattern }),
  '~hs': pattern => ({ kind: 'header', side: 'response', pattern }),
  '~b': pattern => ({ kind: 'body', side: 'either', pattern }),
  '~bq': pattern => ({ kind: 'body', side: 'request', pattern }),
  '~bs': pattern => ({ kind: 'body', side: 'response', pattern }),
  '~t': pattern => ({ kind: 'contentType', side: 'either', pattern }),
  '~tq': pattern => ({ kind: 'contentType', side: 'request', pattern }),
  '~ts': pattern => ({ kind: 'contentType', side: 'response', pattern }),
};

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const ch = expression[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '!' || ch === '&' || ch === '|' || ch === '(' || ch === ')') {
      tokens.push({ type: 'op', value: ch, pos: i });
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      let value = '';
      i++;
      while (i < expression.length && expression[i] !== ch) {
        if (expression[i] === '\\' && expression[i + 1] === ch) {
          value += ch;
          i += 2;
        } else {
          value += expression[i];
          i++;
        }
      }
      if (i >= expression.length) {
        throw new FilterSyntaxError('Unterminated quoted string', expression, start);
      }
      i++;
      tokens.push({ type: 'word', value, pos: start });
      continue;
    }

    const start = i;
    while (i < expression.length && !/[\s()!&|]/.test(expression[i])) {
      i++;
    }
    const value = expression.slice(start, i);
    tokens.push({ type: value.startsWith('~') ? 'filter' : 'word', value, pos: start });
  }

  return tokens;
}

function compilePattern(source: string, expression: string, pos: number): RegExp {
  try {
    return new RegExp(source, 'i');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FilterSyntaxError(`Invalid regular expression (${reason})`, expression, pos);
  }
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[], private readonly expression: string) {}

  parse(): FilterNode {
    const node = this.parseOr();
    const extra = this.peek();
    if (extra) {
      throw new FilterSyntaxError(`Unexpected "${extra.value}"`, this.expression, extra.pos);
    }
    return node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token | undefined {
    return this.tokens[this.index++];
  }

  private isOp(token: Token | undefined, value: string): boolean {
    return token !== undefined && token.type === 'op' && token.value === value;
  }

  private parseOr(): FilterNode {
    let left = this.parseAnd();
    while (this.isOp(this.peek(), '|')) {
      this.next();
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): FilterNode {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      if (this.isOp(token, '&')) {
        this.next();
      } else if (!token || this.isOp(token, '|') || this.isOp(token, ')')) {
        return left;
      }
      // juxtaposition is an implicit "&"
      left = { kind: 'and', left, right: this.parseUnary() };
    }
  }

  private parseUnary(): FilterNode {
    if (this.isOp(this.peek(), '!')) {
      this.next();
      return { kind: 'not', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): FilterNode {
    const token = this.next();
    if (!token) {
      throw new FilterSyntaxError('Unexpected end of expression', this.expression, this.expression.length);
    }

    if (token.type === 'op') {
      if (token.value === '(') {
        const inner = this.parseOr();
        const close = this.next();
        if (!this.isOp(close, ')')) {
          throw new FilterSyntaxError('Missing ")"', this.expression, close?.pos ?? this.expression.length);
        }
        return inner;
      }
      throw new FilterSyntaxError(`Unexpected "${token.value}"`, this.expression, token.pos);
    }

    if (token.type === 'word') {
      return { kind: 'url', pattern: compilePattern(token.value, this.expression, token.pos) };
    }

    return this.parseFilter(token);
  }

  private parseFilter(token: Token): FilterNode {
    const name = token.value;

    if (NO_ARG_FILTERS.has(name)) {
      switch (name) {
        case '~all': return { kind: 'all' };
        case '~a': return { kind: 'asset' };
        case '~q': return { kind: 'noResponse' };
        default: return { kind: 'hasResponse' };
      }
    }

    const arg = this.next();
    if (!arg || arg.type === 'op') {
      throw new FilterSyntaxError(`${name} expects an argument`, this.expression, arg?.pos ?? this.expression.length);
    }

    if (name === '~c') {
      if (!/^\d+$/.test(arg.value)) {
        throw new FilterSyntaxError(`~c expects a status code, got "${arg.value}"`, this.expression, arg.pos);
      }
      return { kind: 'code', code: parseInt(arg.value, 10) };
    }

    const build = REGEX_FILTERS[name];
    if (!build) {
      throw new FilterSyntaxError(`Unknown filter "${name}"`, this.expression, token.pos);
    }
    return build(compilePattern(arg.value, this.expression, arg.pos));
  }
}

function headerLines(headers: Record<string, string> | undefined): string[] {
  return Object.entries(headers ?? {}).map(([name, value]) => `${name}: ${value}`);
}

function sides(side: Side): { request: boolean; response: boolean } {
  return { request: side !== 'response', response: side !== 'request' };
}

function evaluate(node: FilterNode, exchange: Exchange, rules: StaticResourceRules): boolean {
  switch (node.kind) {
    case 'all':
      return true;
    case 'asset':
      return classify(exchange, rules) === 'static';
    case 'noResponse':
      return !exchange.response;
    case 'hasResponse':
      return !!exchange.response;
    case 'code':
      return exchange.response?.status === node.code;
    case 'method':
      return node.pattern.test(exchange.method);
    case 'url':
      return node.pattern.test(exchange.url);
    case 'domain':
      return node.pattern.test(exchange.host);
    case 'path':
      return node.pattern.test(exchange.path);
    case 'src':
      return node.pattern.test(exchange.clientAddress);
    case 'header': {
      const { request, response } = sides(node.side);
      const pattern = node.pattern;
      const lines = [
        ...(request ? headerLines(exchange.requestHeaders) : []),
        ...(response ? headerLines(exchange.response?.headers) : []),
      ];
      return lines.some(line => pattern.test(line));
    }
    case 'body': {
      const { request, response } = sides(node.side);
      return (request && node.pattern.test(decodeBody(exchange.requestBody)))
        || (response && !!exchange.response && node.pattern.test(decodeBody(exchange.response.body)));
    }
    case 'contentType': {
      const { request, response } = sides(node.side);
      return (request && node.pattern.test(getHeader(exchange.requestHeaders, 'content-type')))
        || (response && !!exchange.response && node.pattern.test(getHeader(exchange.response.headers, 'content-type')));
    }
    case 'not':
      return !evaluate(node.operand, exchange, rules);
    case 'and':
      return evaluate(node.left, exchange, rules) && evaluate(node.right, exchange, rules);
    case 'or':
      return evaluate(node.left, exchange, rules) || evaluate(node.right, exchange, rules);
  }
}

/**
 * Compile a filter expression. Returns null for a blank expression (no
 * filtering) and throws FilterSyntaxError when it cannot be parsed.
 *
 * @param rules - static resource rules used by `~a`
 */
export function compileFilter(expression: string, rules: StaticResourceRules): FilterPredicate | null {
  const trimmed = expression.trim();
  if (!trimmed) {
    return null;
  }

  const ast = new Parser(tokenize(trimmed), trimmed).parse();
  return exchange => evaluate(ast, exchange, rules);
}
