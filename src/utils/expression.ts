import { ConfigurationError } from '../errors.js';

const EXPRESSION_RE = /\$\{\{\s*([\s\S]+?)\s*\}\}/g;
const WRAPPED_RE = /^\$\{\{\s*([\s\S]+?)\s*\}\}$/;

export type ExpressionScope = Record<string, unknown>;

export function renderTemplate(input: unknown, ctx: ExpressionScope): unknown {
  if (typeof input === 'string') return renderString(input, ctx);
  if (Array.isArray(input)) return input.map(v => renderTemplate(v, ctx));
  if (input && typeof input === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(input)) {
      out[k] = renderTemplate(v, ctx);
    }
    return out;
  }
  return input;
}

export function renderString(str: string, ctx: ExpressionScope): string {
  return str.replace(EXPRESSION_RE, (_, expr: string) => {
    const value = evalExpression(expr.trim(), ctx);
    return value == null ? '' : String(value);
  });
}

/**
 * Value of an output declaration: a lone `${{ expr }}` keeps the type of
 * `expr`; text with embedded expressions is rendered to a string.
 */
export function evaluateValue(value: string, ctx: ExpressionScope): unknown {
  const m = value.trim().match(WRAPPED_RE);
  if (m && !m[1].includes('}}')) return evalExpression(m[1], ctx);
  return renderString(value, ctx);
}

/** Evaluates an `if:` condition, with or without the `${{ }}` wrapper. */
export function evalCondition(condition: string, ctx: ExpressionScope): boolean {
  const str = condition.trim();
  const m = str.match(WRAPPED_RE);
  return toBoolean(evalExpression(m ? m[1] : str, ctx));
}

export function toBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') {
    const v = value.trim().toLowerCase();
    if (['', '0', 'false', 'no', 'off', 'null', 'undefined', 'nan'].includes(v)) return false;
    return true;
  }
  if (value == null) return false;
  return Boolean(value);
}

// Grammar:
//   or      := and ('||' and)*
//   and     := unary ('&&' unary)*
//   unary   := '!' unary | compare
//   compare := primary (('==' | '!=') primary)?
//   primary := '(' or ')' | literal | call | path

type Token =
  | { kind: 'op'; value: string }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'ident'; value: string };

function tokenize(expr: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < expr.length) {
    const ch = expr[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    const two = expr.slice(i, i + 2);
    if (['==', '!=', '&&', '||'].includes(two)) {
      tokens.push({ kind: 'op', value: two });
      i += 2;
      continue;
    }
    if ('!().,[]'.includes(ch)) {
      tokens.push({ kind: 'op', value: ch });
      i++;
      continue;
    }
    if (ch === '\'' || ch === '"') {
      let j = i + 1;
      let value = '';
      while (j < expr.length && expr[j] !== ch) value += expr[j++];
      if (j >= expr.length) throw new ConfigurationError(`unterminated string in expression: ${expr}`);
      tokens.push({ kind: 'string', value });
      i = j + 1;
      continue;
    }
    const num = expr.slice(i).match(/^-?\d+(?:\.\d+)?/);
    if (num) {
      tokens.push({ kind: 'number', value: Number(num[0]) });
      i += num[0].length;
      continue;
    }
    const ident = expr.slice(i).match(/^[A-Za-z_][A-Za-z0-9_-]*/);
    if (ident) {
      tokens.push({ kind: 'ident', value: ident[0] });
      i += ident[0].length;
      continue;
    }
    throw new ConfigurationError(`unexpected "${ch}" in expression: ${expr}`);
  }
  return tokens;
}

const FUNCTIONS: Record<string, (args: unknown[], ctx: ExpressionScope) => unknown> = {
  contains: ([haystack, needle]) => {
    if (Array.isArray(haystack)) return haystack.some(v => looseEquals(v, needle));
    return asString(haystack).toLowerCase().includes(asString(needle).toLowerCase());
  },
  startsWith: ([s, prefix]) => asString(s).toLowerCase().startsWith(asString(prefix).toLowerCase()),
  endsWith: ([s, suffix]) => asString(s).toLowerCase().endsWith(asString(suffix).toLowerCase()),
  // steps only run while every prior step succeeded
  success: () => true
};

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[], private readonly ctx: ExpressionScope, private readonly source: string) {}

  parse(): unknown {
    const value = this.or();
    if (this.pos < this.tokens.length) this.fail('unexpected trailing input');
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private isOp(value: string): boolean {
    const t = this.peek();
    return t?.kind === 'op' && t.value === value;
  }

  private expect(value: string) {
    if (!this.isOp(value)) this.fail(`expected "${value}"`);
    this.pos++;
  }

  private fail(message: string): never {
    throw new ConfigurationError(`${message} in expression: ${this.source}`);
  }

  private or(): unknown {
    let left = this.and();
    while (this.isOp('||')) {
      this.pos++;
      const right = this.and();
      left = toBoolean(left) ? left : right;
    }
    return left;
  }

  private and(): unknown {
    let left = this.unary();
    while (this.isOp('&&')) {
      this.pos++;
      const right = this.unary();
      left = toBoolean(left) ? right : left;
    }
    return left;
  }

  private unary(): unknown {
    if (this.isOp('!')) {
      this.pos++;
      return !toBoolean(this.unary());
    }
    return this.compare();
  }

  private compare(): unknown {
    const left = this.primary();
    if (this.isOp('==') || this.isOp('!=')) {
      const negate = this.isOp('!=');
      this.pos++;
      const right = this.primary();
      return negate ? !looseEquals(left, right) : looseEquals(left, right);
    }
    return left;
  }

  private primary(): unknown {
    const t = this.peek();
    if (!t) return this.fail('unexpected end');
    if (this.isOp('(')) {
      this.pos++;
      const value = this.or();
      this.expect(')');
      return value;
    }
    if (t.kind === 'string' || t.kind === 'number') {
      this.pos++;
      return t.value;
    }
    if (t.kind !== 'ident') return this.fail(`unexpected "${t.value}"`);
    this.pos++;
    if (t.value === 'true') return true;
    if (t.value === 'false') return false;
    if (t.value === 'null') return null;
    if (this.isOp('(')) return this.call(t.value);
    return this.path(t.value);
  }

  private call(name: string): unknown {
    const fn = Object.prototype.hasOwnProperty.call(FUNCTIONS, name) ? FUNCTIONS[name] : undefined;
    if (!fn) return this.fail(`unknown function ${name}()`);
    this.expect('(');
    const args: unknown[] = [];
    while (!this.isOp(')')) {
      args.push(this.or());
      if (this.isOp(',')) this.pos++;
      else break;
    }
    this.expect(')');
    return fn(args, this.ctx);
  }

  private path(head: string): unknown {
    let cur: unknown = property(this.ctx, head);
    for (;;) {
      if (this.isOp('.')) {
        this.pos++;
        const t = this.peek();
        if (t?.kind !== 'ident') return this.fail('expected property name');
        this.pos++;
        cur = property(cur, t.value);
        continue;
      }
      if (this.isOp('[')) {
        this.pos++;
        const key = this.or();
        this.expect(']');
        cur = property(cur, asString(key));
        continue;
      }
      return cur;
    }
  }
}

function property(target: unknown, key: string): unknown {
  if (target == null || typeof target !== 'object') return undefined;
  if (!Object.prototype.hasOwnProperty.call(target, key)) return undefined;
  return Reflect.get(target, key);
}

function asString(value: unknown): string {
  return value == null ? '' : String(value);
}

function looseEquals(a: unknown, b: unknown): boolean {
  if (typeof a === 'number' || typeof b === 'number') {
    const na = Number(a);
    const nb = Number(b);
    if (!Number.isNaN(na) && !Number.isNaN(nb)) return na === nb;
  }
  return asString(a).toLowerCase() === asString(b).toLowerCase();
}

/**
 * Evaluates an expression such as
 * `steps.restore.outputs.cache-hit != 'true' && startsWith(event.ref, 'main')`
 * against `ctx`. Unknown paths evaluate to undefined.
 */
export function evalExpression(expr: string, ctx: ExpressionScope): unknown {
  return new Parser(tokenize(expr), ctx, expr).parse();
}
