// Unit registry: parses unit expressions ("t CO2/GWh", "t CO2/(t Steel)") into a
// scale factor and base dimensions, and converts quantities between compatible units.
//
// Grammar: whitespace or "*" multiplies, "/" divides by the whole product that follows
// it, "^" or "**" raises to an integer power, parentheses group.

import { ISSUE_TYPE } from './constants';
import { errorIssue } from './data-processing/issues';
import { ScoringError } from './errors';
import type { Quantity } from './types';

type Dimensions = Readonly<Record<string, number>>;

export interface ParsedUnit {
  /** Multiplier to the base unit of each dimension (t, Wh, m, ...) */
  factor: number;
  dims: Dimensions;
}

const MASS: Dimensions = { mass: 1 };
const ENERGY: Dimensions = { energy: 1 };
const LENGTH: Dimensions = { length: 1 };
const WH_PER_J = 1 / 3600;

// Substance and product tags behave as their own dimensions, so "t CO2" never
// converts to "t Steel" while "(t CO2/(t Steel)) * Mt Steel" reduces to a CO2 mass.
const UNIT_SYMBOLS = new Map<string, ParsedUnit>([
  ['g', { factor: 1e-6, dims: MASS }],
  ['kg', { factor: 1e-3, dims: MASS }],
  ['t', { factor: 1, dims: MASS }],
  ['kt', { factor: 1e3, dims: MASS }],
  ['Mt', { factor: 1e6, dims: MASS }],
  ['Gt', { factor: 1e9, dims: MASS }],
  ['Wh', { factor: 1, dims: ENERGY }],
  ['kWh', { factor: 1e3, dims: ENERGY }],
  ['MWh', { factor: 1e6, dims: ENERGY }],
  ['GWh', { factor: 1e9, dims: ENERGY }],
  ['TWh', { factor: 1e12, dims: ENERGY }],
  ['J', { factor: WH_PER_J, dims: ENERGY }],
  ['kJ', { factor: 1e3 * WH_PER_J, dims: ENERGY }],
  ['MJ', { factor: 1e6 * WH_PER_J, dims: ENERGY }],
  ['GJ', { factor: 1e9 * WH_PER_J, dims: ENERGY }],
  ['TJ', { factor: 1e12 * WH_PER_J, dims: ENERGY }],
  ['PJ', { factor: 1e15 * WH_PER_J, dims: ENERGY }],
  ['EJ', { factor: 1e18 * WH_PER_J, dims: ENERGY }],
  ['m', { factor: 1, dims: LENGTH }],
  ['km', { factor: 1e3, dims: LENGTH }],
  ['CO2', { factor: 1, dims: { CO2: 1 } }],
  ['CO2e', { factor: 1, dims: { CO2: 1 } }],
  ['Steel', { factor: 1, dims: { Steel: 1 } }],
  ['Cement', { factor: 1, dims: { Cement: 1 } }],
  ['Aluminum', { factor: 1, dims: { Aluminum: 1 } }],
  ['passenger', { factor: 1, dims: { passenger: 1 } }],
  ['delta_degC', { factor: 1, dims: { temperature: 1 } }],
  ['dimensionless', { factor: 1, dims: {} }],
  ['percent', { factor: 0.01, dims: {} }]
]);

function unitError(message: string): ScoringError {
  return new ScoringError(errorIssue(ISSUE_TYPE.UNIT_MISMATCH, message));
}

// ============================================================================
// DIMENSION ALGEBRA
// ============================================================================

function combine(a: ParsedUnit, b: ParsedUnit, sign: 1 | -1): ParsedUnit {
  const dims: Record<string, number> = { ...a.dims };
  for (const [dim, exp] of Object.entries(b.dims)) {
    const next = (dims[dim] ?? 0) + sign * exp;
    if (next === 0) delete dims[dim];
    else dims[dim] = next;
  }
  return { factor: sign === 1 ? a.factor * b.factor : a.factor / b.factor, dims };
}

function raise(unit: ParsedUnit, exponent: number): ParsedUnit {
  const dims: Record<string, number> = {};
  for (const [dim, exp] of Object.entries(unit.dims)) {
    if (exp * exponent !== 0) dims[dim] = exp * exponent;
  }
  return { factor: unit.factor ** exponent, dims };
}

function sameDimensions(a: Dimensions, b: Dimensions): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((k) => a[k] === b[k]);
}

// ============================================================================
// PARSING
// ============================================================================

type Token = { kind: 'symbol'; text: string } | { kind: 'number'; value: number } | { kind: 'op'; text: string };

const TOKEN_PATTERN = /\s*(\*\*|[*/^()]|[A-Za-z_][A-Za-z0-9_]*|-?\d+(?:\.\d+)?)/y;

function tokenize(expr: string): Token[] {
  const tokens: Token[] = [];
  const source = expr.trim();
  let pos = 0;
  while (pos < source.length) {
    TOKEN_PATTERN.lastIndex = pos;
    const match = TOKEN_PATTERN.exec(source);
    if (!match) throw unitError(`Cannot parse unit "${expr}" at position ${pos}`);
    pos = TOKEN_PATTERN.lastIndex;
    const text = match[1];
    if (/^[A-Za-z_]/.test(text)) tokens.push({ kind: 'symbol', text });
    else if (/^-?\d/.test(text)) tokens.push({ kind: 'number', value: Number(text) });
    else tokens.push({ kind: 'op', text });
  }
  return tokens;
}

class UnitParser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string
  ) {}

  parse(): ParsedUnit {
    if (this.tokens.length === 0) return { factor: 1, dims: {} };
    const unit = this.expression();
    if (this.pos < this.tokens.length) throw unitError(`Unexpected trailing input in unit "${this.source}"`);
    return unit;
  }

  private isOp(token: Token | undefined, ...ops: string[]): boolean {
    return token?.kind === 'op' && ops.includes(token.text);
  }

  private expression(): ParsedUnit {
    let result = this.product();
    while (this.isOp(this.tokens[this.pos], '/')) {
      this.pos++;
      result = combine(result, this.product(), -1);
    }
    return result;
  }

  private product(): ParsedUnit {
    let result = this.power();
    for (;;) {
      const next = this.tokens[this.pos];
      if (this.isOp(next, '*')) {
        this.pos++;
      } else if (!(next?.kind === 'symbol' || next?.kind === 'number' || this.isOp(next, '('))) {
        return result;
      }
      result = combine(result, this.power(), 1);
    }
  }

  private power(): ParsedUnit {
    const base = this.atom();
    if (!this.isOp(this.tokens[this.pos], '^', '**')) return base;
    this.pos++;
    const exponent = this.tokens[this.pos++];
    if (exponent?.kind !== 'number' || !Number.isInteger(exponent.value)) {
      throw unitError(`Expected an integer exponent in unit "${this.source}"`);
    }
    return raise(base, exponent.value);
  }

  private atom(): ParsedUnit {
    const token = this.tokens[this.pos++];
    if (token?.kind === 'number') return { factor: token.value, dims: {} };
    if (token?.kind === 'symbol') {
      const def = UNIT_SYMBOLS.get(token.text);
      if (!def) throw unitError(`Unknown unit "${token.text}" in "${this.source}"`);
      return def;
    }
    if (this.isOp(token, '(')) {
      const inner = this.expression();
      if (!this.isOp(this.tokens[this.pos++], ')')) throw unitError(`Unbalanced parentheses in unit "${this.source}"`);
      return inner;
    }
    throw unitError(`Unexpected end of unit "${this.source}"`);
  }
}

const parsedUnits = new Map<string, ParsedUnit>();

export function parseUnit(unit: string): ParsedUnit {
  const cached = parsedUnits.get(unit);
  if (cached) return cached;
  const parsed = new UnitParser(tokenize(unit), unit).parse();
  parsedUnits.set(unit, parsed);
  return parsed;
}

// ============================================================================
// CONVERSION & ARITHMETIC
// ============================================================================

/** Factor that converts a magnitude in `from` into `to`; throws UNIT_MISMATCH */
export function conversionFactor(from: string, to: string): number {
  if (from === to) return 1;
  const source = parseUnit(from);
  const target = parseUnit(to);
  if (!sameDimensions(source.dims, target.dims)) {
    throw unitError(`Cannot convert "${from}" to "${to}": incompatible dimensions`);
  }
  return source.factor / target.factor;
}

/** Unit of a product of two quantities */
export function multiplyUnits(a: string, b: string): string {
  const wrap = (u: string) => (u.includes('/') ? `(${u})` : u);
  return `${wrap(a)} * ${wrap(b)}`;
}

export function convertQuantity(q: Quantity, to: string): Quantity {
  return { magnitude: q.magnitude * conversionFactor(q.unit, to), unit: to };
}

/** Sum in the unit of `a` */
export function addQuantities(a: Quantity, b: Quantity): Quantity {
  return { magnitude: a.magnitude + b.magnitude * conversionFactor(b.unit, a.unit), unit: a.unit };
}

const QUANTITY_PATTERN = /^\s*(-?\d+(?:\.\d+)?(?:[eE][-+]?\d+)?)\s*(.*)$/;

/** Parse "1.5 Gt CO2" into a Quantity; a bare number is dimensionless */
export function parseQuantity(text: string): Quantity {
  const match = QUANTITY_PATTERN.exec(text);
  if (!match) throw unitError(`Cannot parse quantity "${text}"`);
  const unit = match[2].trim() || 'dimensionless';
  parseUnit(unit);
  return { magnitude: Number(match[1]), unit };
}
