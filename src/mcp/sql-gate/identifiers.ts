import { ToolError } from '../errors.js';

const SIMPLE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;
const DATA_TYPE = /^[A-Za-z][A-Za-z0-9_ ]*(\(\s*\d+\s*(,\s*\d+\s*)?\))?$/;

/**
 * Renders an identifier for interpolation into generated SQL. Plain names pass
 * through unquoted (and so keep Snowflake's upper-case folding); anything else
 * is double-quoted with embedded quotes doubled.
 */
export function quoteIdentifier(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ToolError('ValidationError', 'Identifier must not be empty');
  }
  if (SIMPLE_IDENTIFIER.test(trimmed)) {
    return trimmed;
  }
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    const inner = trimmed.slice(1, -1);
    if (!inner.replace(/""/g, '').includes('"')) {
      return trimmed;
    }
  }
  return `"${trimmed.replace(/"/g, '""')}"`;
}

export function qualifiedName(...parts: Array<string | undefined>): string {
  const present = parts.filter((part): part is string => part !== undefined && part.trim() !== '');
  if (present.length === 0) {
    throw new ToolError('ValidationError', 'Object name must not be empty');
  }
  return present.map(quoteIdentifier).join('.');
}

/**
 * Splits a dotted name such as `orders.region` into quoted parts.
 */
export function dottedName(name: string): string {
  return qualifiedName(...name.split('.'));
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
}

export function renderLiteral(value: string | number | boolean | null): string {
  if (value === null) {
    return 'NULL';
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ToolError('ValidationError', `Numeric literal must be finite, got ${value}`);
    }
    return String(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE';
  }
  return quoteLiteral(value);
}

// A niladic keyword, a sequence reference or a call with numeric arguments,
// e.g. CURRENT_TIMESTAMP(3), UUID_STRING(), orders_seq.NEXTVAL.
const DEFAULT_EXPRESSION = /^[A-Za-z_][A-Za-z0-9_$]*(\.[A-Za-z_][A-Za-z0-9_$]*)*(\(\s*(\d+(\s*,\s*\d+)*)?\s*\))?$/;

export function assertDefaultExpression(expression: string): string {
  const trimmed = expression.trim();
  if (!DEFAULT_EXPRESSION.test(trimmed)) {
    throw new ToolError('ValidationError', `Unsupported column default expression '${expression}'`);
  }
  return trimmed;
}

export function assertDataType(type: string): string {
  const trimmed = type.trim();
  if (!DATA_TYPE.test(trimmed)) {
    throw new ToolError('ValidationError', `Invalid column data type '${type}'`);
  }
  return trimmed.toUpperCase();
}
