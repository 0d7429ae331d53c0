import type { ColumnInfo, QueryResultPayload, Row } from '../types.js';

export function normalizeRows(rows: readonly Row[]): QueryResultPayload {
  const data = rows.map(normalizeRow);
  return {
    metadata: {
      columns: data.length > 0 ? extractColumns(data) : [],
      rowCount: data.length,
    },
    data,
  };
}

export function normalizeRow(row: Row): Row {
  const normalized: Row = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[key] = normalizeValue(value);
  }
  return normalized;
}

export function normalizeValue(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }
  if (hasToJSON(value)) {
    // snowflake-sdk timestamp and date wrappers
    return normalizeValue(value.toJSON());
  }
  if (value !== null && typeof value === 'object') {
    const nested: Row = {};
    for (const [key, inner] of Object.entries(value)) {
      nested[key] = normalizeValue(inner);
    }
    return nested;
  }
  return value;
}

function hasToJSON(value: unknown): value is { toJSON(): unknown } {
  return (
    value !== null &&
    typeof value === 'object' &&
    'toJSON' in value &&
    typeof value.toJSON === 'function'
  );
}

// Column types are inferred from the first row carrying a non-null value.
function extractColumns(rows: readonly Row[]): ColumnInfo[] {
  const names = Object.keys(rows[0]);
  return names.map(name => {
    const sample = rows.find(row => row[name] !== null && row[name] !== undefined)?.[name];
    return {
      name,
      type: sample === undefined ? 'null' : Array.isArray(sample) ? 'array' : typeof sample,
      nullable: rows.some(row => row[name] === null),
    };
  });
}
