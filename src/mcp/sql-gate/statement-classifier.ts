import type { StatementCategory } from '../types.js';
import { tokenize, type Token } from './sql-lexer.js';

const LEADING_KEYWORDS: Record<string, StatementCategory> = {
  SELECT: 'Select',
  DESC: 'Describe',
  DESCRIBE: 'Describe',
  INSERT: 'Insert',
  UPDATE: 'Update',
  DELETE: 'Delete',
  MERGE: 'Merge',
  TRUNCATE: 'TruncateTable',
  CREATE: 'Create',
  ALTER: 'Alter',
  DROP: 'Drop',
  COMMIT: 'Commit',
  ROLLBACK: 'Rollback',
  USE: 'Use',
  COMMENT: 'Comment',
};

const COMMAND_KEYWORDS = new Set([
  'SHOW',
  'LIST',
  'LS',
  'CALL',
  'GRANT',
  'REVOKE',
  'PUT',
  'GET',
  'REMOVE',
  'RM',
  'EXPLAIN',
  'EXECUTE',
  'UNDROP',
  'COPY',
  'SET',
  'UNSET',
]);

// Commands that only read metadata and leave the session as it was.
const READ_ONLY_COMMANDS = new Set(['SHOW', 'LIST', 'LS', 'EXPLAIN']);

const CTE_BODY_KEYWORDS: Record<string, StatementCategory> = {
  SELECT: 'Select',
  INSERT: 'Insert',
  UPDATE: 'Update',
  DELETE: 'Delete',
  MERGE: 'Merge',
};

/**
 * Assigns a statement category from the leading keyword(s) of a single SQL
 * statement. Pure; never throws. Anything unrecognised is `Unknown`.
 */
export function classifyStatement(sql: string): StatementCategory {
  const tokens = tokenize(sql);
  const first = tokens[0];

  if (!first) {
    return 'Unknown';
  }

  if (first.type === 'punct' && first.value === '(') {
    return 'Select';
  }

  if (first.type !== 'word') {
    return 'Unknown';
  }

  const second = tokens[1];

  switch (first.value) {
    case 'WITH':
      return classifyCommonTableExpression(tokens);
    case 'BEGIN':
      return isTransactionStart(second) ? 'Transaction' : 'Unknown';
    case 'START':
      return isWord(second, 'TRANSACTION') ? 'Transaction' : 'Unknown';
    case 'EXECUTE':
      // EXECUTE IMMEDIATE runs dynamic SQL whose intent cannot be read here.
      return isWord(second, 'IMMEDIATE') ? 'Unknown' : 'Command';
  }

  const category = LEADING_KEYWORDS[first.value];
  if (category) {
    return category;
  }

  if (COMMAND_KEYWORDS.has(first.value)) {
    return 'Command';
  }

  return 'Unknown';
}

/**
 * True when running the statement can leave state on the session that a later
 * USE cannot undo: changed context, session parameters or variables, or an
 * open transaction. Unknown statements count as changing it.
 */
export function changesSessionState(sql: string, category: StatementCategory = classifyStatement(sql)): boolean {
  switch (category) {
    case 'Use':
    case 'Transaction':
    case 'Alter':
    case 'Unknown':
      return true;
    case 'Command': {
      const first = tokenize(sql)[0];
      return first === undefined || !READ_ONLY_COMMANDS.has(first.value);
    }
    default:
      return false;
  }
}

function isWord(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.type === 'word' && token.value === value;
}

// BEGIN alone, BEGIN WORK, BEGIN TRANSACTION, BEGIN NAME x. BEGIN followed by
// anything else opens a scripting block.
function isTransactionStart(token: Token | undefined): boolean {
  if (token === undefined) {
    return true;
  }
  if (token.type === 'punct' && token.value === ';') {
    return true;
  }
  return isWord(token, 'TRANSACTION') || isWord(token, 'WORK') || isWord(token, 'NAME');
}

function classifyCommonTableExpression(tokens: Token[]): StatementCategory {
  let depth = 0;
  for (const token of tokens.slice(1)) {
    if (token.type === 'punct') {
      if (token.value === '(') depth++;
      if (token.value === ')') depth = Math.max(0, depth - 1);
      if (token.value === ';' && depth === 0) break;
      continue;
    }
    if (depth === 0 && token.type === 'word') {
      const category = CTE_BODY_KEYWORDS[token.value];
      if (category) {
        return category;
      }
    }
  }
  return 'Unknown';
}
