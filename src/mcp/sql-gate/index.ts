export { changesSessionState, classifyStatement } from './statement-classifier.js';
export { PermissionPolicy, parseCategory } from './permission-policy.js';
export { tokenize, splitStatements, hasTopLevelKeyword } from './sql-lexer.js';
export type { Token, TokenType } from './sql-lexer.js';
export {
  quoteIdentifier,
  qualifiedName,
  dottedName,
  quoteLiteral,
  renderLiteral,
  assertDataType,
  assertDefaultExpression,
} from './identifiers.js';
