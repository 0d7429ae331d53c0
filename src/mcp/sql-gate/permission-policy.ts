import { ConfigurationError } from '../errors.js';
import { logger } from '../logger.js';
import { STATEMENT_CATEGORIES, type StatementCategory } from '../types.js';

const CATEGORY_BY_NAME = new Map<string, StatementCategory>(
  STATEMENT_CATEGORIES.map(category => [category.toLowerCase(), category])
);

export function parseCategory(name: string): StatementCategory | undefined {
  return CATEGORY_BY_NAME.get(name.trim().toLowerCase());
}

/**
 * Allow/deny mapping over statement categories. Immutable once built; a
 * category missing from configuration is denied.
 */
export class PermissionPolicy {
  private readonly allowed: ReadonlySet<StatementCategory>;

  private constructor(allowed: Iterable<StatementCategory>) {
    this.allowed = new Set(allowed);
    Object.freeze(this);
  }

  static denyAll(): PermissionPolicy {
    return new PermissionPolicy([]);
  }

  static allowing(...categories: StatementCategory[]): PermissionPolicy {
    return new PermissionPolicy(categories);
  }

  /**
   * Builds a policy from `sql_statement_permissions`. Accepts the list-of-maps
   * shape (`- Select: true`) or a plain map.
   */
  static fromEntries(entries: unknown): PermissionPolicy {
    if (entries === undefined || entries === null) {
      return PermissionPolicy.denyAll();
    }

    const pairs: Array<[string, unknown]> = [];
    if (Array.isArray(entries)) {
      entries.forEach((entry: unknown, index) => {
        if (!isMapping(entry)) {
          throw new ConfigurationError(
            `sql_statement_permissions[${index}] must be a mapping of category to boolean`
          );
        }
        pairs.push(...Object.entries(entry));
      });
    } else if (isMapping(entries)) {
      pairs.push(...Object.entries(entries));
    } else {
      throw new ConfigurationError('sql_statement_permissions must be a list or a mapping');
    }

    const seen = new Set<StatementCategory>();
    const allowed: StatementCategory[] = [];

    for (const [name, value] of pairs) {
      const category = parseCategory(name);
      if (!category) {
        throw new ConfigurationError(`Unrecognized statement category '${name}' in sql_statement_permissions`, {
          category: name,
          allowed: [...STATEMENT_CATEGORIES],
        });
      }
      if (typeof value !== 'boolean') {
        throw new ConfigurationError(
          `Permission for '${category}' must be true or false, got ${JSON.stringify(value)}`,
          { category }
        );
      }
      if (seen.has(category)) {
        throw new ConfigurationError(`Statement category '${category}' is listed more than once`, { category });
      }
      seen.add(category);
      if (value) {
        allowed.push(category);
      }
    }

    if (allowed.includes('Unknown')) {
      logger.warn('Statement category Unknown is permitted; statements the classifier cannot read will reach the warehouse');
    }

    return new PermissionPolicy(allowed);
  }

  isAllowed(category: StatementCategory): boolean {
    return this.allowed.has(category);
  }

  allowedCategories(): StatementCategory[] {
    return STATEMENT_CATEGORIES.filter(category => this.allowed.has(category));
  }

  toJSON(): Record<string, boolean> {
    return Object.fromEntries(STATEMENT_CATEGORIES.map(category => [category, this.allowed.has(category)]));
  }
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
