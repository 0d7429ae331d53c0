import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { ColumnInfo, StatementCategory } from '../types.js';

export type AuditStatus = 'executed' | 'denied' | 'failed';

export interface AuditEntry {
  toolName: string;
  sql: string;
  category: StatementCategory;
  status: AuditStatus;
  columns?: ColumnInfo[];
  rowCount?: number;
  executionTimeMs?: number;
  error?: string;
}

export interface AuditSink {
  record(entry: AuditEntry): Promise<void>;
}

const STATUS_ICONS: Record<AuditStatus, string> = {
  executed: '✅',
  denied: '⛔',
  failed: '❌',
};

/**
 * Appends one Markdown section per SQL execution attempt. Writes are
 * serialized so entries keep their request order.
 */
export class MarkdownAuditLogger implements AuditSink {
  private requestNumber = 0;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly logFile: string,
    private readonly sessionId: string = randomUUID(),
    private readonly now: () => Date = () => new Date()
  ) {}

  record(entry: AuditEntry): Promise<void> {
    this.requestNumber++;
    const text = formatAuditEntry(entry, {
      sessionId: this.sessionId,
      requestNumber: this.requestNumber,
      timestamp: this.now().toISOString(),
    });

    this.pending = this.pending.then(() => this.append(text));
    return this.pending;
  }

  private async append(text: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.logFile), { recursive: true });
      await fs.appendFile(this.logFile, text + '\n');
    } catch (error) {
      logger.warn('Failed to write audit log entry', { logFile: this.logFile, error: errorMessage(error) });
    }
  }
}

export function formatAuditEntry(
  entry: AuditEntry,
  context: { sessionId: string; requestNumber: number; timestamp: string }
): string {
  let md = `## Session: ${context.sessionId} | ${context.timestamp}\n\n`;
  md += `### Request #${context.requestNumber}\n\n`;
  md += `**Tool**: \`${entry.toolName}\`\n\n`;
  md += `**Query**:\n\`\`\`sql\n${entry.sql}\n\`\`\`\n\n`;
  md += `**Category**: ${entry.category}\n\n`;
  md += `**Status**: ${STATUS_ICONS[entry.status]} ${entry.status}\n\n`;

  if (entry.columns && entry.columns.length > 0) {
    md += '| Column | Type |\n';
    md += '|--------|------|\n';
    for (const column of entry.columns) {
      md += `| ${column.name} | ${column.type} |\n`;
    }
    md += '\n';
  }

  if (entry.rowCount !== undefined) {
    md += `**Row Count**: ${entry.rowCount}\n\n`;
  }
  if (entry.executionTimeMs !== undefined) {
    md += `**Execution Time**: ${entry.executionTimeMs}ms\n\n`;
  }
  if (entry.error) {
    md += `#### Error\n\n\`\`\`\n${entry.error}\n\`\`\`\n\n`;
  }

  return md;
}
