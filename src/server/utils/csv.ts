// =============================================================================
// CSV export helpers
// =============================================================================
import type { FieldChange, ReconciliationIssue } from '../types';

/** Quotes a cell when it contains a comma, quote or line break. */
export function csvCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  const text = value instanceof Date ? value.toISOString() : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(header: string[], rows: unknown[][]): string {
  return [header, ...rows].map((row) => row.map(csvCell).join(',')).join('\n') + '\n';
}

const CHANGE_COLUMNS = [
  'Timestamp',
  'Company',
  'Entity',
  'Wrike ID',
  'HubSpot ID',
  'Field',
  'System Changed',
  'Old Value',
  'New Value',
  'Changed',
  'Action',
];

/** One activity's per-field change log as CSV */
export function fieldChangesToCsv(changes: FieldChange[]): string {
  return toCsv(
    CHANGE_COLUMNS,
    changes.map((c) => [
      c.createdAt,
      c.companyName,
      c.entityType,
      c.wrikeId,
      c.hubspotId,
      c.fieldName,
      c.systemChanged,
      c.oldValue,
      c.newValue,
      c.changed ? 'yes' : 'no',
      c.action,
    ]),
  );
}

const ISSUE_COLUMNS = ['Issue ID', 'Created', 'Source', 'Entity', 'Entity ID', 'Issue Type', 'Detail'];

/** Open reconciliation issues as CSV, in the order given */
export function issuesToCsv(issues: ReconciliationIssue[]): string {
  return toCsv(
    ISSUE_COLUMNS,
    issues.map((i) => [i.id, i.createdAt, i.source, i.entityType, i.entityId, i.issueType, i.detail]),
  );
}
