// =============================================================================
// Sync Diagnostics — per-cycle issue aggregator + operator report
// =============================================================================
// One instance per orchestrator, reset at the start of every cycle. The
// routines feed it categorised issues and skips; the orchestrator attaches
// generateReport() to every completed or failed result.
//
// Recommendations come from a fixed rule table keyed on issue counts.
// =============================================================================
import { GatewayError, NotFoundError, RateLimitExhaustedError } from '../utils/GatewayError';

export type IssueCategory =
  | 'REMOTE_PROPERTY_MISSING'
  | 'RECORD_NOT_FOUND'
  | 'SEARCH_QUERY_REJECTED'
  | 'REQUIRED_FIELD_MISSING'
  | 'NO_CROSS_REFERENCE_LINK'
  | 'STALE_LOCAL_MAPPING'
  | 'RATE_LIMIT_EXHAUSTED'
  | 'TYPE_MISMATCH';

export interface CategoryInfo {
  description: string;
  suggestedFix: string;
}

export const ISSUE_CATEGORIES: Record<IssueCategory, CategoryInfo> = {
  REMOTE_PROPERTY_MISSING: {
    description: 'HubSpot rejected a write because a property does not exist',
    suggestedFix: 'Create the property in HubSpot (Settings > Properties) or fix its name in the mapping file',
  },
  RECORD_NOT_FOUND: {
    description: 'A referenced record no longer exists in the remote system (404)',
    suggestedFix: 'The record was deleted or merged; review and clean up the identity map',
  },
  SEARCH_QUERY_REJECTED: {
    description: 'HubSpot search API returned 400 Bad Request',
    suggestedFix: "Verify the 'wrike_task_id' custom property exists on HubSpot companies",
  },
  REQUIRED_FIELD_MISSING: {
    description: 'A record is missing a field the sync needs to proceed',
    suggestedFix: 'Populate the field (contact email, company name) in the source system',
  },
  NO_CROSS_REFERENCE_LINK: {
    description: 'No id link between the Wrike task and a HubSpot company',
    suggestedFix: "Set 'Wrike Client ID' in HubSpot or 'HubSpot Account ID' in Wrike",
  },
  STALE_LOCAL_MAPPING: {
    description: 'The identity map pointed at a HubSpot record that answered 404',
    suggestedFix: 'Entry was deactivated and re-resolved; confirm the new link is the intended company',
  },
  RATE_LIMIT_EXHAUSTED: {
    description: 'Remote API kept answering 429 until the retry budget ran out',
    suggestedFix: 'Lower the sync frequency or batch size; check other integrations sharing the quota',
  },
  TYPE_MISMATCH: {
    description: 'The remote system rejected a value or the sync failed unexpectedly',
    suggestedFix: 'Check the field types on both sides match (text, number, dropdown options)',
  },
};

export interface DiagnosticIssue {
  category: IssueCategory;
  recordId: string;
  recordName: string;
  fieldName: string | null;
  detail: string | null;
  at: Date;
}

export interface SkippedRecord {
  recordId: string;
  recordName: string;
  reason: string;
}

export interface DiagnosticSummary {
  totalProcessed: number;
  successful: number;
  failed: number;
  skipped: number;
}

interface FieldStatus {
  success: number;
  failed: number;
  issues: IssueCategory[];
}

export interface SyncDiagnosticsOptions {
  /** HubSpot property named in the search-rejected recommendation */
  crossReferenceProperty?: string;
  now?: () => Date;
}

const RULE = '═'.repeat(70);
const SKIP_SAMPLE = 10;

export class SyncDiagnostics {
  private issueList: DiagnosticIssue[] = [];
  private skippedList: SkippedRecord[] = [];
  private fieldStatus = new Map<string, FieldStatus>();
  private counts: DiagnosticSummary = { totalProcessed: 0, successful: 0, failed: 0, skipped: 0 };
  private readonly crossReferenceProperty: string;
  private readonly now: () => Date;

  constructor(options: SyncDiagnosticsOptions = {}) {
    this.crossReferenceProperty = options.crossReferenceProperty ?? 'wrike_task_id';
    this.now = options.now ?? (() => new Date());
  }

  // ── Collection ────────────────────────────────────────────────────────────

  recordIssue(
    category: IssueCategory,
    recordId: string,
    recordName: string,
    fieldName?: string,
    detail?: string,
  ): void {
    this.issueList.push({
      category,
      recordId,
      recordName,
      fieldName: fieldName ?? null,
      detail: detail ?? null,
      at: this.now(),
    });
    if (fieldName) {
      const status = this.field(fieldName);
      status.failed++;
      status.issues.push(category);
    }
  }

  recordSuccess(fieldName?: string): void {
    this.counts.successful++;
    if (fieldName) this.field(fieldName).success++;
  }

  recordSkip(recordId: string, recordName: string, reason: string): void {
    this.skippedList.push({ recordId, recordName, reason });
    this.counts.skipped++;
  }

  incrementProcessed(): void {
    this.counts.totalProcessed++;
  }

  incrementFailed(): void {
    this.counts.failed++;
  }

  reset(): void {
    this.issueList = [];
    this.skippedList = [];
    this.fieldStatus = new Map();
    this.counts = { totalProcessed: 0, successful: 0, failed: 0, skipped: 0 };
  }

  // ── Read side ─────────────────────────────────────────────────────────────

  get summary(): Readonly<DiagnosticSummary> {
    return { ...this.counts };
  }

  get issues(): readonly DiagnosticIssue[] {
    return this.issueList;
  }

  get skipped(): readonly SkippedRecord[] {
    return this.skippedList;
  }

  /** Occurrences per category, most frequent first (ties keep first-seen order) */
  issueCounts(): Array<[IssueCategory, number]> {
    const counts = new Map<IssueCategory, number>();
    for (const issue of this.issueList) {
      counts.set(issue.category, (counts.get(issue.category) ?? 0) + 1);
    }
    return [...counts.entries()].sort((a, b) => b[1] - a[1]);
  }

  recommendations(): string[] {
    const counts = new Map(this.issueCounts());
    const count = (category: IssueCategory): number => counts.get(category) ?? 0;
    const out: string[] = [];

    if (count('SEARCH_QUERY_REJECTED') >= 1) {
      out.push(
        `CREATE '${this.crossReferenceProperty}' custom property in HubSpot: ` +
          'Settings > Properties > Company > Create Property (single-line text)',
      );
    }
    if (count('RECORD_NOT_FOUND') >= 5) {
      out.push(
        `CLEAN UP local mappings: ${count('RECORD_NOT_FOUND')} records reference deleted HubSpot companies. ` +
          'Review company_id_map entries whose HubSpot id no longer resolves',
      );
    }
    if (count('NO_CROSS_REFERENCE_LINK') >= 1) {
      out.push(
        `ESTABLISH ID LINKS: set '${this.crossReferenceProperty}' in HubSpot or 'HubSpot Account ID' in Wrike ` +
          'so the companies can be paired',
      );
    }
    if (count('REQUIRED_FIELD_MISSING') >= 1) {
      out.push(
        `POPULATE REQUIRED FIELDS: ${count('REQUIRED_FIELD_MISSING')} records are missing required data. ` +
          'Check email, name and id fields in the source systems',
      );
    }
    if (count('STALE_LOCAL_MAPPING') >= 1) {
      out.push(
        `REVIEW RELINKED RECORDS: ${count('STALE_LOCAL_MAPPING')} identity-map entries pointed at deleted ` +
          'HubSpot companies and were re-resolved',
      );
    }
    if (count('RATE_LIMIT_EXHAUSTED') >= 1) {
      out.push(
        `REDUCE SYNC FREQUENCY: ${count('RATE_LIMIT_EXHAUSTED')} calls ran out of retries under rate limiting`,
      );
    }
    if (count('REMOTE_PROPERTY_MISSING') >= 1) {
      out.push(
        `RUN PREFLIGHT VERIFY (GET /api/sync/verify): ${count('REMOTE_PROPERTY_MISSING')} writes referenced ` +
          'properties HubSpot does not have',
      );
    }
    if (this.counts.skipped > this.counts.successful) {
      out.push(
        'HIGH SKIP RATE: more records are being skipped than synced. ' +
          'Review the skip reasons above and make sure records are linked',
      );
    }
    return out;
  }

  /** Human-readable report, one entry per line. */
  generateReport(): string[] {
    const lines: string[] = ['', RULE, 'SYNC DIAGNOSTIC REPORT', RULE, ''];

    lines.push(
      '┌─ SUMMARY',
      `│  Total Records Processed: ${this.counts.totalProcessed}`,
      `│  Successful Syncs: ${this.counts.successful}`,
      `│  Failed Syncs: ${this.counts.failed}`,
      `│  Skipped Records: ${this.counts.skipped}`,
      '└─',
      '',
    );

    const byCategory = this.issueCounts();
    if (byCategory.length) {
      lines.push('┌─ ISSUES BY CATEGORY');
      for (const [category, count] of byCategory) {
        const info = ISSUE_CATEGORIES[category];
        lines.push(
          '│',
          `│  ! ${category} (${count} occurrences)`,
          `│     Description: ${info.description}`,
          `│     Suggested Fix: ${info.suggestedFix}`,
        );
      }
      lines.push('└─', '');
    }

    const failedFields = [...this.fieldStatus.entries()]
      .filter(([, status]) => status.failed > 0)
      .sort((a, b) => b[1].failed - a[1].failed);
    if (failedFields.length) {
      lines.push('┌─ FIELDS WITH SYNC FAILURES');
      for (const [field, status] of failedFields) {
        const rate = (status.success / (status.success + status.failed)) * 100;
        lines.push(
          '│',
          `│  ${field}`,
          `│     Success: ${status.success}, Failed: ${status.failed} (${rate.toFixed(1)}% success rate)`,
        );
        for (const category of [...new Set(status.issues)].slice(0, 3)) {
          lines.push(`│     └─ Issue: ${category}`);
        }
      }
      lines.push('└─', '');
    }

    if (this.skippedList.length) {
      lines.push('┌─ SKIPPED RECORDS (sample)');
      for (const skip of this.skippedList.slice(0, SKIP_SAMPLE)) {
        lines.push(`│  • ${skip.recordName.slice(0, 40)}`, `│    Reason: ${skip.reason}`);
      }
      if (this.skippedList.length > SKIP_SAMPLE) {
        lines.push(`│  ... and ${this.skippedList.length - SKIP_SAMPLE} more`);
      }
      lines.push('└─', '');
    }

    lines.push('┌─ RECOMMENDED ACTIONS');
    const recs = this.recommendations();
    if (recs.length) {
      recs.forEach((rec, i) => lines.push(`│  ${i + 1}. ${rec}`));
    } else {
      lines.push('│  No critical issues detected');
    }
    lines.push('└─', '', RULE);

    return lines;
  }

  private field(name: string): FieldStatus {
    let status = this.fieldStatus.get(name);
    if (!status) {
      status = { success: 0, failed: 0, issues: [] };
      this.fieldStatus.set(name, status);
    }
    return status;
  }
}

/** Diagnostic category for an error caught at a record boundary. */
export function classifyFailure(err: unknown): IssueCategory {
  if (err instanceof NotFoundError) return 'RECORD_NOT_FOUND';
  if (err instanceof RateLimitExhaustedError) return 'RATE_LIMIT_EXHAUSTED';
  if (err instanceof GatewayError && err.status === 400 && err.responseBody.includes('PROPERTY_DOESNT_EXIST')) {
    return 'REMOTE_PROPERTY_MISSING';
  }
  return 'TYPE_MISMATCH';
}
