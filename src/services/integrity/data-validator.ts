/**
 * Data Validator
 *
 * Read-only audit of the relationship between themes and inspirations.
 * Reports problems; never repairs them (see IntegrityCoordinator.repairOrphans).
 *
 * @module integrity/data-validator
 */

import type { DatabaseService } from '../storage/database/service.js';

/** Characters of content quoted in an orphan warning */
const PREVIEW_LENGTH = 30;

/** Warnings printed in full by generateValidationReport */
const REPORT_WARNING_LIMIT = 5;

export interface DataValidationResult {
  totalThemes: number;
  totalInspirations: number;
  /** Inspirations whose theme is missing from the catalog */
  orphanedInspirations: number;
  /** Themes whose cached inspirationCount differs from the actual count */
  staleAggregates: number;
  /** Integrity violations */
  issues: string[];
  /** Non-fatal anomalies */
  warnings: string[];
  isValid: boolean;
}

function preview(content: string): string {
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content;
}

/** The reads an audit needs, taken inside one transaction */
export type AuditSource = Pick<DatabaseService, 'transaction' | 'listThemes' | 'getAllInspirations'>;

export class DataValidator {
  constructor(private readonly store: AuditSource) {}

  /**
   * Audit the store inside a single read transaction
   */
  check(): DataValidationResult {
    return this.store.transaction(() => {
      const themes = this.store.listThemes('name');
      const inspirations = this.store.getAllInspirations();

      const issues: string[] = [];
      const warnings: string[] = [];

      const actualCounts = new Map<string, number>();
      for (const theme of themes) {
        actualCounts.set(theme.name, 0);
      }

      const orphans = inspirations.filter((inspiration) => !actualCounts.has(inspiration.themeName));
      for (const inspiration of inspirations) {
        const current = actualCounts.get(inspiration.themeName);
        if (current !== undefined) actualCounts.set(inspiration.themeName, current + 1);
      }

      if (orphans.length > 0) {
        issues.push(`Found ${String(orphans.length)} orphaned inspiration(s) (theme does not exist)`);
        for (const orphan of orphans) {
          warnings.push(
            `Orphaned inspiration #${String(orphan.id)}: "${preview(orphan.content)}" (theme: "${orphan.themeName}")`
          );
        }
      }

      const seen = new Map<string, number>();
      for (const theme of themes) {
        seen.set(theme.name, (seen.get(theme.name) ?? 0) + 1);
      }
      const duplicates = [...seen].filter(([, count]) => count > 1).map(([name]) => name);
      if (duplicates.length > 0) {
        issues.push(`Found duplicate themes: ${duplicates.join(', ')}`);
      }

      const blank = inspirations.filter((inspiration) => inspiration.content.trim().length === 0);
      if (blank.length > 0) {
        issues.push(`Found ${String(blank.length)} inspiration(s) with empty content`);
      }

      let staleAggregates = 0;
      for (const theme of themes) {
        const actual = actualCounts.get(theme.name) ?? 0;
        if (actual === 0) {
          warnings.push(`Theme "${theme.name}" has no inspirations`);
        }
        if (theme.inspirationCount !== actual) {
          staleAggregates += 1;
          warnings.push(
            `Theme "${theme.name}" caches ${String(theme.inspirationCount)} inspiration(s) but has ${String(actual)}`
          );
        }
      }

      return {
        totalThemes: themes.length,
        totalInspirations: inspirations.length,
        orphanedInspirations: orphans.length,
        staleAggregates,
        issues,
        warnings,
        isValid: issues.length === 0,
      };
    });
  }
}

/**
 * Plain-text rendering of a validation result for a diagnostics screen
 */
export function generateValidationReport(result: DataValidationResult): string {
  const lines = [
    'Data Integrity Report',
    '='.repeat(30),
    `Themes: ${String(result.totalThemes)}`,
    `Inspirations: ${String(result.totalInspirations)}`,
    `Orphaned inspirations: ${String(result.orphanedInspirations)}`,
    `Stale aggregates: ${String(result.staleAggregates)}`,
    `Status: ${result.isValid ? 'valid' : 'problems found'}`,
  ];

  if (result.issues.length > 0) {
    lines.push('', 'Issues:');
    for (const issue of result.issues) {
      lines.push(`  - ${issue}`);
    }
  }

  if (result.warnings.length > 0) {
    lines.push('', 'Warnings:');
    for (const warning of result.warnings.slice(0, REPORT_WARNING_LIMIT)) {
      lines.push(`  - ${warning}`);
    }
    if (result.warnings.length > REPORT_WARNING_LIMIT) {
      lines.push(`  ... and ${String(result.warnings.length - REPORT_WARNING_LIMIT)} more warnings`);
    }
  }

  if (result.isValid && result.warnings.length === 0) {
    lines.push('', 'All checks passed.');
  }

  return lines.join('\n') + '\n';
}
