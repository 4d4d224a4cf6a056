/**
 * Findings Collector - order-preserving merge of per-file results
 *
 * Workers finish in any order; each appends its file's report once under the
 * file's input index. Reading back always yields input order, and within a
 * file the engine's line/column/rule order.
 */

import type { FileFinding } from './types.js';
import type { FileReport } from './analyzer.js';

export class FindingsCollector {
  private readonly reports = new Map<number, FileReport>();

  /**
   * @throws Error when the slot is already filled
   */
  add(index: number, report: FileReport): void {
    if (this.reports.has(index)) {
      throw new Error(`Results for input #${index} (${report.file}) were already collected`);
    }
    this.reports.set(index, report);
  }

  has(index: number): boolean {
    return this.reports.has(index);
  }

  get size(): number {
    return this.reports.size;
  }

  getReports(): FileReport[] {
    return [...this.reports.entries()].sort(([a], [b]) => a - b).map(([, report]) => report);
  }

  getFindings(): FileFinding[] {
    return this.getReports().flatMap(report => report.findings.map(finding => ({ ...finding, file: report.file })));
  }
}
