import { formatTable, truncate } from "../utils/text.js";
import { NEWSLETTER_CATEGORY } from "../triage/orchestrator.js";
import type {
  ApplyReport,
  NewsletterItem,
  ScanResult,
  UnsubscribeAttempt,
} from "../triage/types.js";

export function formatScanSummary(scan: ScanResult): string {
  const newsletters = scan.categoryGroups.get(NEWSLETTER_CATEGORY)?.length ?? 0;
  let categorized = 0;
  for (const [category, ids] of scan.categoryGroups) {
    if (category !== NEWSLETTER_CATEGORY) categorized += ids.length;
  }

  const rows = [
    ["Priority emails (protected)", String(scan.toPriority.length), "starred, never deleted"],
    [`Old emails (>${scan.deleteOlderThanDays} days)`, String(scan.toTrash.length), "move to Trash"],
    ["Newsletter emails", String(newsletters), "your choice per category"],
    ["Categorized emails", String(categorized), "your choice per category"],
    ["Duplicate emails", String(scan.duplicateIds.length), "move to Trash (keep 1)"],
    ["Already reviewed", String(scan.skippedReviewed), "left alone"],
    ["Personal emails", String(scan.personalCount), "left in inbox"],
  ];

  return [
    `Scanned ${scan.scannedCount} messages.`,
    "",
    formatTable(rows, ["Category", "Count", "Action"], { alignRight: [1] }),
  ].join("\n");
}

export function formatCategoryBreakdown(scan: ScanResult): string {
  if (scan.categoryGroups.size === 0) return "  Nothing to organize.";
  const lines = ["  Category buckets:"];
  for (const [category, ids] of scan.categoryGroups) {
    lines.push(`    ${category}: ${ids.length} emails`);
  }
  return lines.join("\n");
}

/** Numbered sender/subject/link listing, optionally limited to the first `limit` items. */
export function formatUnsubscribeReport(items: readonly NewsletterItem[], limit?: number): string {
  if (items.length === 0) return "  No newsletter unsubscribe links found.";

  const shown = limit === undefined ? items : items.slice(0, limit);
  const lines = [`  Found ${items.length} emails with unsubscribe links:`, ""];

  shown.forEach((item, index) => {
    const n = String(index + 1).padStart(3);
    lines.push(`  ${n}. From:    ${truncate(item.sender, 70)}`);
    lines.push(`       Subject: ${truncate(item.subject, 70)}`);
    if (item.links.http) {
      lines.push(`       Link:    ${item.links.http}${item.links.oneClick ? " (one-click)" : ""}`);
    } else if (item.links.mailto) {
      lines.push(`       Mailto:  ${item.links.mailto}`);
    }
    lines.push("");
  });

  const remainder = items.length - shown.length;
  if (remainder > 0) {
    lines.push(`  ...and ${remainder} more. Run the unsubscribe command to see all.`);
  }
  return lines.join("\n").trimEnd();
}

export function formatUnsubscribeResult(item: NewsletterItem, result: UnsubscribeAttempt): string {
  const outcome =
    result.status === "ok"
      ? "unsubscribed"
      : result.status === "manual"
        ? "needs a manual visit"
        : "failed";
  return `  [${result.method}] ${outcome}: ${truncate(item.sender, 60)}`;
}

export function formatApplyReport(report: ApplyReport): string {
  if (report.cancelled) return "Aborted. No changes made.";

  const verb = report.dryRun ? "Would trash" : "Trashed";
  const parts = [
    `${verb} ${report.trashedCount}`,
    `labeled ${report.labeledCount}`,
    `starred ${report.starredCount} emails`,
  ];
  const lines = [`${report.dryRun ? "Dry run: " : "Done. "}${parts.join(", ")}.`];
  if (report.skippedCount > 0 && !report.dryRun) {
    lines.push(`${report.skippedCount} skipped emails will not be shown again.`);
  }
  if (report.capped) {
    lines.push("Safety cap reached: some emails were left for the next run.");
  }
  if (report.failedCount > 0) {
    lines.push(`${report.failedCount} changes failed; see the log for details.`);
  }
  return lines.join("\n");
}
