import { classify, getHeader } from "./classifier.js";
import { findDuplicates, redundantIds } from "./duplicates.js";
import { STARRED_LABEL } from "./mailbox.js";
import { concurrentMap } from "../utils/async.js";
import type { DecisionSource } from "./decisions.js";
import type { MailboxClient } from "./mailbox.js";
import type { ReviewLedger } from "./review-ledger.js";
import type { UnsubscribeResolver } from "./unsubscribe.js";
import type { Logger } from "../utils/logger.js";
import type {
  ActionPlan,
  ApplyReport,
  CategoryDecision,
  ClassifierRules,
  LabelAssignment,
  Message,
  NewsletterItem,
  ScanResult,
  TriageBucket,
  TriageMode,
  TriageOutcome,
  UnsubscribeAttempt,
} from "./types.js";

export const NEWSLETTER_CATEGORY = "Newsletters";

export const MODE_SCOPES: Record<TriageMode, TriageBucket[]> = {
  all: ["priority", "expired", "duplicates", "newsletters", "categories"],
  "delete-old": ["expired"],
  unsubscribe: ["newsletters"],
  organize: ["newsletters", "categories"],
  duplicates: ["duplicates"],
};

export function isTriageMode(value: string): value is TriageMode {
  return Object.hasOwn(MODE_SCOPES, value);
}

export interface TriageSettings {
  query: string;
  maxResults: number;
  fetchConcurrency: number;
  deleteOlderThanDays: number;
  maxTrashPerRun: number;
  strictDuplicateDates: boolean;
}

export interface TriageOrchestratorOptions {
  mailbox: MailboxClient;
  ledger: ReviewLedger;
  unsubscriber: UnsubscribeResolver;
  rules: ClassifierRules;
  settings: TriageSettings;
  logger: Logger;
  now?: () => Date;
}

export interface ScanOptions {
  mode?: TriageMode;
  onProgress?: (fetched: number, total: number) => void;
}

export interface ApplyOptions {
  dryRun: boolean;
}

export interface WaterfallContext {
  rules: ClassifierRules;
  reviewed: ReadonlySet<string>;
  deleteOlderThanDays: number;
  now: Date;
}

/**
 * Terminal outcome for one message. Evaluation stops at the first match:
 * priority, age expiry, already reviewed, newsletter, category.
 */
export function triageMessage(message: Message, ctx: WaterfallContext): TriageOutcome {
  const result = classify(message.headers, ctx.rules, ctx.now);

  if (result.isPriority) return { kind: "priority" };
  if (result.ageDays >= ctx.deleteOlderThanDays) {
    return { kind: "expired", ageDays: result.ageDays };
  }
  if (ctx.reviewed.has(message.id)) return { kind: "reviewed" };
  if (result.isNewsletter) return { kind: "newsletter", links: result.unsubscribe };
  if (result.category) return { kind: "category", category: result.category };
  return { kind: "unclassified", personal: result.isPersonal };
}

/** Run the waterfall and duplicate pass over a complete batch. Pure. */
export function buildScanResult(
  messages: readonly Message[],
  ctx: WaterfallContext,
  scope: readonly TriageBucket[],
  options: { strictDuplicateDates?: boolean } = {}
): ScanResult {
  const active = new Set(scope);
  const result: ScanResult = {
    toTrash: [],
    toPriority: [],
    categoryGroups: new Map(),
    duplicateGroups: [],
    duplicateIds: [],
    newsletterItems: [],
    skippedReviewed: 0,
    personalCount: 0,
    scannedCount: messages.length,
    deleteOlderThanDays: ctx.deleteOlderThanDays,
    scope: [...scope],
  };

  for (const message of messages) {
    const outcome = triageMessage(message, ctx);

    switch (outcome.kind) {
      case "priority":
        if (active.has("priority")) result.toPriority.push(message.id);
        break;
      case "expired":
        if (active.has("expired")) result.toTrash.push(message.id);
        break;
      case "reviewed":
        result.skippedReviewed++;
        break;
      case "newsletter":
        if (!active.has("newsletters")) break;
        if (outcome.links) {
          result.newsletterItems.push({
            messageId: message.id,
            sender: getHeader(message.headers, "From"),
            subject: getHeader(message.headers, "Subject"),
            links: outcome.links,
          });
        }
        addToGroup(result.categoryGroups, NEWSLETTER_CATEGORY, message.id);
        break;
      case "category":
        if (active.has("categories")) {
          addToGroup(result.categoryGroups, outcome.category, message.id);
        }
        break;
      case "unclassified":
        if (outcome.personal) result.personalCount++;
        break;
    }
  }

  if (active.has("duplicates")) {
    result.duplicateGroups = findDuplicates(messages, {
      strictDates: options.strictDuplicateDates ?? false,
    });
    result.duplicateIds = redundantIds(result.duplicateGroups);
  }

  return result;
}

/**
 * Turn a scan plus per-category decisions into concrete mutation lists.
 *
 * The trash list is the concatenation of age-expired ids, duplicate ids
 * and every delete bucket in category order, de-duplicated and then cut
 * to `maxTrash`. When the cap bites, the earliest entries of that order
 * are the ones kept.
 */
export function buildActionPlan(
  scan: ScanResult,
  decisions: ReadonlyMap<string, CategoryDecision>,
  maxTrash: number
): ActionPlan {
  const union: string[] = [];
  const seen = new Set<string>();
  const addAll = (ids: readonly string[]) => {
    for (const id of ids) {
      if (!seen.has(id)) {
        seen.add(id);
        union.push(id);
      }
    }
  };

  addAll(scan.toTrash);
  addAll(scan.duplicateIds);

  const deleteIds = new Set<string>();
  const labels: LabelAssignment[] = [];
  const skip: string[] = [];

  for (const [category, ids] of scan.categoryGroups) {
    switch (decisions.get(category)) {
      case "delete":
        addAll(ids);
        for (const id of ids) deleteIds.add(id);
        break;
      case "label":
        labels.push({ category, ids: [...ids] });
        break;
      case "skip":
        skip.push(...ids);
        break;
      case undefined:
        break;
    }
  }

  const trash = union.slice(0, Math.max(0, maxTrash));
  const trashSet = new Set(trash);

  return {
    trash,
    labels: labels
      .map((assignment) => ({
        category: assignment.category,
        ids: assignment.ids.filter((id) => !trashSet.has(id)),
      }))
      .filter((assignment) => assignment.ids.length > 0),
    star: scan.toPriority.filter((id) => !trashSet.has(id)),
    skip,
    deleteCategoryIds: new Set(trash.filter((id) => deleteIds.has(id))),
    requestedTrash: union.length,
    capped: union.length > trash.length,
  };
}

export class TriageOrchestrator {
  private readonly mailbox: MailboxClient;
  private readonly ledger: ReviewLedger;
  private readonly unsubscriber: UnsubscribeResolver;
  private readonly rules: ClassifierRules;
  private readonly settings: TriageSettings;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TriageOrchestratorOptions) {
    this.mailbox = options.mailbox;
    this.ledger = options.ledger;
    this.unsubscriber = options.unsubscriber;
    this.rules = options.rules;
    this.settings = options.settings;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /** Read-only pass: list, fetch metadata, classify. No mailbox changes. */
  async scan(options: ScanOptions = {}): Promise<ScanResult> {
    const mode = options.mode ?? "all";
    const query =
      mode === "delete-old"
        ? `${this.settings.query} older_than:${this.settings.deleteOlderThanDays}d`.trim()
        : this.settings.query;

    const refs = await this.mailbox.listMessages(query, this.settings.maxResults);
    this.logger.info({ query, found: refs.length }, "Listed messages");

    const fetched = await concurrentMap({
      items: refs,
      fn: (ref) => this.mailbox.fetchMetadata(ref.id),
      concurrency: this.settings.fetchConcurrency,
      onProgress: options.onProgress,
      onError: (ref, error) => {
        this.logger.warn({ messageId: ref.id, error }, "Failed to fetch message metadata, leaving it out");
      },
    });
    const messages: Message[] = fetched.map(({ item, value }) => ({
      id: item.id,
      headers: value,
    }));

    const reviewed = await this.ledger.load();
    const result = buildScanResult(
      messages,
      {
        rules: this.rules,
        reviewed,
        deleteOlderThanDays: this.settings.deleteOlderThanDays,
        now: this.now(),
      },
      MODE_SCOPES[mode],
      { strictDuplicateDates: this.settings.strictDuplicateDates }
    );

    this.logger.info(
      {
        scanned: result.scannedCount,
        priority: result.toPriority.length,
        expired: result.toTrash.length,
        duplicates: result.duplicateIds.length,
        categories: result.categoryGroups.size,
        skippedReviewed: result.skippedReviewed,
        personal: result.personalCount,
      },
      "Scan complete"
    );
    return result;
  }

  /**
   * Collect a decision for every category bucket, build the capped plan and
   * apply it. A cancelled decision aborts before any mutation. Failures are
   * per id: they are logged, counted and the batch carries on.
   */
  async resolveAndApply(
    scan: ScanResult,
    source: DecisionSource,
    options: ApplyOptions
  ): Promise<ApplyReport> {
    const decisions = await this.collectDecisions(scan, source);
    if (decisions === null) {
      return emptyReport({ cancelled: true, dryRun: options.dryRun });
    }

    const plan = this.plan(scan, decisions);

    if (options.dryRun) return previewReport(plan);

    return this.applyPlan(plan);
  }

  /** One decision per non-empty category bucket, or null if any was cancelled. */
  async collectDecisions(
    scan: ScanResult,
    source: DecisionSource
  ): Promise<Map<string, CategoryDecision> | null> {
    const decisions = new Map<string, CategoryDecision>();
    for (const [category, ids] of scan.categoryGroups) {
      if (ids.length === 0) continue;
      const decision = await source.decide(category, ids.length);
      if (decision === null) {
        this.logger.info({ category }, "Decision cancelled, nothing applied");
        return null;
      }
      decisions.set(category, decision);
    }
    return decisions;
  }

  plan(scan: ScanResult, decisions: ReadonlyMap<string, CategoryDecision>): ActionPlan {
    const plan = buildActionPlan(scan, decisions, this.settings.maxTrashPerRun);
    if (plan.capped) {
      this.logger.warn(
        { requested: plan.requestedTrash, cap: this.settings.maxTrashPerRun },
        "Safety cap reached, trimming trash list"
      );
    }
    return plan;
  }

  async applyPlan(plan: ActionPlan): Promise<ApplyReport> {
    const report = emptyReport({ cancelled: false, dryRun: false });
    report.capped = plan.capped;

    if (plan.skip.length > 0) {
      await this.markReviewedSafely(plan.skip);
      report.skippedCount = plan.skip.length;
    }

    const trashedCategoryIds: string[] = [];
    for (const id of plan.trash) {
      try {
        await this.mailbox.trash(id);
        report.trashedCount++;
        if (plan.deleteCategoryIds.has(id)) trashedCategoryIds.push(id);
      } catch (err) {
        report.failedCount++;
        this.logger.warn({ messageId: id, error: err }, "Failed to trash message");
      }
    }
    await this.markReviewedSafely(trashedCategoryIds);

    const labelCache = new Map<string, string>();
    for (const assignment of plan.labels) {
      const labelId = await this.resolveLabel(labelCache, assignment.category);
      if (labelId === null) {
        report.failedCount += assignment.ids.length;
        continue;
      }

      const labeled: string[] = [];
      for (const id of assignment.ids) {
        try {
          await this.mailbox.modifyLabels(id, [labelId]);
          labeled.push(id);
        } catch (err) {
          report.failedCount++;
          this.logger.warn(
            { messageId: id, label: assignment.category, error: err },
            "Failed to label message"
          );
        }
      }
      report.labeledCount += labeled.length;
      await this.markReviewedSafely(labeled);
    }

    for (const id of plan.star) {
      try {
        await this.mailbox.modifyLabels(id, [STARRED_LABEL]);
        report.starredCount++;
      } catch (err) {
        report.failedCount++;
        this.logger.warn({ messageId: id, error: err }, "Failed to star message");
      }
    }

    this.logger.info(
      {
        trashed: report.trashedCount,
        labeled: report.labeledCount,
        starred: report.starredCount,
        failed: report.failedCount,
      },
      "Apply complete"
    );
    return report;
  }

  /** Newsletter unsubscribe pass; a dry run only reports the links. */
  async unsubscribe(
    scan: ScanResult,
    options: ApplyOptions,
    onResult?: (item: NewsletterItem, result: UnsubscribeAttempt) => void
  ): Promise<Array<{ item: NewsletterItem; result: UnsubscribeAttempt }>> {
    if (options.dryRun) return [];
    return this.unsubscriber.attemptAll(scan.newsletterItems, onResult);
  }

  loadReviewed(): Promise<Set<string>> {
    return this.ledger.load();
  }

  markReviewed(ids: Iterable<string>): Promise<number> {
    return this.ledger.mark(ids);
  }

  clearReviewed(): Promise<void> {
    return this.ledger.clear();
  }

  countReviewed(): Promise<number> {
    return this.ledger.count();
  }

  private async resolveLabel(cache: Map<string, string>, name: string): Promise<string | null> {
    const cached = cache.get(name);
    if (cached) return cached;
    try {
      const id = await this.mailbox.resolveOrCreateLabel(name);
      cache.set(name, id);
      return id;
    } catch (err) {
      this.logger.warn({ label: name, error: err }, "Failed to resolve label");
      return null;
    }
  }

  private async markReviewedSafely(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    try {
      await this.ledger.mark(ids);
    } catch (err) {
      // The mailbox already changed; the next scan re-offers these ids
      this.logger.error({ count: ids.length, error: err }, "Failed to update review ledger");
    }
  }
}

function addToGroup(groups: Map<string, string[]>, category: string, id: string): void {
  const ids = groups.get(category);
  if (ids) {
    ids.push(id);
  } else {
    groups.set(category, [id]);
  }
}

/** Counts a plan would produce if every call succeeded. */
export function previewReport(plan: ActionPlan): ApplyReport {
  return {
    trashedCount: plan.trash.length,
    labeledCount: plan.labels.reduce((sum, l) => sum + l.ids.length, 0),
    starredCount: plan.star.length,
    failedCount: 0,
    skippedCount: plan.skip.length,
    capped: plan.capped,
    cancelled: false,
    dryRun: true,
  };
}

function emptyReport(flags: { cancelled: boolean; dryRun: boolean }): ApplyReport {
  return {
    trashedCount: 0,
    labeledCount: 0,
    starredCount: 0,
    failedCount: 0,
    skippedCount: 0,
    capped: false,
    cancelled: flags.cancelled,
    dryRun: flags.dryRun,
  };
}
