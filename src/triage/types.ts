export interface MessageHeader {
  name: string;
  value: string;
}

export interface MessageRef {
  id: string;
  threadId?: string;
}

/** A message as the pipeline sees it: its mailbox id plus fetched headers. */
export interface Message {
  id: string;
  headers: MessageHeader[];
}

export interface UnsubscribeLinks {
  mailto?: string;
  http?: string;
  oneClick: boolean;
}

export interface ClassificationResult {
  isPriority: boolean;
  isNewsletter: boolean;
  isJobRelated: boolean;
  isPersonal: boolean;
  category: string | null;
  ageDays: number;
  unsubscribe: UnsubscribeLinks | null;
}

export interface CategoryRule {
  label: string;
  keywords: string[];
}

export interface ClassifierRules {
  /** Built-in keywords, already unioned with configured extras. */
  priorityKeywords: string[];
  prioritySenders: string[];
  categoryRules: CategoryRule[];
  jobKeywords: string[];
  jobSenders: string[];
  automatedSenderPatterns: string[];
  protectJobRelated: boolean;
}

/** Element 0 is the keeper, the rest are redundant copies. */
export type DuplicateGroup = string[];

export type TriageOutcome =
  | { kind: "priority" }
  | { kind: "expired"; ageDays: number }
  | { kind: "reviewed" }
  | { kind: "newsletter"; links: UnsubscribeLinks | null }
  | { kind: "category"; category: string }
  | { kind: "unclassified"; personal: boolean };

export type TriageBucket =
  | "priority"
  | "expired"
  | "duplicates"
  | "newsletters"
  | "categories";

export type TriageMode =
  | "all"
  | "delete-old"
  | "unsubscribe"
  | "organize"
  | "duplicates";

export interface NewsletterItem {
  messageId: string;
  sender: string;
  subject: string;
  links: UnsubscribeLinks;
}

export interface ScanResult {
  toTrash: string[];
  toPriority: string[];
  /** Category label -> message ids, in first-seen order. */
  categoryGroups: Map<string, string[]>;
  duplicateGroups: DuplicateGroup[];
  /** Redundant members of every duplicate group (keepers excluded). */
  duplicateIds: string[];
  newsletterItems: NewsletterItem[];
  skippedReviewed: number;
  /** Unclassified mail from a person; always left in the inbox. */
  personalCount: number;
  scannedCount: number;
  deleteOlderThanDays: number;
  scope: TriageBucket[];
}

export type CategoryDecision = "delete" | "label" | "skip";

export interface LabelAssignment {
  category: string;
  ids: string[];
}

export interface ActionPlan {
  trash: string[];
  labels: LabelAssignment[];
  star: string[];
  /** Category ids the user chose to skip; they only go to the ledger. */
  skip: string[];
  /** Category ids scheduled for deletion, ledgered once trashed. */
  deleteCategoryIds: Set<string>;
  /** Size of the de-duplicated trash union before the safety cap. */
  requestedTrash: number;
  capped: boolean;
}

export interface ApplyReport {
  trashedCount: number;
  labeledCount: number;
  starredCount: number;
  failedCount: number;
  skippedCount: number;
  capped: boolean;
  cancelled: boolean;
  dryRun: boolean;
}

export type UnsubscribeMethod = "http" | "mailto" | "unknown";
export type UnsubscribeStatus = "ok" | "manual" | "failed";

export interface UnsubscribeAttempt {
  method: UnsubscribeMethod;
  status: UnsubscribeStatus;
}
