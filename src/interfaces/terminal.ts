import { createInterface, type Interface } from "node:readline";
import type { DecisionSource } from "../triage/decisions.js";
import type { CategoryDecision } from "../triage/types.js";

/** Line-based question/answer channel. Resolves null when input closes. */
export interface Prompter {
  ask(question: string): Promise<string | null>;
}

export class TerminalPrompter implements Prompter {
  private rl: Interface;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on("close", () => {
      this.closed = true;
    });
  }

  ask(question: string): Promise<string | null> {
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      const onClose = () => resolve(null);
      this.rl.once("close", onClose);
      this.rl.question(question, (answer) => {
        this.rl.off("close", onClose);
        resolve(answer.trim());
      });
    });
  }

  close(): void {
    this.rl.close();
  }
}

const DECISION_KEYS = new Map<string, CategoryDecision>([
  ["d", "delete"],
  ["delete", "delete"],
  ["l", "label"],
  ["label", "label"],
  ["s", "skip"],
  ["skip", "skip"],
]);

const CANCEL_KEYS = new Set(["q", "quit", "cancel"]);
const MAX_INVALID_ANSWERS = 3;

/**
 * Asks the operator what to do with each category bucket.
 * An empty answer takes the default; "q" or closed input cancels the run.
 */
export class PromptDecisionSource implements DecisionSource {
  constructor(
    private prompter: Prompter,
    private defaults: (category: string) => CategoryDecision = () => "label"
  ) {}

  async decide(category: string, count: number): Promise<CategoryDecision | null> {
    const fallback = this.defaults(category);
    const question =
      `${category} (${count} emails): [d]elete, [l]abel, [s]kip, [q]uit ` +
      `(default: ${fallback}) > `;

    for (let i = 0; i < MAX_INVALID_ANSWERS; i++) {
      const answer = await this.prompter.ask(question);
      if (answer === null) return null;

      const key = answer.toLowerCase();
      if (key === "") return fallback;
      if (CANCEL_KEYS.has(key)) return null;

      const decision = DECISION_KEYS.get(key);
      if (decision) return decision;
    }
    return null;
  }
}

/** Yes/no question; anything but y/yes is a no. */
export async function confirm(prompter: Prompter, question: string): Promise<boolean> {
  const answer = await prompter.ask(`${question} [y/N]: `);
  return answer !== null && ["y", "yes"].includes(answer.toLowerCase());
}
