import { OAuthManager } from "./auth/oauth-manager.js";
import { TokenStorage } from "./auth/token-storage.js";
import { GmailClient } from "./gmail/client.js";
import { ReviewLedger } from "./triage/review-ledger.js";
import { TriageOrchestrator } from "./triage/orchestrator.js";
import { PolicyDecisionSource } from "./triage/decisions.js";
import { UnsubscribeResolver, createFetchRequester } from "./triage/unsubscribe.js";
import { buildClassifierRules } from "./triage/rules.js";
import { requireOAuthCredentials } from "./utils/config.js";
import type { AppConfig } from "./utils/config.js";
import type { Logger } from "./utils/logger.js";

export interface TriageApp {
  orchestrator: TriageOrchestrator;
  policy: PolicyDecisionSource;
  tokenStorage: TokenStorage;
}

export function createOAuthManager(config: AppConfig): OAuthManager {
  const { clientId, clientSecret } = requireOAuthCredentials(config);
  return new OAuthManager({
    clientId,
    clientSecret,
    redirectPort: config.gmail.oauth.redirect_port,
    scopes: config.gmail.oauth.scopes,
    loginHint: config.gmail.user,
  });
}

/** Wire the Gmail client, ledger and resolver into one orchestrator. */
export function createTriageApp(config: AppConfig, logger: Logger): TriageApp {
  const tokenStorage = new TokenStorage(config.gmail.token_path);
  const gmail = new GmailClient(
    createOAuthManager(config),
    tokenStorage,
    {
      retry: {
        attempts: config.gmail.retry.attempts,
        baseDelayMs: config.gmail.retry.base_delay_ms,
        timeoutMs: config.gmail.retry.timeout_ms,
      },
    },
    logger.child({ component: "gmail" })
  );

  const unsubscriber = new UnsubscribeResolver({
    http: createFetchRequester(config.unsubscribe.timeout_ms),
    mailer: gmail,
    logger: logger.child({ component: "unsubscribe" }),
    mailtoDelayMs: config.unsubscribe.mailto_delay_ms,
  });

  const orchestrator = new TriageOrchestrator({
    mailbox: gmail,
    ledger: new ReviewLedger(config.state.reviewed_path, logger.child({ component: "ledger" })),
    unsubscriber,
    rules: buildClassifierRules(config.rules),
    settings: {
      query: config.gmail.query,
      maxResults: config.gmail.max_results,
      fetchConcurrency: config.gmail.fetch_concurrency,
      deleteOlderThanDays: config.rules.delete_older_than_days,
      maxTrashPerRun: config.automation.max_trash_per_run,
      strictDuplicateDates: config.rules.strict_duplicate_dates,
    },
    logger: logger.child({ component: "triage" }),
  });

  const policy = new PolicyDecisionSource({
    default: config.automation.category_actions.default,
    overrides: config.automation.category_actions.overrides,
  });

  return { orchestrator, policy, tokenStorage };
}
