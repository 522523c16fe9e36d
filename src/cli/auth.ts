/**
 * Sign-in and sign-out for the Gmail account.
 *
 * Prerequisites for `login`:
 *   1. Create a Google Cloud OAuth client (Desktop app type)
 *   2. Set GMAIL_OAUTH_CLIENT_ID and GMAIL_OAUTH_CLIENT_SECRET, or
 *      gmail.oauth.client_id / client_secret in the config file
 */
import type { Command } from "commander";
import { createOAuthManager } from "../app.js";
import { TokenStorage } from "../auth/token-storage.js";
import type { CliContext } from "./context.js";

export function registerAuthCommands(program: Command, ctx: CliContext): void {
  program
    .command("login")
    .description("Authorize access to the Gmail account")
    .action(async () => {
      const config = ctx.config();
      const oauthManager = createOAuthManager(config);
      const authUrl = oauthManager.getAuthorizationUrl();

      console.log("\n--- Authorize with Google ---\n");
      console.log(`Gmail user: ${config.gmail.user}`);
      console.log(`Scopes: ${config.gmail.oauth.scopes.join(", ")}\n`);
      console.log(`If the browser doesn't open, visit this URL manually:\n\n${authUrl}\n`);

      try {
        const open = (await import("open")).default;
        await open(authUrl);
      } catch (err) {
        ctx.logger.debug({ error: err }, "Could not open browser");
        console.log("(Could not open browser automatically. Please open the URL above manually.)");
      }

      console.log("Waiting for authorization callback...\n");
      const tokens = await oauthManager.authorize();

      await new TokenStorage(config.gmail.token_path).saveTokens(tokens);
      console.log(`Signed in. Tokens saved to ${config.gmail.token_path}.`);
    });

  program
    .command("signout")
    .description("Delete the saved Gmail tokens")
    .action(async () => {
      const tokenPath = ctx.config().gmail.token_path;
      const removed = await new TokenStorage(tokenPath).deleteTokens();
      console.log(removed ? "Signed out. Saved tokens deleted." : "Not signed in; nothing to delete.");
      console.log(
        "To revoke access entirely, remove the app at https://myaccount.google.com/permissions."
      );
    });
}
