import { google } from "googleapis";
import { createServer } from "node:http";
import { randomBytes } from "node:crypto";
import type { StoredTokens } from "./token-storage.js";

type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;

export interface OAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectPort: number;
  scopes: string[];
  /** Pre-fills the Google account chooser. */
  loginHint?: string;
}

const CALLBACK_PATH = "/oauth/callback";
const CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;
const EXPIRY_BUFFER_MS = 5 * 60 * 1000;

export class OAuthManager {
  private config: OAuthConfig;
  private readonly state = randomBytes(16).toString("hex");

  constructor(config: OAuthConfig) {
    this.config = config;
  }

  private get redirectUri(): string {
    return `http://127.0.0.1:${this.config.redirectPort}${CALLBACK_PATH}`;
  }

  private createOAuth2Client(): OAuth2Client {
    return new google.auth.OAuth2(
      this.config.clientId,
      this.config.clientSecret,
      this.redirectUri
    );
  }

  getAuthorizationUrl(): string {
    const client = this.createOAuth2Client();
    return client.generateAuthUrl({
      access_type: "offline",
      scope: this.config.scopes,
      prompt: "consent",
      state: this.state,
      ...(this.config.loginHint && this.config.loginHint !== "me"
        ? { login_hint: this.config.loginHint }
        : {}),
    });
  }

  async authorize(): Promise<StoredTokens> {
    const code = await this.waitForCallback();
    return this.exchangeCode(code);
  }

  async exchangeCode(code: string): Promise<StoredTokens> {
    const client = this.createOAuth2Client();
    const { tokens } = await client.getToken(code);

    if (!tokens.access_token || !tokens.refresh_token) {
      throw new Error("OAuth response missing required tokens. Ensure prompt=consent is set.");
    }

    return {
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token,
      tokenType: tokens.token_type ?? "Bearer",
      expiryDate: new Date(tokens.expiry_date ?? Date.now() + 3600_000),
      scope: tokens.scope ?? this.config.scopes.join(" "),
    };
  }

  async refreshAccessToken(refreshToken: string): Promise<StoredTokens> {
    const client = this.createOAuth2Client();
    client.setCredentials({ refresh_token: refreshToken });

    const { credentials } = await client.refreshAccessToken();

    if (!credentials.access_token) {
      throw new Error("Failed to refresh access token. Sign in again with: mailbox-triage login");
    }

    return {
      accessToken: credentials.access_token,
      refreshToken: credentials.refresh_token ?? refreshToken,
      tokenType: credentials.token_type ?? "Bearer",
      expiryDate: new Date(credentials.expiry_date ?? Date.now() + 3600_000),
      scope: credentials.scope ?? this.config.scopes.join(" "),
    };
  }

  isTokenValid(expiryDate: Date): boolean {
    return expiryDate.getTime() - EXPIRY_BUFFER_MS > Date.now();
  }

  getAuthenticatedClient(accessToken: string): OAuth2Client {
    const client = this.createOAuth2Client();
    client.setCredentials({ access_token: accessToken });
    return client;
  }

  waitForCallback(): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const server = createServer((req, res) => {
        const url = new URL(req.url ?? "/", this.redirectUri);

        if (url.pathname !== CALLBACK_PATH) {
          res.writeHead(404, { "Content-Type": "text/plain" });
          res.end("Not found");
          return;
        }

        const error = url.searchParams.get("error");
        if (error) {
          res.writeHead(400, { "Content-Type": "text/plain" });
          res.end(`Authorization failed: ${error}. You can close this window.`);
          cleanup();
          reject(new Error(`OAuth authorization denied: ${error}`));
          return;
        }

        if (url.searchParams.get("state") !== this.state) {
          res.writeHead(400, { "Content-Type": "text/plain" });
          res.end("State mismatch");
          return;
        }

        const code = url.searchParams.get("code");
        if (!code) {
          res.writeHead(400, { "Content-Type": "text/plain" });
          res.end("Missing authorization code");
          return;
        }

        res.writeHead(200, { "Content-Type": "text/plain" });
        res.end("Signed in. You can close this window and return to the terminal.");
        cleanup();
        resolve(code);
      });

      const timeout = setTimeout(() => {
        cleanup();
        reject(new Error("OAuth callback timed out after 5 minutes. Please try again."));
      }, CALLBACK_TIMEOUT_MS);

      function cleanup() {
        clearTimeout(timeout);
        server.close();
      }

      server.on("error", (err) => {
        cleanup();
        reject(new Error(`Failed to start OAuth callback server: ${err.message}`));
      });

      server.listen(this.config.redirectPort, "127.0.0.1");
    });
  }
}
