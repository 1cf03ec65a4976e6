import { google } from "googleapis";
import { OAuth2Client, type Credentials } from "google-auth-library";
import * as fs from "fs";
import * as path from "path";
import * as http from "http";
import { URL } from "url";

const SCOPES = ["https://www.googleapis.com/auth/calendar.readonly"];
const CONFIG_DIR = path.join(process.cwd(), "config");

// Default account can be overridden via GOOGLE_ACCOUNT env var
export const DEFAULT_ACCOUNT = process.env.GOOGLE_ACCOUNT || "personal";

/**
 * Raised when the calendar cannot be used without the user re-authorizing:
 * no tokens on disk, or a refresh token Google no longer accepts.
 */
export class CalendarAuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CalendarAuthError";
  }
}

function getCredentialsPath(account: string, configDir: string): string {
  return path.join(configDir, `credentials-${account}.json`);
}

function getTokensPath(account: string, configDir: string): string {
  return path.join(configDir, `tokens-${account}.json`);
}

interface ClientSecrets {
  installed?: {
    client_id: string;
    client_secret: string;
    redirect_uris: string[];
  };
  web?: {
    client_id: string;
    client_secret: string;
    redirect_uris: string[];
  };
}

function loadClientSecrets(account: string, configDir: string): ClientSecrets {
  const credPath = getCredentialsPath(account, configDir);
  if (!fs.existsSync(credPath)) {
    throw new CalendarAuthError(
      `Credentials file not found at ${credPath}.\n` +
        "Please download OAuth2 credentials from Google Cloud Console:\n" +
        "1. Go to https://console.cloud.google.com/apis/credentials\n" +
        "2. Create OAuth 2.0 Client ID (Desktop app)\n" +
        `3. Download JSON and save as config/credentials-${account}.json`
    );
  }
  const content = fs.readFileSync(credPath, "utf-8");
  return JSON.parse(content);
}

function loadTokens(account: string, configDir: string): Credentials | null {
  const tokensPath = getTokensPath(account, configDir);
  if (!fs.existsSync(tokensPath)) {
    return null;
  }
  const content = fs.readFileSync(tokensPath, "utf-8");
  return JSON.parse(content);
}

function saveTokens(tokens: Credentials, account: string, configDir: string): void {
  const tokensPath = getTokensPath(account, configDir);
  fs.mkdirSync(path.dirname(tokensPath), { recursive: true });
  fs.writeFileSync(tokensPath, JSON.stringify(tokens, null, 2));
  console.log("[Auth] Tokens saved to", tokensPath);
}

interface OAuth2Config {
  client: OAuth2Client;
  redirectUri: string;
  port: number;
}

function createOAuth2Client(secrets: ClientSecrets): OAuth2Config {
  const config = secrets.installed || secrets.web;
  if (!config) {
    throw new CalendarAuthError("Invalid credentials format");
  }
  const redirectUri = config.redirect_uris[0];
  const url = new URL(redirectUri);
  const port = url.port ? parseInt(url.port) : 80;

  return {
    client: new OAuth2Client(config.client_id, config.client_secret, redirectUri),
    redirectUri,
    port,
  };
}

async function getNewTokens(oAuth2Client: OAuth2Client, port: number): Promise<Credentials> {
  const authUrl = oAuth2Client.generateAuthUrl({
    access_type: "offline",
    scope: SCOPES,
    prompt: "consent",
  });

  console.log("\nAuthorize this app by visiting this URL:\n");
  console.log(authUrl);
  console.log("\nWaiting for authorization...\n");

  return new Promise((resolve, reject) => {
    const server = http.createServer(async (req, res) => {
      try {
        if (req.url?.startsWith("/oauth2callback") || req.url?.startsWith("/?")) {
          const url = new URL(req.url, `http://localhost:${port}`);
          const code = url.searchParams.get("code");

          if (!code) {
            res.writeHead(400);
            res.end("No authorization code received");
            reject(new Error("No authorization code"));
            return;
          }

          const { tokens } = await oAuth2Client.getToken(code);

          res.writeHead(200, { "Content-Type": "text/html" });
          res.end("<h1>Authorization successful!</h1><p>You can close this window.</p>");

          server.close();
          resolve(tokens);
        }
      } catch (err) {
        res.writeHead(500);
        res.end("Authorization failed");
        reject(err);
      }
    });

    server.listen(port, () => {
      console.log(`Listening on http://localhost:${port} for OAuth callback...`);
    });
  });
}

/**
 * Build a client from the saved tokens without prompting. Used by the
 * status loop, which must never block on a browser flow.
 */
export async function loadAuthorizedClient(
  account: string = DEFAULT_ACCOUNT,
  configDir: string = CONFIG_DIR
): Promise<OAuth2Client> {
  const secrets = loadClientSecrets(account, configDir);
  const { client } = createOAuth2Client(secrets);

  const tokens = loadTokens(account, configDir);
  if (!tokens) {
    throw new CalendarAuthError(
      `No tokens for account "${account}". Run "npm run auth ${account}" to authorize.`
    );
  }
  client.setCredentials(tokens);

  if (tokens.expiry_date && tokens.expiry_date < Date.now()) {
    if (!tokens.refresh_token) {
      throw new CalendarAuthError(`Token for "${account}" expired and has no refresh token`);
    }
    console.log("[Auth] Token expired, refreshing...");
    try {
      const { credentials } = await client.refreshAccessToken();
      saveTokens(credentials, account, configDir);
      client.setCredentials(credentials);
    } catch (err) {
      throw new CalendarAuthError(
        `Token refresh failed for "${account}": ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  return client;
}

/**
 * Interactive variant: runs the loopback consent flow when no tokens exist.
 */
export async function getAuthenticatedClient(
  account: string = DEFAULT_ACCOUNT,
  configDir: string = CONFIG_DIR
): Promise<OAuth2Client> {
  console.log(`Using Google account: ${account}`);
  if (!loadTokens(account, configDir)) {
    const { client, port } = createOAuth2Client(loadClientSecrets(account, configDir));
    console.log("No tokens found, starting OAuth flow...");
    const tokens = await getNewTokens(client, port);
    saveTokens(tokens, account, configDir);
  }
  return loadAuthorizedClient(account, configDir);
}

export function getCalendarClient(auth: OAuth2Client) {
  return google.calendar({ version: "v3", auth });
}

// List available accounts (have credentials)
export function listAvailableAccounts(configDir: string = CONFIG_DIR): string[] {
  if (!fs.existsSync(configDir)) return [];
  return fs
    .readdirSync(configDir)
    .filter((f) => f.startsWith("credentials-") && f.endsWith(".json"))
    .map((f) => f.replace("credentials-", "").replace(".json", ""));
}

// Run auth flow if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const account = process.argv[2] || DEFAULT_ACCOUNT;

  if (process.argv[2] === "--list") {
    const accounts = listAvailableAccounts();
    console.log("Available accounts:");
    accounts.forEach((a) => console.log(`  - ${a}`));
    if (accounts.length === 0) {
      console.log("  (none found - add credentials-<name>.json to config/)");
    }
    process.exit(0);
  }

  console.log(`Starting Google Calendar authentication for account: ${account}\n`);
  console.log("Usage: npm run auth [account-name]");
  console.log("       npm run auth --list\n");

  getAuthenticatedClient(account)
    .then(() => {
      console.log("\nAuthentication successful!");
      console.log("The status loop can now read your calendar.");
    })
    .catch((err) => {
      console.error("Authentication failed:", err instanceof Error ? err.message : err);
      process.exit(1);
    });
}
