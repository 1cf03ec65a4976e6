/**
 * Google Auth Tests
 *
 * Covers the non-interactive token loading against a temp config dir.
 * Nothing here talks to Google.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  CalendarAuthError,
  listAvailableAccounts,
  loadAuthorizedClient,
} from "../lib/google-auth.js";

const SECRETS = {
  installed: {
    client_id: "test-client-id",
    client_secret: "test-secret",
    redirect_uris: ["http://localhost:3000/oauth2callback"],
  },
};

describe("Google Auth", () => {
  let configDir: string;

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), "status-light-auth-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function writeConfig(name: string, content: unknown): void {
    fs.writeFileSync(path.join(configDir, name), JSON.stringify(content));
  }

  it("fails with an auth error when credentials are missing", async () => {
    await expect(loadAuthorizedClient("personal", configDir)).rejects.toBeInstanceOf(CalendarAuthError);
  });

  it("fails with an auth error when the account was never authorized", async () => {
    writeConfig("credentials-personal.json", SECRETS);
    await expect(loadAuthorizedClient("personal", configDir)).rejects.toThrow(
      'No tokens for account "personal"'
    );
  });

  it("fails when an expired token cannot be refreshed", async () => {
    writeConfig("credentials-personal.json", SECRETS);
    writeConfig("tokens-personal.json", { access_token: "test-token", expiry_date: 1000 });

    await expect(loadAuthorizedClient("personal", configDir)).rejects.toThrow(
      'Token for "personal" expired and has no refresh token'
    );
  });

  it("returns a client carrying the saved tokens", async () => {
    writeConfig("credentials-work.json", SECRETS);
    writeConfig("tokens-work.json", {
      access_token: "test-token",
      refresh_token: "test-refresh",
      expiry_date: Date.now() + 3600 * 1000,
    });

    const client = await loadAuthorizedClient("work", configDir);
    expect(client.credentials.access_token).toBe("test-token");
  });

  it("rejects credentials in an unknown format", async () => {
    writeConfig("credentials-personal.json", { other: {} });
    await expect(loadAuthorizedClient("personal", configDir)).rejects.toThrow("Invalid credentials format");
  });

  it("lists accounts that have credentials", () => {
    writeConfig("credentials-personal.json", SECRETS);
    writeConfig("credentials-work.json", SECRETS);
    writeConfig("tokens-work.json", {});

    expect(listAvailableAccounts(configDir).sort()).toEqual(["personal", "work"]);
    expect(listAvailableAccounts(path.join(configDir, "missing"))).toEqual([]);
  });
});
