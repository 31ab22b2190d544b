import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";
import { ReleasePrError } from "../errors.js";
import type { Logger } from "../logger.js";
import { githubRequest, type GitHubEndpoint } from "./client.js";
import { AuthorizationSchema } from "./types.js";

export const MAX_TOKEN_ATTEMPTS = 3;

export interface AskOptions {
  // Do not echo the answer.
  secret?: boolean;
}

export interface Prompter {
  ask(question: string, options?: AskOptions): Promise<string>;
}

export interface Credentials {
  username: string;
  password: string;
}

export function createConsolePrompter(): Prompter {
  return {
    async ask(question, options = {}) {
      let muted = false;
      const output = new Writable({
        write(chunk, _encoding, callback) {
          if (!muted) process.stderr.write(chunk);
          callback();
        },
      });
      // In terminal mode readline echoes typed keys through `output`.
      const rl = createInterface({
        input: process.stdin,
        output,
        terminal: Boolean(process.stdin.isTTY),
      });
      try {
        const answer = rl.question(question);
        muted = options.secret ?? false;
        const value = (await answer).trim();
        if (muted) process.stderr.write("\n");
        return value;
      } finally {
        rl.close();
      }
    },
  };
}

/**
 * Create a personal access token with basic auth.
 *
 * Throws `AUTH_CHALLENGE` when GitHub asks for a two-factor code.
 */
export async function createAccessToken(
  endpoint: GitHubEndpoint,
  credentials: Credentials,
  otp?: string
): Promise<string> {
  const basic = Buffer.from(
    `${credentials.username}:${credentials.password}`
  ).toString("base64");
  const headers: Record<string, string> = { Authorization: `Basic ${basic}` };
  if (otp) {
    headers["X-GitHub-OTP"] = otp;
  }

  try {
    const data = await githubRequest(
      { ...endpoint, token: undefined },
      "/authorizations",
      {
        method: "POST",
        headers,
        body: {
          scopes: ["repo"],
          note: `release-pr (${new Date().toISOString()})`,
        },
      }
    );
    return AuthorizationSchema.parse(data).token;
  } catch (error) {
    const status = error instanceof ReleasePrError ? error.details?.status : undefined;
    if (status === 404 || status === 410) {
      throw new ReleasePrError(
        "This GitHub server does not create tokens from a password. " +
          "Set GITHUB_TOKEN, or run: git config --global release-pr.<host>.token <token>",
        "AUTH_FAILED",
        { status }
      );
    }
    if (
      error instanceof ReleasePrError &&
      status === 401 &&
      error.details &&
      typeof error.details.otp === "string" &&
      error.details.otp.startsWith("required")
    ) {
      throw new ReleasePrError(
        "Two-factor authentication code required",
        "AUTH_CHALLENGE",
        error.details
      );
    }
    throw error;
  }
}

/**
 * Ask for credentials and create a token, prompting for a one-time code when
 * GitHub issues a two-factor challenge.
 */
export async function requestAccessToken(
  endpoint: GitHubEndpoint,
  prompter: Prompter,
  logger: Logger
): Promise<string> {
  logger.notice("Could not find a GitHub token. Creating one with your credentials.");
  const username = await prompter.ask("GitHub username: ");
  const password = await prompter.ask("GitHub password: ", { secret: true });

  let otp: string | undefined;
  for (let attempt = 1; attempt <= MAX_TOKEN_ATTEMPTS; attempt++) {
    try {
      return await createAccessToken(endpoint, { username, password }, otp);
    } catch (error) {
      if (!(error instanceof ReleasePrError) || error.code !== "AUTH_CHALLENGE") {
        throw error;
      }
      if (attempt === MAX_TOKEN_ATTEMPTS) break;
      otp = await prompter.ask("Two-factor authentication code: ", {
        secret: true,
      });
    }
  }

  throw new ReleasePrError(
    `Could not create a token after ${MAX_TOKEN_ATTEMPTS} attempts`,
    "AUTH_FAILED"
  );
}
