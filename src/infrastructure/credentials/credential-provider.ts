import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { AuthError } from '../../domain/index.js';

/** The four secrets the feed handshake needs. */
export interface FeedCredentials {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessTokenSecret: string;
}

export interface CredentialProvider {
  /** Rejects with AuthError when the credentials are missing or incomplete. */
  load(): Promise<FeedCredentials>;
}

const secret = z.string().trim().min(1);

/** Shape of the JSON credentials file. */
const credentialsFileSchema = z.object({
  consumer_key: secret,
  consumer_secret: secret,
  access_token: secret,
  access_token_secret: secret,
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.path.join('.') || issue.message).join(', ');
}

/** Reads credentials from `TWITTER_*` environment variables. */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async load(): Promise<FeedCredentials> {
    const parsed = credentialsFileSchema.safeParse({
      consumer_key: this.env['TWITTER_CONSUMER_KEY'],
      consumer_secret: this.env['TWITTER_CONSUMER_SECRET'],
      access_token: this.env['TWITTER_ACCESS_TOKEN'],
      access_token_secret: this.env['TWITTER_ACCESS_TOKEN_SECRET'],
    });

    if (!parsed.success) {
      throw new AuthError(`Missing feed credentials in environment: ${describeIssues(parsed.error)}`);
    }
    return toCredentials(parsed.data);
  }
}

/** Reads credentials from a JSON file with snake_case keys. */
export class FileCredentialProvider implements CredentialProvider {
  constructor(private readonly path: string) {}

  async load(): Promise<FeedCredentials> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.path, 'utf-8'));
    } catch (err: unknown) {
      throw new AuthError(`Cannot read credentials file ${this.path}`, { cause: err });
    }

    const parsed = credentialsFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AuthError(`Invalid credentials file ${this.path}: ${describeIssues(parsed.error)}`);
    }
    return toCredentials(parsed.data);
  }
}

function toCredentials(data: z.infer<typeof credentialsFileSchema>): FeedCredentials {
  return {
    consumerKey: data.consumer_key,
    consumerSecret: data.consumer_secret,
    accessToken: data.access_token,
    accessTokenSecret: data.access_token_secret,
  };
}
