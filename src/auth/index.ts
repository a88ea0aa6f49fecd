/**
 * Credential handling.
 *
 * A {@link Credential} pairs a bearer token with the workspace base URL. It is
 * validated locally (no network call) and frozen; the token is wrapped in a
 * {@link SecretString} so it cannot leak through logging or serialization.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Wrapper for sensitive values to prevent accidental logging
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Expose the secret value - use with caution
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '***REDACTED***';
  }

  toJSON(): string {
    return '***REDACTED***';
  }
}

export interface Credential {
  readonly baseUrl: string;
  readonly token: SecretString;
}

export interface CredentialInput {
  token: string | undefined;
  baseUrl: string | undefined;
}

const credentialSchema = z.object({
  token: z
    .string({ required_error: 'token is required' })
    .trim()
    .min(1, 'token must not be empty'),
  baseUrl: z
    .string({ required_error: 'base URL is required' })
    .trim()
    .min(1, 'base URL must not be empty')
    .refine(isWellFormedUrl, 'base URL must be an http(s) URL with a host'),
});

function isWellFormedUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === 'https:' || url.protocol === 'http:') && url.hostname.length > 0;
  } catch {
    return false;
  }
}

/**
 * Validate a token and base URL and produce an immutable credential.
 *
 * @throws {ConfigurationError} when either value is missing or malformed
 */
export function createCredential(input: CredentialInput): Credential {
  const result = credentialSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError('Invalid credential', issues);
  }

  return Object.freeze({
    baseUrl: result.data.baseUrl.replace(/\/+$/, ''),
    token: new SecretString(result.data.token),
  });
}

export function authorizationHeader(credential: Credential): string {
  return `Bearer ${credential.token.expose()}`;
}

/**
 * Mask a token for display, keeping only the last few characters
 */
export function maskToken(token: string, visibleChars: number = 4): string {
  if (token.length <= visibleChars) {
    return '*'.repeat(token.length);
  }
  return '*'.repeat(token.length - visibleChars) + token.slice(-visibleChars);
}
