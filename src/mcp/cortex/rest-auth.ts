import { createHash, createPrivateKey, createPublicKey, sign, type KeyObject } from 'crypto';
import { readFileSync } from 'fs';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { ConnectionConfig } from '../types.js';

export type TokenType = 'PROGRAMMATIC_ACCESS_TOKEN' | 'KEYPAIR_JWT';

export interface RestAuthenticator {
  readonly tokenType: TokenType;
  headers(): Record<string, string>;
}

const JWT_LIFETIME_SECONDS = 3600;
const JWT_RENEW_MARGIN_SECONDS = 60;

function authorizationHeaders(token: string, tokenType: TokenType): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    'X-Snowflake-Authorization-Token-Type': tokenType,
  };
}

/**
 * Password mode: the configured secret is sent as a programmatic access token.
 */
export class AccessTokenAuthenticator implements RestAuthenticator {
  readonly tokenType = 'PROGRAMMATIC_ACCESS_TOKEN';

  constructor(private readonly token: string) {}

  headers(): Record<string, string> {
    return authorizationHeaders(this.token, this.tokenType);
  }
}

export class KeyPairAuthenticator implements RestAuthenticator {
  readonly tokenType = 'KEYPAIR_JWT';
  private readonly qualifiedUser: string;
  private readonly fingerprint: string;
  private cached: { token: string; expiresAt: number } | null = null;

  constructor(
    account: string,
    user: string,
    private readonly privateKey: KeyObject,
    private readonly nowSeconds: () => number = () => Math.floor(Date.now() / 1000)
  ) {
    // Locator-style accounts (xy12345.us-east-1) sign with the locator alone.
    const accountName = account.split('.')[0].toUpperCase();
    this.qualifiedUser = `${accountName}.${user.toUpperCase()}`;
    this.fingerprint = publicKeyFingerprint(privateKey);
  }

  get issuer(): string {
    return `${this.qualifiedUser}.${this.fingerprint}`;
  }

  token(): string {
    const now = this.nowSeconds();
    if (this.cached && this.cached.expiresAt - JWT_RENEW_MARGIN_SECONDS > now) {
      return this.cached.token;
    }

    const expiresAt = now + JWT_LIFETIME_SECONDS;
    const header = encodeSegment({ alg: 'RS256', typ: 'JWT' });
    const payload = encodeSegment({ iss: this.issuer, sub: this.qualifiedUser, iat: now, exp: expiresAt });
    const signature = sign('RSA-SHA256', Buffer.from(`${header}.${payload}`), this.privateKey).toString('base64url');

    const token = `${header}.${payload}.${signature}`;
    this.cached = { token, expiresAt };
    return token;
  }

  headers(): Record<string, string> {
    return authorizationHeaders(this.token(), this.tokenType);
  }
}

export function publicKeyFingerprint(privateKey: KeyObject): string {
  const der = createPublicKey(privateKey).export({ type: 'spki', format: 'der' });
  return `SHA256:${createHash('sha256').update(der).digest('base64')}`;
}

function encodeSegment(value: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

export function createRestAuthenticator(connection: ConnectionConfig): RestAuthenticator {
  const { auth } = connection;
  if (auth.method === 'password') {
    return new AccessTokenAuthenticator(auth.password);
  }

  let privateKey: KeyObject;
  try {
    privateKey = createPrivateKey({
      key: readFileSync(auth.privateKeyFile, 'utf-8'),
      format: 'pem',
      ...(auth.passphrase ? { passphrase: auth.passphrase } : {}),
    });
  } catch (error) {
    throw new ConfigurationError(`Cannot load private key ${auth.privateKeyFile}: ${errorMessage(error)}`);
  }
  return new KeyPairAuthenticator(connection.account, connection.user, privateKey);
}
