import { createSign } from 'crypto';
import * as fs from 'fs';
import { Logger } from '../logger';
import { ConfigError, toError } from './errors';

const logger = new Logger('AppJwt');

/** Seconds the JWT is backdated to absorb clock skew */
export const JWT_BACKDATE_SECONDS = 60;
/** GitHub rejects app JWTs living longer than 10 minutes */
export const JWT_LIFETIME_SECONDS = 600;

export interface AppJwtClaims {
  iat: number;
  exp: number;
  iss: string;
}

export interface PrivateKeySource {
  path?: string;
  content?: string;
}

/**
 * RS256 JWT identifying the GitHub App, for the /app endpoints.
 */
export function generateAppJwt(appId: number | string, privateKey: string, now: Date = new Date()): string {
  const issuedAt = Math.floor(now.getTime() / 1000);
  const claims: AppJwtClaims = {
    iat: issuedAt - JWT_BACKDATE_SECONDS,
    exp: issuedAt + JWT_LIFETIME_SECONDS,
    iss: String(appId),
  };

  const header = base64url(JSON.stringify({ alg: 'RS256', typ: 'JWT' }));
  const payload = base64url(JSON.stringify(claims));

  try {
    const signature = createSign('RSA-SHA256').update(`${header}.${payload}`).sign(privateKey, 'base64url');
    logger.debug('Generated JWT', { appId: claims.iss });
    return `${header}.${payload}.${signature}`;
  } catch (error) {
    logger.error('Failed to generate JWT', error);
    throw new Error(`Failed to generate JWT: ${toError(error).message}`);
  }
}

/**
 * PEM text from exactly one of a file path or inline content.
 */
export function readPrivateKey(source: PrivateKeySource): string {
  if (source.path && source.content) {
    throw new ConfigError('Cannot specify both --private-key-path and --private-key');
  }
  if (source.content) {
    logger.debug('Using private key content provided directly');
    return source.content;
  }
  if (!source.path) {
    throw new ConfigError('Must specify either --private-key-path or --private-key');
  }

  try {
    const content = fs.readFileSync(source.path, 'utf-8');
    logger.debug(`Read private key from: ${source.path}`);
    return content;
  } catch (error) {
    logger.error(`Error reading private key file: ${source.path}`, error);
    throw error;
  }
}

function base64url(text: string): string {
  return Buffer.from(text).toString('base64url');
}
