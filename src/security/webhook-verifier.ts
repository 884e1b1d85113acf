import crypto from 'crypto';
import twilio from 'twilio';
import { logger } from '../observability/logger';

export type HeaderMap = Record<string, string | string[] | undefined>;

export interface VerificationRequest {
  rawBody: string;
  headers: HeaderMap;
  /** Full public URL of the request, as the sender signed it */
  url: string;
  /** Parsed form fields (Twilio signs these, not the raw body) */
  params?: Record<string, string>;
}

export type RequestVerifier = (request: VerificationRequest) => boolean;

function header(headers: HeaderMap, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

const allowAll: RequestVerifier = () => true;

/**
 * Twilio `X-Twilio-Signature`: HMAC-SHA1 over URL + sorted form params.
 * With verification disabled every request passes.
 */
export function createTwilioVerifier(options: { authToken: string; enabled: boolean }): RequestVerifier {
  if (!options.enabled) {
    logger.warn('Twilio signature verification disabled');
    return allowAll;
  }

  return (request) => {
    if (!options.authToken) {
      logger.error('No Twilio auth token configured; rejecting request');
      return false;
    }
    const signature = header(request.headers, 'x-twilio-signature');
    if (!signature) {
      logger.warn('Missing Twilio signature header');
      return false;
    }
    const valid = twilio.validateRequest(options.authToken, signature, request.url, request.params ?? {});
    if (!valid) {
      logger.warn({ url: request.url }, 'Twilio signature mismatch');
    }
    return valid;
  };
}

// SubjectPublicKeyInfo prefix for a raw 32-byte Ed25519 key
const ED25519_SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex');

export function ed25519KeyFromHex(publicKeyHex: string): crypto.KeyObject {
  const raw = Buffer.from(publicKeyHex, 'hex');
  if (raw.length !== 32) {
    throw new Error('Ed25519 public key must be 32 bytes of hex');
  }
  return crypto.createPublicKey({
    key: Buffer.concat([ED25519_SPKI_PREFIX, raw]),
    format: 'der',
    type: 'spki',
  });
}

/**
 * Discord interactions: Ed25519 signature of `timestamp + rawBody`.
 */
export function createDiscordVerifier(options: { publicKey: string; enabled: boolean }): RequestVerifier {
  if (!options.enabled) {
    logger.warn('Discord signature verification disabled');
    return allowAll;
  }

  let key: crypto.KeyObject | undefined;
  try {
    key = options.publicKey ? ed25519KeyFromHex(options.publicKey) : undefined;
  } catch (err) {
    logger.error({ err }, 'Invalid DISCORD_PUBLIC_KEY; all Discord requests will be rejected');
  }

  return (request) => {
    if (!key) {
      logger.error('No Discord public key configured; rejecting request');
      return false;
    }
    const signature = header(request.headers, 'x-signature-ed25519');
    const timestamp = header(request.headers, 'x-signature-timestamp');
    if (!signature || !timestamp || !/^[0-9a-f]+$/i.test(signature)) {
      logger.warn('Missing or malformed Discord signature headers');
      return false;
    }
    const valid = crypto.verify(
      null,
      Buffer.from(timestamp + request.rawBody),
      key,
      Buffer.from(signature, 'hex'),
    );
    if (!valid) {
      logger.warn('Discord signature mismatch');
    }
    return valid;
  };
}

/**
 * Web chat: optional HMAC-SHA256 of the raw body, hex, in `x-signature`.
 * No secret configured means the endpoint is open.
 */
export function createWebVerifier(options: { secret: string }): RequestVerifier {
  if (!options.secret) {
    logger.debug('No web signing secret configured; /chat accepts unsigned requests');
    return allowAll;
  }

  return (request) => {
    const signature = header(request.headers, 'x-signature');
    if (!signature) {
      logger.warn('Missing web chat signature header');
      return false;
    }

    const expected = signWebBody(options.secret, request.rawBody);
    const given = Buffer.from(signature);
    const want = Buffer.from(expected);
    const valid = given.length === want.length && crypto.timingSafeEqual(given, want);

    if (!valid) {
      logger.warn('Web chat signature mismatch');
    }
    return valid;
  };
}

export function signWebBody(secret: string, rawBody: string): string {
  return crypto.createHmac('sha256', secret).update(rawBody).digest('hex');
}
