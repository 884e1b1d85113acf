import { FastifyInstance } from 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    /** Unparsed request body, kept for signature verification */
    rawBody?: string;
  }
}

/**
 * JSON and form parsers that keep the raw body on the request.
 * Signatures are computed over the exact bytes the sender posted.
 */
export function registerRawBodyParsers(app: FastifyInstance): void {
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (req, body, done) => {
    const raw = String(body);
    req.rawBody = raw;
    try {
      done(null, raw.length > 0 ? JSON.parse(raw) : {});
    } catch (err) {
      const parseError = err instanceof Error ? err : new Error(String(err));
      done(Object.assign(parseError, { statusCode: 400 }), undefined);
    }
  });

  app.addContentTypeParser('application/x-www-form-urlencoded', { parseAs: 'string' }, (req, body, done) => {
    const raw = String(body);
    req.rawBody = raw;
    done(null, Object.fromEntries(new URLSearchParams(raw)));
  });
}
