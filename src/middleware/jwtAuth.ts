import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import jwksClient from 'jwks-rsa';
import { toError } from '../errors';

export type SigningKeyResolver = (kid: string) => Promise<string>;

export interface JwtAuthOptions {
  getSigningKey: SigningKeyResolver;
  issuer?: string;
  audience?: string;
}

/**
 * Resolve RS256 public keys by key id from a JWKS endpoint
 */
export function jwksKeyResolver(jwksUri: string): SigningKeyResolver {
  const client = jwksClient({
    jwksUri,
    cache: true,
    rateLimit: true,
    jwksRequestsPerMinute: 10
  });

  return async (kid: string) => {
    const key = await client.getSigningKey(kid);
    return key.getPublicKey();
  };
}

/**
 * Bearer token check for the conversion routes
 */
export function createJwtAuth(options: JwtAuthOptions): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const authHeader = req.headers.authorization;
    if (!authHeader) {
      console.log('[auth] missing Authorization header');
      res.status(401).json({ error: 'Missing Authorization header' });
      return;
    }

    const parts = authHeader.split(' ');
    if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
      res.status(401).json({ error: 'Invalid Authorization header format' });
      return;
    }

    const token = parts[1];
    const decoded = jwt.decode(token, { complete: true });
    const kid = decoded?.header.kid;
    if (!kid) {
      res.status(401).json({ error: 'Invalid token header (no kid)' });
      return;
    }

    try {
      const signingKey = await options.getSigningKey(kid);
      const payload = jwt.verify(token, signingKey, {
        algorithms: ['RS256'],
        issuer: options.issuer,
        audience: options.audience
      });

      if (typeof payload === 'string') {
        res.status(401).json({ error: 'Invalid token payload' });
        return;
      }

      req.user = payload;
      next();
    } catch (error) {
      const message = toError(error).message;
      console.log('[auth] token verification failed:', message);
      res.status(401).json({ error: 'Invalid token', detail: message });
    }
  };
}
