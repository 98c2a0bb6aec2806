import { Request, Response, NextFunction, RequestHandler } from 'express';
import { PermissionMap, PrincipalSummary } from '../models/user';
import { RequestContext } from '../models/session';
import { SessionService } from '../services/session.service';
import { AuthError, AuthErrorCode, authError, httpStatusFor } from '../utils/errors';

// Extend Express Request to include the authenticated principal
declare global {
  namespace Express {
    interface Request {
      principal?: PrincipalSummary;
    }
  }
}

export function sendAuthError(res: Response, error: AuthError): void {
  if (error.code === AuthErrorCode.TRANSIENT) {
    res.setHeader('Retry-After', '1');
  }
  if (error.code === AuthErrorCode.TOKEN_INVALID) {
    res.setHeader('WWW-Authenticate', 'Bearer');
  }
  res.status(httpStatusFor(error.code)).json({ error: error.message, code: error.code });
}

export function extractBearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) {
    return null;
  }
  const token = header.substring(7).trim();
  return token.length > 0 ? token : null;
}

/**
 * Aborts pending persistence waits when the client goes away.
 */
export function requestContext(req: Request, res: Response): RequestContext {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return { signal: controller.signal };
}

/**
 * Verifies the bearer access token and attaches the principal to req.principal
 */
export function requireAuth(session: SessionService): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const token = extractBearerToken(req);
    if (!token) {
      sendAuthError(res, authError(AuthErrorCode.TOKEN_INVALID));
      return;
    }

    try {
      const result = await session.currentPrincipal(token, requestContext(req, res));
      if (!result.ok) {
        sendAuthError(res, result.error);
        return;
      }

      req.principal = result.value;
      next();
    } catch (error) {
      next(error);
    }
  };
}

function permissionGuard(
  session: SessionService,
  allows: (permissions: PermissionMap) => boolean
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    if (!req.principal) {
      sendAuthError(res, authError(AuthErrorCode.TOKEN_INVALID));
      return;
    }

    try {
      const result = await session.effectivePermissions(req.principal.id, requestContext(req, res));
      if (!result.ok) {
        sendAuthError(res, result.error);
        return;
      }
      if (!allows(result.value)) {
        sendAuthError(res, authError(AuthErrorCode.FORBIDDEN));
        return;
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Requires every listed permission. Use after requireAuth.
 */
export function requirePermission(session: SessionService, ...permissions: string[]): RequestHandler {
  return permissionGuard(session, (granted) => permissions.every((name) => granted[name] === true));
}

/**
 * Requires at least one of the listed permissions. Use after requireAuth.
 */
export function requireAnyPermission(session: SessionService, ...permissions: string[]): RequestHandler {
  return permissionGuard(session, (granted) => permissions.some((name) => granted[name] === true));
}
