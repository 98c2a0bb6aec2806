import { Router, Request, Response, NextFunction } from 'express';
import { SessionService } from '../services/session.service';
import { TokenPair } from '../models/session';
import { requireAuth, requestContext, sendAuthError } from '../middleware/auth';
import { validateLoginRequest, validateRefreshRequest, validateChangePasswordRequest } from '../utils/auth-validation';
import { AuthErrorCode, authError } from '../utils/errors';

function toTokenResponse(pair: TokenPair): Record<string, string | number> {
  return {
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: pair.tokenType,
    expires_in: pair.expiresIn,
  };
}

export function createAuthRouter(session: SessionService): Router {
  const authRouter = Router();
  const authenticated = requireAuth(session);

  /**
   * @swagger
   * components:
   *   securitySchemes:
   *     bearerAuth:
   *       type: http
   *       scheme: bearer
   *       bearerFormat: JWT
   *   schemas:
   *     LoginRequest:
   *       type: object
   *       required: [username, password]
   *       properties:
   *         username:
   *           type: string
   *           description: Username or email
   *         password:
   *           type: string
   *     TokenResponse:
   *       type: object
   *       properties:
   *         access_token:
   *           type: string
   *         refresh_token:
   *           type: string
   *         token_type:
   *           type: string
   *           example: bearer
   *         expires_in:
   *           type: integer
   *           example: 1800
   *     RefreshTokenRequest:
   *       type: object
   *       required: [refresh_token]
   *       properties:
   *         refresh_token:
   *           type: string
   *     ChangePasswordRequest:
   *       type: object
   *       required: [current_password, new_password]
   *       properties:
   *         current_password:
   *           type: string
   *         new_password:
   *           type: string
   *           minLength: 8
   *           maxLength: 100
   *     ErrorResponse:
   *       type: object
   *       properties:
   *         error:
   *           type: string
   *         code:
   *           type: string
   */

  /**
   * @swagger
   * /api/v1/auth/login:
   *   post:
   *     summary: Login with username (or email) and password
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/LoginRequest'
   *         application/x-www-form-urlencoded:
   *           schema:
   *             $ref: '#/components/schemas/LoginRequest'
   *     responses:
   *       200:
   *         description: Token pair issued
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/TokenResponse'
   *       401:
   *         description: Invalid credentials
   *       503:
   *         description: Storage unavailable, retry later
   */
  authRouter.post('/login', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = validateLoginRequest(req.body);
      if (!validation.valid || !validation.data) {
        res.status(400).json({ error: 'Validation failed', details: validation.errors });
        return;
      }

      const { username, password } = validation.data;
      const result = await session.login(username, password, requestContext(req, res));
      if (!result.ok) {
        sendAuthError(res, result.error);
        return;
      }

      res.json(toTokenResponse(result.value));
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/auth/refresh:
   *   post:
   *     summary: Exchange a refresh token for a new token pair
   *     description: The presented refresh token is consumed. Presenting it again revokes the whole session.
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/RefreshTokenRequest'
   *     responses:
   *       200:
   *         description: New token pair issued
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/TokenResponse'
   *       401:
   *         description: Refresh denied
   */
  authRouter.post('/refresh', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = validateRefreshRequest(req.body);
      if (!validation.valid || !validation.data) {
        res.status(400).json({ error: 'Validation failed', details: validation.errors });
        return;
      }

      const result = await session.refresh(validation.data.refresh_token, requestContext(req, res));
      if (!result.ok) {
        sendAuthError(res, result.error);
        return;
      }

      res.json(toTokenResponse(result.value));
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/auth/logout:
   *   post:
   *     summary: Revoke a refresh token
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/RefreshTokenRequest'
   *     responses:
   *       200:
   *         description: Logged out (also for unknown or already revoked tokens)
   */
  authRouter.post('/logout', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = validateRefreshRequest(req.body);
      if (!validation.valid || !validation.data) {
        res.status(400).json({ error: 'Validation failed', details: validation.errors });
        return;
      }

      const result = await session.logout(validation.data.refresh_token, requestContext(req, res));
      if (!result.ok) {
        sendAuthError(res, result.error);
        return;
      }

      res.json({ message: 'Successfully logged out' });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/auth/logout-all:
   *   post:
   *     summary: Revoke every refresh token of the current user
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: All sessions terminated
   */
  authRouter.post('/logout-all', authenticated, async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.principal) {
        sendAuthError(res, authError(AuthErrorCode.TOKEN_INVALID));
        return;
      }

      const result = await session.logoutEverywhere(req.principal.id, requestContext(req, res));
      if (!result.ok) {
        sendAuthError(res, result.error);
        return;
      }

      res.json({ message: 'Logged out from all sessions', revoked: result.value.revoked });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/auth/me:
   *   get:
   *     summary: Current user profile
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Profile of the token's principal
   *       401:
   *         description: Invalid or expired access token
   */
  authRouter.get('/me', authenticated, (req: Request, res: Response) => {
    res.json(req.principal);
  });

  /**
   * @swagger
   * /api/v1/auth/me/permissions:
   *   get:
   *     summary: Effective permissions of the current user
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Union of the permission maps of the user's active roles
   */
  authRouter.get('/me/permissions', authenticated, async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.principal) {
        sendAuthError(res, authError(AuthErrorCode.TOKEN_INVALID));
        return;
      }

      const result = await session.effectivePermissions(req.principal.id, requestContext(req, res));
      if (!result.ok) {
        sendAuthError(res, result.error);
        return;
      }

      res.json({ permissions: result.value });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/v1/auth/change-password:
   *   post:
   *     summary: Change password and terminate every session
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/ChangePasswordRequest'
   *     responses:
   *       200:
   *         description: Password changed, login required again
   *       400:
   *         description: Validation failed
   *       401:
   *         description: Current password is incorrect
   */
  authRouter.post('/change-password', authenticated, async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.principal) {
        sendAuthError(res, authError(AuthErrorCode.TOKEN_INVALID));
        return;
      }

      const validation = validateChangePasswordRequest(req.body);
      if (!validation.valid || !validation.data) {
        res.status(400).json({ error: 'Validation failed', details: validation.errors });
        return;
      }

      const { current_password, new_password } = validation.data;
      const result = await session.changePassword(
        req.principal.id,
        current_password,
        new_password,
        requestContext(req, res)
      );
      if (!result.ok) {
        sendAuthError(res, result.error);
        return;
      }

      res.json({ message: 'Password changed successfully. Please login again.' });
    } catch (error) {
      next(error);
    }
  });

  return authRouter;
}
