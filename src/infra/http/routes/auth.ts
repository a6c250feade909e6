import { Router } from 'express';
import { z } from 'zod';
import type { AuthFacade } from '../../../application/auth/authFacade.js';
import type { ResetTokenDelivery } from '../../../application/auth/resetTokenDelivery.js';
import { NotFoundError, UnauthorizedError } from '../../../application/errors.js';
import { normalizeEmail } from '../../../domain/auth/user.js';
import {
  AuthRequest,
  authMiddleware,
  bearerToken,
  requireRole,
  requireUser,
} from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user and receive a session token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [firstName, lastName, email, password]
 *             properties:
 *               firstName: { type: string }
 *               lastName: { type: string }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/AuthenticatedUser'
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a session token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/AuthenticatedUser'
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange a valid session token for a new one
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: New session token
 *       401:
 *         description: Invalid or expired token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Current user
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: The authenticated user
 *       401:
 *         description: Invalid or expired token
 *
 * /api/auth/change-password:
 *   post:
 *     tags: [Auth]
 *     summary: Change the current user's password
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [currentPassword, newPassword]
 *             properties:
 *               currentPassword: { type: string }
 *               newPassword: { type: string, minLength: 8 }
 *     responses:
 *       204:
 *         description: Password changed
 *       400:
 *         description: Current password is incorrect
 *       404:
 *         description: The user was removed before the update
 *
 * /api/auth/password-reset/request:
 *   post:
 *     tags: [Password reset]
 *     summary: Ask for a reset token to be sent to the account owner
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               email: { type: string, format: email }
 *     responses:
 *       202:
 *         description: Accepted, whether or not the email is registered
 *
 * /api/auth/password-reset/confirm:
 *   post:
 *     tags: [Password reset]
 *     summary: Set a new password with a reset token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [token, newPassword]
 *             properties:
 *               token: { type: string }
 *               newPassword: { type: string, minLength: 8 }
 *     responses:
 *       204:
 *         description: Password reset
 *       400:
 *         description: Invalid or expired reset token
 *       404:
 *         description: The user was removed before the update
 *
 * /api/auth/users/{id}:
 *   get:
 *     tags: [Auth]
 *     summary: Look up a user (admin only)
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: The user
 *       403:
 *         description: Caller is not an admin
 *       404:
 *         description: No such user
 */

const passwordSchema = z.string().min(8);

const registerBodySchema = z.object({
  firstName: z.string().trim().min(1),
  lastName: z.string().trim().min(1),
  email: z.string().email(),
  password: passwordSchema,
});

const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

const changePasswordBodySchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: passwordSchema,
});

const resetRequestBodySchema = z.object({
  email: z.string().email(),
});

const resetConfirmBodySchema = z.object({
  token: z.string().min(1),
  newPassword: passwordSchema,
});

const userParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const RESET_REQUESTED_MESSAGE =
  'If that email is registered, a reset link is on its way';

export function createAuthRoutes(auth: AuthFacade, resetDelivery: ResetTokenDelivery) {
  const router = Router();
  const authenticate = authMiddleware(auth);

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await auth.register(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await auth.login(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/refresh',
    asyncHandler(async (req, res) => {
      const token = bearerToken(req);
      if (!token) {
        throw new UnauthorizedError('Missing or invalid authorization header');
      }
      res.status(200).json({ token: await auth.refreshToken(token) });
    })
  );

  router.get('/me', authenticate, (req: AuthRequest, res) => {
    res.status(200).json({ user: requireUser(req) });
  });

  router.post(
    '/change-password',
    authenticate,
    validate({ body: changePasswordBodySchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const user = requireUser(req);
      const body = changePasswordBodySchema.parse(req.body);
      if (!(await auth.changePassword({ userId: user.id, ...body }))) {
        throw new NotFoundError('User not found');
      }
      res.status(204).end();
    })
  );

  router.post(
    '/password-reset/request',
    validate({ body: resetRequestBodySchema }),
    asyncHandler(async (req, res) => {
      const { email } = resetRequestBodySchema.parse(req.body);
      const token = await auth.requestPasswordReset(email);
      if (token) {
        await resetDelivery.deliver(normalizeEmail(email), token);
      }
      res.status(202).json({ message: RESET_REQUESTED_MESSAGE });
    })
  );

  router.post(
    '/password-reset/confirm',
    validate({ body: resetConfirmBodySchema }),
    asyncHandler(async (req, res) => {
      const body = resetConfirmBodySchema.parse(req.body);
      if (!(await auth.resetPassword(body))) {
        throw new NotFoundError('User not found');
      }
      res.status(204).end();
    })
  );

  router.get(
    '/users/:id',
    authenticate,
    requireRole('admin'),
    validate({ params: userParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = userParamsSchema.parse(req.params);
      const user = await auth.findUser(id);
      if (!user) {
        throw new NotFoundError('User not found');
      }
      res.status(200).json({ user });
    })
  );

  return router;
}
