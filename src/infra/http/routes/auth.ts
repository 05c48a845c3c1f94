import { RequestHandler, Router } from 'express';
import { z } from 'zod';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { RefreshTokenUseCase } from '../../../application/auth/refresh.js';
import { UpdateProfileUseCase } from '../../../application/auth/updateProfile.js';
import { SetUserActiveUseCase } from '../../../application/auth/setUserActive.js';
import { AuthGuard } from '../../../application/auth/guard.js';
import { IssuedToken, TokenCodec } from '../../../application/auth/tokenCodec.js';
import { PasswordHasher } from '../../../domain/auth/password.js';
import { PublicUser, toPublicUser } from '../../../domain/auth/user.js';
import { UserRepo } from '../../../domain/auth/userRepo.js';
import { authMiddleware, currentUser } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, username, password]
 *             properties:
 *               email: { type: string, format: email }
 *               username: { type: string, minLength: 3, maxLength: 50 }
 *               full_name: { type: string, nullable: true }
 *               password: { type: string, minLength: 8, description: 'At least one digit and one uppercase letter' }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error, weak password, or email/username already in use
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Log in with username or email and receive a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string, description: 'Username or email' }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Token' }
 *       401:
 *         description: Incorrect username or password, or inactive account
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       429:
 *         description: Too many login attempts
 *
 * /auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Current user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       401:
 *         description: Invalid token, unknown or inactive user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   patch:
 *     tags: [Auth]
 *     summary: Update the current user's email or full name
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               email: { type: string, format: email }
 *               full_name: { type: string, nullable: true }
 *     responses:
 *       200:
 *         description: Updated user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error or email already in use
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Issue a fresh token for the current user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: New token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Token' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /auth/users/{id}/active:
 *   patch:
 *     tags: [Admin]
 *     summary: Activate or deactivate an account (superuser only)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [is_active]
 *             properties:
 *               is_active: { type: boolean }
 *     responses:
 *       200:
 *         description: Updated user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       401:
 *         description: Unauthorized
 *       403:
 *         description: Caller is not a superuser
 *       404:
 *         description: User not found
 */

const registerBodySchema = z.object({
  // Field rules (length, strength, email syntax) are checked by RegisterUseCase
  email: z.string(),
  username: z.string(),
  full_name: z.string().nullable().optional(),
  password: z.string(),
});

const loginBodySchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const updateProfileBodySchema = z
  .object({
    email: z.string().optional(),
    full_name: z.string().nullable().optional(),
  })
  .strict();

const userIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const setActiveBodySchema = z.object({
  is_active: z.boolean(),
});

export interface UserResponse {
  id: number;
  email: string;
  username: string;
  full_name: string | null;
  is_active: boolean;
  is_superuser: boolean;
  created_at: string;
  updated_at: string;
}

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
}

export function toUserResponse(user: PublicUser): UserResponse {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    full_name: user.fullName,
    is_active: user.isActive,
    is_superuser: user.isSuperuser,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}

function toTokenResponse(token: IssuedToken): TokenResponse {
  return { access_token: token.accessToken, token_type: token.tokenType };
}

export interface AuthRoutesOptions {
  userRepo: UserRepo;
  hasher: PasswordHasher;
  codec: TokenCodec;
  loginRateLimiter: RequestHandler;
}

export function createAuthRoutes(options: AuthRoutesOptions) {
  const { userRepo, hasher, codec } = options;
  const router = Router();
  const guard = new AuthGuard(codec, userRepo);
  const registerUseCase = new RegisterUseCase(userRepo, hasher);
  const loginUseCase = new LoginUseCase(userRepo, hasher, codec);
  const refreshUseCase = new RefreshTokenUseCase(codec);
  const updateProfileUseCase = new UpdateProfileUseCase(userRepo);
  const setUserActiveUseCase = new SetUserActiveUseCase(userRepo, guard);
  const requireAuth = authMiddleware(guard);

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const user = await registerUseCase.execute({
        email: body.email,
        username: body.username,
        fullName: body.full_name,
        password: body.password,
      });
      res.status(201).json(toUserResponse(user));
    })
  );

  router.post(
    '/login',
    options.loginRateLimiter,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const token = await loginUseCase.execute({
        identifier: body.username,
        password: body.password,
      });
      res.status(200).json(toTokenResponse(token));
    })
  );

  router.get('/me', requireAuth, (req, res) => {
    res.json(toUserResponse(toPublicUser(currentUser(req))));
  });

  router.patch(
    '/me',
    requireAuth,
    validate({ body: updateProfileBodySchema }),
    asyncHandler(async (req, res) => {
      const body = updateProfileBodySchema.parse(req.body);
      const user = await updateProfileUseCase.execute({
        user: currentUser(req),
        email: body.email,
        fullName: body.full_name,
      });
      res.json(toUserResponse(user));
    })
  );

  router.post('/refresh', requireAuth, (req, res) => {
    res.json(toTokenResponse(refreshUseCase.execute(currentUser(req))));
  });

  router.patch(
    '/users/:id/active',
    requireAuth,
    validate({ params: userIdParamsSchema, body: setActiveBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      const body = setActiveBodySchema.parse(req.body);
      const user = await setUserActiveUseCase.execute({
        actor: currentUser(req),
        userId: id,
        isActive: body.is_active,
      });
      res.json(toUserResponse(user));
    })
  );

  return router;
}
