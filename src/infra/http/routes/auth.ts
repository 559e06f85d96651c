import { Router } from 'express';
import { LoginUseCase } from '../../../application/auth/login.js';
import { RegisterUseCase } from '../../../application/auth/register.js';
import type { TokenService } from '../../../application/auth/tokenService.js';
import type { UserRepository } from '../../../domain/auth/user.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { authMiddleware, currentUser, type AuthRequest } from '../middleware/auth.js';
import { toUserResponse } from '../presenters.js';
import { loginBodySchema, registerBodySchema } from '../schemas.js';

/**
 * @openapi
 * /auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     description: Password needs 8+ characters with an uppercase letter, a lowercase letter, a digit and a special character.
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
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       400:
 *         description: Email already registered or username already taken
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       422:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive an access token
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string, description: Account email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/Token'
 *       401:
 *         description: Incorrect email or password
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Current user profile
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       403:
 *         description: Inactive user
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

export interface AuthRoutesDeps {
  users: UserRepository;
  tokens: TokenService;
}

export function createAuthRoutes({ users, tokens }: AuthRoutesDeps) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(users);
  const loginUseCase = new LoginUseCase(users, tokens);

  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const user = await registerUseCase.execute(body);
      res.status(201).json(toUserResponse(user));
    })
  );

  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute({
        email: body.username,
        password: body.password,
      });
      res.status(200).json({
        access_token: result.accessToken,
        token_type: result.tokenType,
      });
    })
  );

  router.get('/me', authMiddleware({ tokens, users }), (req: AuthRequest, res) => {
    res.json(toUserResponse(currentUser(req)));
  });

  return router;
}
