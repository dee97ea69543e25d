import { Router } from 'express';
import { AuthGate } from '../../../application/auth/authGate.js';
import { toPublicUser } from '../../../domain/auth/user.js';
import { currentUser, requireAuth } from '../middleware/auth.js';

/**
 * @openapi
 * /api/users/me:
 *   get:
 *     tags: [Users]
 *     summary: Profile of the authenticated user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
export function createUserRoutes(authGate: AuthGate) {
  const router = Router();

  router.use(requireAuth(authGate));

  router.get('/me', (req, res) => {
    res.json(toPublicUser(currentUser(req)));
  });

  return router;
}
