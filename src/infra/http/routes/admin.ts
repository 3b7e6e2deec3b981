import { Router } from 'express';
import { z } from 'zod';
import { UserAdmin } from '../../../application/admin/userAdmin.js';
import { BillQueries } from '../../../application/admin/billQueries.js';
import { ReportingQueries } from '../../../application/reporting/reports.js';
import type { BillRepository, UserRepository } from '../../../application/ports.js';
import { ROLES } from '../../../domain/auth/user.js';
import type { Logger } from '../../logger.js';
import { requireAdmin, currentUser } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { toBillView } from '../presenters.js';

/**
 * @openapi
 * /admin/bills:
 *   get:
 *     tags: [Admin]
 *     summary: All bills, newest first, 20 per page
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: page
 *         schema: { type: integer, minimum: 1, default: 1 }
 *     responses:
 *       200: { description: One page of bills }
 *       403:
 *         description: Caller is not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Page out of range
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin/users:
 *   get:
 *     tags: [Admin]
 *     summary: List staff accounts
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *       403:
 *         description: Caller is not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin/add_user:
 *   post:
 *     tags: [Admin]
 *     summary: Create a staff account
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, password, role]
 *             properties:
 *               username: { type: string }
 *               password: { type: string, minLength: 6 }
 *               role: { type: string, enum: [admin, operator] }
 *     responses:
 *       201: { description: User created }
 *       409:
 *         description: Username already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin/delete_user/{id}:
 *   get:
 *     tags: [Admin]
 *     summary: Delete a staff account
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200: { description: User deleted }
 *       403:
 *         description: Primary admin cannot be deleted
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Unknown user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin/reports:
 *   get:
 *     tags: [Admin]
 *     summary: Bill totals per rental month and counts per vehicle type
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 */

const billsQuerySchema = z.object({
  page: z.coerce.number().int().default(1),
});

const addUserBodySchema = z.object({
  username: z.string().trim().min(1).max(80),
  password: z.string().min(6),
  role: z.enum(ROLES),
});

const deleteUserParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export function createAdminRoutes(userRepo: UserRepository, billRepo: BillRepository, logger: Logger) {
  const router = Router();
  const userAdmin = new UserAdmin(userRepo);
  const billQueries = new BillQueries(billRepo);
  const reporting = new ReportingQueries(billRepo);

  router.use(requireAdmin);

  router.get(
    '/bills',
    validate({ query: billsQuerySchema }),
    asyncHandler(async (req, res) => {
      const { page } = billsQuerySchema.parse(req.query);
      const result = await billQueries.listBills(page);
      res.json({ ...result, items: result.items.map(toBillView) });
    })
  );

  router.get(
    '/users',
    asyncHandler(async (_req, res) => {
      const users = await userAdmin.listUsers();
      res.json({ users });
    })
  );

  router.post(
    '/add_user',
    validate({ body: addUserBodySchema }),
    asyncHandler(async (req, res) => {
      const body = addUserBodySchema.parse(req.body);
      const user = await userAdmin.addUser(body);
      logger.info('User added', { userId: user.id, role: user.role, by: currentUser(req).username });
      res.status(201).json({ message: 'User added successfully!', user });
    })
  );

  router.get(
    '/delete_user/:id',
    validate({ params: deleteUserParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = deleteUserParamsSchema.parse(req.params);
      await userAdmin.deleteUser(id);
      logger.info('User deleted', { userId: id, by: currentUser(req).username });
      res.json({ message: 'User deleted successfully!' });
    })
  );

  router.get(
    '/reports',
    asyncHandler(async (_req, res) => {
      const [monthlyReports, vehicleStats] = await Promise.all([
        reporting.monthlyReport(),
        reporting.vehicleTypeStats(),
      ]);
      res.json({ monthlyReports, vehicleStats });
    })
  );

  return router;
}
