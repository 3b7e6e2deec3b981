import { Router } from 'express';
import { z } from 'zod';
import { ReportingQueries } from '../../../application/reporting/reports.js';
import { BillQueries } from '../../../application/admin/billQueries.js';
import type { BillRepository } from '../../../application/ports.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { toBillView } from '../presenters.js';

/**
 * @openapi
 * /dashboard:
 *   get:
 *     tags: [Dashboard]
 *     summary: Bill counts, recent bills and current slot availability
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: Not logged in
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /search:
 *   get:
 *     tags: [Dashboard]
 *     summary: Find bills by customer name, vehicle number or slot
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: q
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Up to 50 matching bills, newest first
 *       401:
 *         description: Not logged in
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const searchQuerySchema = z.object({
  q: z.string().optional().default(''),
});

export function createDashboardRoutes(billRepo: BillRepository, now: () => Date) {
  const router = Router();
  const reporting = new ReportingQueries(billRepo);
  const billQueries = new BillQueries(billRepo);

  router.get(
    '/dashboard',
    asyncHandler(async (_req, res) => {
      const summary = await reporting.dashboardSummary(now());
      res.json({
        monthlyCount: summary.monthlyCount,
        totalBills: summary.totalBills,
        recentBills: summary.recentBills.map(toBillView),
        availableSlots: summary.occupancy.available,
        occupiedSlots: summary.occupancy.occupied,
        totalSlots: summary.occupancy.total,
      });
    })
  );

  router.get(
    '/search',
    validate({ query: searchQuerySchema }),
    asyncHandler(async (req, res) => {
      const { q } = searchQuerySchema.parse(req.query);
      const bills = await billQueries.search(q);
      res.json({ query: q, bills: bills.map(toBillView) });
    })
  );

  return router;
}
