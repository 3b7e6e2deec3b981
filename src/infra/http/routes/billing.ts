import { Router } from 'express';
import { z, ZodError } from 'zod';
import { CreateBillUseCase } from '../../../application/billing/createBill.js';
import { buildBillDocument, type BillDocument, type FacilityHeader } from '../../../application/billing/billDocument.js';
import type { BillRepository } from '../../../application/ports.js';
import { BillGenerationError } from '../../../application/errors.js';
import { billFilename, formatBillId } from '../../../domain/parking/bill.js';
import { SlotOccupiedError } from '../../../domain/parking/errors.js';
import { MONTHS, PARKING_SLOTS, YEARS } from '../../../domain/parking/slots.js';
import type { Logger } from '../../logger.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { currentUser } from '../middleware/auth.js';

/**
 * @openapi
 * /:
 *   get:
 *     tags: [Billing]
 *     summary: Options for the booking form
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: Slots, years and months that can be booked
 *       401:
 *         description: Not logged in
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /generate:
 *   post:
 *     tags: [Billing]
 *     summary: Book a slot for a month and download the bill PDF
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [customerName, vehicleNumber, vehicleType, slotNumber, month, year, paymentMode]
 *             properties:
 *               customerName: { type: string, example: Alice }
 *               vehicleNumber: { type: string, example: TN10AB1234 }
 *               vehicleType: { type: string, example: car }
 *               slotNumber: { type: string, example: SLOT-01 }
 *               month: { type: string, example: January }
 *               year: { type: string, example: '2025' }
 *               paymentMode: { type: string, example: cash }
 *     responses:
 *       200:
 *         description: Bill PDF
 *         content:
 *           application/pdf:
 *             schema: { type: string, format: binary }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Slot already occupied for the period
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       500:
 *         description: Bill could not be generated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const generateBodySchema = z.object({
  customerName: z.string().trim().min(1).max(100),
  vehicleNumber: z.string().trim().min(1).max(20),
  vehicleType: z.string().trim().min(1).max(20),
  slotNumber: z.string().refine((slot) => PARKING_SLOTS.includes(slot), 'Unknown parking slot'),
  month: z.enum(MONTHS),
  year: z.string().refine((year) => YEARS.includes(year), 'Year is not bookable'),
  paymentMode: z.string().trim().min(1).max(20),
});

export interface BillingRouteDeps {
  billRepo: BillRepository;
  facility: FacilityHeader;
  renderPdf: (doc: BillDocument) => Promise<Buffer>;
  now: () => Date;
  logger: Logger;
}

export function createBillingRoutes(deps: BillingRouteDeps) {
  const router = Router();
  const createBill = new CreateBillUseCase(deps.billRepo, deps.now);

  router.get('/', (_req, res) => {
    res.json({
      slots: PARKING_SLOTS,
      years: YEARS,
      months: MONTHS,
      currentYear: deps.now().getFullYear(),
    });
  });

  router.post(
    '/generate',
    validate({ body: generateBodySchema }),
    asyncHandler(async (req, res) => {
      const body = generateBodySchema.parse(req.body);
      const user = currentUser(req);

      let pdf: Buffer;
      let filename: string;
      try {
        const bill = await createBill.execute({ ...body, generatedBy: user.username });
        deps.logger.info('Bill created', {
          billId: formatBillId(bill.id),
          slot: bill.slotNumber,
          period: `${bill.month} ${bill.year}`,
          generatedBy: bill.generatedBy,
        });
        // Rendering only starts once the bill row is stored
        pdf = await deps.renderPdf(buildBillDocument(bill, deps.facility));
        filename = billFilename(bill);
      } catch (error) {
        if (error instanceof SlotOccupiedError || error instanceof ZodError) {
          throw error;
        }
        throw new BillGenerationError(error);
      }

      res.attachment(filename);
      res.type('application/pdf');
      res.send(pdf);
    })
  );

  return router;
}
