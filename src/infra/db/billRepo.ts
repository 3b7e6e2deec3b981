import type { DbPool } from './pool.js';
import type { NewParkingBill, ParkingBill } from '../../domain/parking/bill.js';
import { SlotOccupiedError } from '../../domain/parking/errors.js';
import type {
  BillRepository,
  MonthlyTotalRow,
  VehicleTypeCountRow,
} from '../../application/ports.js';

interface BillRow {
  id: number;
  customer_name: string;
  vehicle_number: string;
  vehicle_type: string;
  slot_number: string;
  month: string;
  year: string;
  payment_mode: string;
  amount_cents: number;
  bill_date: Date;
  generated_by: string | null;
  is_paid: boolean;
}

const BILL_COLUMNS = `id, customer_name, vehicle_number, vehicle_type, slot_number, month, year,
  payment_mode, amount_cents, bill_date, generated_by, is_paid`;

function toBill(row: BillRow): ParkingBill {
  return {
    id: row.id,
    customerName: row.customer_name,
    vehicleNumber: row.vehicle_number,
    vehicleType: row.vehicle_type,
    slotNumber: row.slot_number,
    month: row.month,
    year: row.year,
    paymentMode: row.payment_mode,
    amountCents: Number(row.amount_cents),
    billDate: row.bill_date,
    generatedBy: row.generated_by ?? '',
    isPaid: row.is_paid,
  };
}

/**
 * Escape LIKE wildcards so user input only ever matches literally.
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class BillRepo implements BillRepository {
  constructor(private pool: DbPool) {}

  async findByPeriod(slotNumber: string, month: string, year: string): Promise<ParkingBill | null> {
    const result = await this.pool.query<BillRow>(
      `SELECT ${BILL_COLUMNS} FROM parking_bills
       WHERE slot_number = $1 AND month = $2 AND year = $3`,
      [slotNumber, month, year]
    );
    return result.rows.length === 0 ? null : toBill(result.rows[0]);
  }

  /**
   * The unique (slot_number, month, year) constraint arbitrates concurrent
   * bookings: the losing insert returns no row.
   */
  async insert(bill: NewParkingBill): Promise<ParkingBill> {
    const result = await this.pool.query<BillRow>(
      `INSERT INTO parking_bills
         (customer_name, vehicle_number, vehicle_type, slot_number, month, year,
          payment_mode, amount_cents, bill_date, generated_by, is_paid)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       ON CONFLICT (slot_number, month, year) DO NOTHING
       RETURNING ${BILL_COLUMNS}`,
      [
        bill.customerName,
        bill.vehicleNumber,
        bill.vehicleType,
        bill.slotNumber,
        bill.month,
        bill.year,
        bill.paymentMode,
        bill.amountCents,
        bill.billDate,
        bill.generatedBy,
        bill.isPaid,
      ]
    );

    if (result.rows.length === 0) {
      throw new SlotOccupiedError(bill.slotNumber, bill.month, bill.year);
    }
    return toBill(result.rows[0]);
  }

  async count(): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM parking_bills'
    );
    return result.rows[0]?.count ?? 0;
  }

  async countCreatedBetween(from: Date, to: Date): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM parking_bills
       WHERE bill_date >= $1 AND bill_date < $2`,
      [from, to]
    );
    return result.rows[0]?.count ?? 0;
  }

  async countOccupiedSlots(month: string, year: string): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      `SELECT COUNT(DISTINCT slot_number)::int AS count FROM parking_bills
       WHERE month = $1 AND year = $2`,
      [month, year]
    );
    return result.rows[0]?.count ?? 0;
  }

  async listNewest(limit: number, offset: number): Promise<ParkingBill[]> {
    const result = await this.pool.query<BillRow>(
      `SELECT ${BILL_COLUMNS} FROM parking_bills
       ORDER BY bill_date DESC, id DESC
       LIMIT $1 OFFSET $2`,
      [limit, offset]
    );
    return result.rows.map(toBill);
  }

  async search(query: string, limit: number): Promise<ParkingBill[]> {
    const pattern = `%${escapeLikePattern(query)}%`;
    const result = await this.pool.query<BillRow>(
      `SELECT ${BILL_COLUMNS} FROM parking_bills
       WHERE customer_name ILIKE $1 ESCAPE '\\'
          OR vehicle_number ILIKE $1 ESCAPE '\\'
          OR slot_number ILIKE $1 ESCAPE '\\'
       ORDER BY bill_date DESC, id DESC
       LIMIT $2`,
      [pattern, limit]
    );
    return result.rows.map(toBill);
  }

  async monthlyTotals(): Promise<MonthlyTotalRow[]> {
    const result = await this.pool.query<{
      month: string;
      year: string;
      count: number;
      total_cents: string;
    }>(
      `SELECT month, year, COUNT(id)::int AS count, COALESCE(SUM(amount_cents), 0) AS total_cents
       FROM parking_bills
       GROUP BY month, year`
    );
    return result.rows.map((row) => ({
      month: row.month,
      year: row.year,
      count: row.count,
      totalCents: Number(row.total_cents),
    }));
  }

  async vehicleTypeCounts(): Promise<VehicleTypeCountRow[]> {
    const result = await this.pool.query<{ vehicle_type: string; count: number }>(
      `SELECT vehicle_type, COUNT(id)::int AS count
       FROM parking_bills
       GROUP BY vehicle_type`
    );
    return result.rows.map((row) => ({
      vehicleType: row.vehicle_type,
      count: row.count,
    }));
  }
}
