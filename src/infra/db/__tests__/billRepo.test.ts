import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import pg from 'pg';
import { BillRepo, escapeLikePattern } from '../billRepo.js';
import { SlotOccupiedError } from '../../../domain/parking/errors.js';
import { newBill } from '../../../testing/fixtures.js';

// The pool never connects: every query is stubbed.
describe('BillRepo', () => {
  let pool: pg.Pool;
  let repo: BillRepo;

  const storedRow = {
    id: 1,
    customer_name: 'Alice',
    vehicle_number: 'TN10AB1234',
    vehicle_type: 'car',
    slot_number: 'SLOT-01',
    month: 'January',
    year: '2025',
    payment_mode: 'cash',
    amount_cents: 100000,
    bill_date: new Date(2025, 0, 3, 10, 30),
    generated_by: 'admin',
    is_paid: true,
  };

  beforeEach(() => {
    pool = new pg.Pool();
    repo = new BillRepo(pool);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('insert', () => {
    it('should map the returned row to a bill', async () => {
      const query = vi.spyOn(pool, 'query').mockImplementationOnce(async () => ({ rows: [storedRow], rowCount: 1 }));

      const bill = await repo.insert(
        newBill({ customerName: 'Alice', vehicleNumber: 'TN10AB1234', billDate: storedRow.bill_date })
      );

      expect(bill).toEqual({
        id: 1,
        customerName: 'Alice',
        vehicleNumber: 'TN10AB1234',
        vehicleType: 'car',
        slotNumber: 'SLOT-01',
        month: 'January',
        year: '2025',
        paymentMode: 'cash',
        amountCents: 100000,
        billDate: storedRow.bill_date,
        generatedBy: 'admin',
        isPaid: true,
      });
      expect(String(query.mock.calls[0][0])).toContain('ON CONFLICT (slot_number, month, year) DO NOTHING');
    });

    it('should raise SlotOccupiedError when the conflict clause swallows the insert', async () => {
      vi.spyOn(pool, 'query').mockImplementationOnce(async () => ({ rows: [], rowCount: 0 }));

      await expect(repo.insert(newBill({ slotNumber: 'SLOT-07', month: 'May', year: '2026' }))).rejects.toEqual(
        new SlotOccupiedError('SLOT-07', 'May', '2026')
      );
    });
  });

  describe('search', () => {
    it('should wrap the escaped query in wildcards and pass the limit', async () => {
      const query = vi.spyOn(pool, 'query').mockImplementationOnce(async () => ({ rows: [], rowCount: 0 }));

      await repo.search('50%_off', 50);

      expect(query.mock.calls[0][1]).toEqual(['%50\\%\\_off%', 50]);
    });
  });

  describe('monthlyTotals', () => {
    it('should convert bigint sums to numbers', async () => {
      vi.spyOn(pool, 'query').mockImplementationOnce(async () => ({
        rows: [{ month: 'January', year: '2025', count: 2, total_cents: '200000' }],
        rowCount: 1,
      }));

      expect(await repo.monthlyTotals()).toEqual([
        { month: 'January', year: '2025', count: 2, totalCents: 200000 },
      ]);
    });
  });
});

describe('escapeLikePattern', () => {
  it('should escape LIKE wildcards and backslashes', () => {
    expect(escapeLikePattern('SLOT-01')).toBe('SLOT-01');
    expect(escapeLikePattern('a%b_c\\d')).toBe('a\\%b\\_c\\\\d');
  });
});
