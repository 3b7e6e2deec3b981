import { describe, it, expect, beforeEach, vi } from 'vitest';
import { BillQueries } from '../billQueries.js';
import { InMemoryBillRepo } from '../../../testing/inMemoryRepos.js';
import { newBill } from '../../../testing/fixtures.js';
import { NotFoundError } from '../../errors.js';
import { MONTHS, PARKING_SLOTS } from '../../../domain/parking/slots.js';

describe('BillQueries', () => {
  let billRepo: InMemoryBillRepo;
  let queries: BillQueries;

  beforeEach(() => {
    billRepo = new InMemoryBillRepo();
    queries = new BillQueries(billRepo);
  });

  async function seed(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await billRepo.insert(
        newBill({
          slotNumber: PARKING_SLOTS[i % 14],
          month: MONTHS[Math.floor(i / 14) % 12],
          year: String(2020 + Math.floor(i / (14 * 12))),
          billDate: new Date(2025, 0, 1, 0, i),
        })
      );
    }
  }

  describe('listBills', () => {
    it('should page 20 bills at a time, newest first', async () => {
      await seed(45);

      const first = await queries.listBills(1);
      const last = await queries.listBills(3);

      expect(first.items).toHaveLength(20);
      expect(first.items[0].id).toBe(45);
      expect(first).toMatchObject({ page: 1, pageSize: 20, total: 45, totalPages: 3, hasPrev: false, hasNext: true });
      expect(last.items).toHaveLength(5);
      expect(last.items[4].id).toBe(1);
      expect(last).toMatchObject({ page: 3, hasPrev: true, hasNext: false });
    });

    it('should return an empty first page when there are no bills', async () => {
      const page = await queries.listBills(1);

      expect(page).toEqual({
        items: [],
        page: 1,
        pageSize: 20,
        total: 0,
        totalPages: 0,
        hasPrev: false,
        hasNext: false,
      });
    });

    it('should treat pages past the end as not found', async () => {
      await seed(5);

      await expect(queries.listBills(2)).rejects.toThrow(NotFoundError);
      await expect(queries.listBills(0)).rejects.toThrow(NotFoundError);
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await billRepo.insert(
        newBill({ customerName: 'Alice', vehicleNumber: 'TN10AB1234', slotNumber: 'SLOT-01', billDate: new Date(2025, 0, 1) })
      );
      await billRepo.insert(
        newBill({ customerName: 'Bob', vehicleNumber: 'KA05CD0001', slotNumber: 'SLOT-10', billDate: new Date(2025, 0, 2) })
      );
      await billRepo.insert(
        newBill({ customerName: 'Carol', vehicleNumber: 'TN22EF5678', slotNumber: 'SLOT-02', billDate: new Date(2025, 0, 3) })
      );
    });

    it('should return nothing for an empty query without querying the store', async () => {
      const spy = vi.spyOn(billRepo, 'search');

      expect(await queries.search('')).toEqual([]);
      expect(await queries.search('   ')).toEqual([]);
      expect(spy).not.toHaveBeenCalled();
    });

    it('should match a substring of the slot number', async () => {
      const results = await queries.search('SLOT-01');

      expect(results.map((b) => b.customerName)).toEqual(['Alice']);
    });

    it('should match customer name or vehicle number case-insensitively, newest first', async () => {
      expect((await queries.search('tn')).map((b) => b.customerName)).toEqual(['Carol', 'Alice']);
      expect((await queries.search('bo')).map((b) => b.customerName)).toEqual(['Bob']);
    });

    it('should cap results at 50', async () => {
      const spy = vi.spyOn(billRepo, 'search');

      await queries.search('SLOT');

      expect(spy).toHaveBeenCalledWith('SLOT', 50);
    });
  });
});
