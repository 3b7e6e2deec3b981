import type { ParkingBill } from '../../domain/parking/bill.js';
import type { BillRepository } from '../ports.js';
import { NotFoundError } from '../errors.js';

export const DEFAULT_PAGE_SIZE = 20;
export const SEARCH_LIMIT = 50;

export interface Page<T> {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
  hasPrev: boolean;
  hasNext: boolean;
}

export class BillQueries {
  constructor(private billRepo: BillRepository) {}

  /**
   * Newest bills first. Pages past the end (other than an empty first page)
   * are NotFound.
   */
  async listBills(page: number, pageSize: number = DEFAULT_PAGE_SIZE): Promise<Page<ParkingBill>> {
    if (!Number.isInteger(page) || page < 1) {
      throw new NotFoundError(`Page not found: ${page}`);
    }

    const [total, items] = await Promise.all([
      this.billRepo.count(),
      this.billRepo.listNewest(pageSize, (page - 1) * pageSize),
    ]);
    if (items.length === 0 && page !== 1) {
      throw new NotFoundError(`Page not found: ${page}`);
    }

    const totalPages = Math.ceil(total / pageSize);
    return {
      items,
      page,
      pageSize,
      total,
      totalPages,
      hasPrev: page > 1,
      hasNext: page < totalPages,
    };
  }

  async search(query: string): Promise<ParkingBill[]> {
    const trimmed = query.trim();
    if (trimmed === '') {
      return [];
    }
    return this.billRepo.search(trimmed, SEARCH_LIMIT);
  }
}
