import { addMonths, startOfMonth } from 'date-fns';
import type { ParkingBill } from '../../domain/parking/bill.js';
import { monthIndex, monthNameOf, TOTAL_SLOTS } from '../../domain/parking/slots.js';
import type { BillRepository } from '../ports.js';

export interface MonthlyReportEntry {
  month: string;
  year: string;
  count: number;
  totalCents: number;
  totalAmount: number;
}

export interface VehicleTypeStat {
  vehicleType: string;
  count: number;
}

export interface Occupancy {
  occupied: number;
  available: number;
  total: number;
}

export interface DashboardSummary {
  /** Bills created during the current calendar month. */
  monthlyCount: number;
  totalBills: number;
  recentBills: ParkingBill[];
  /** Slots rented for the current rental period. */
  occupancy: Occupancy;
}

const RECENT_BILLS = 5;

export class ReportingQueries {
  constructor(private billRepo: BillRepository) {}

  async monthlyReport(): Promise<MonthlyReportEntry[]> {
    const rows = await this.billRepo.monthlyTotals();
    return rows
      .map((row) => ({
        month: row.month,
        year: row.year,
        count: row.count,
        totalCents: row.totalCents,
        totalAmount: row.totalCents / 100,
      }))
      .sort((a, b) => a.year.localeCompare(b.year) || monthIndex(a.month) - monthIndex(b.month));
  }

  async vehicleTypeStats(): Promise<VehicleTypeStat[]> {
    const rows = await this.billRepo.vehicleTypeCounts();
    return [...rows].sort((a, b) => b.count - a.count || a.vehicleType.localeCompare(b.vehicleType));
  }

  /**
   * Counts distinct slots with a bill for today's rental period.
   */
  async occupancy(today: Date): Promise<Occupancy> {
    const occupied = await this.billRepo.countOccupiedSlots(monthNameOf(today), String(today.getFullYear()));
    return {
      occupied,
      available: TOTAL_SLOTS - occupied,
      total: TOTAL_SLOTS,
    };
  }

  async dashboardSummary(today: Date): Promise<DashboardSummary> {
    const monthStart = startOfMonth(today);
    const [monthlyCount, totalBills, recentBills, occupancy] = await Promise.all([
      this.billRepo.countCreatedBetween(monthStart, addMonths(monthStart, 1)),
      this.billRepo.count(),
      this.billRepo.listNewest(RECENT_BILLS, 0),
      this.occupancy(today),
    ]);

    return { monthlyCount, totalBills, recentBills, occupancy };
  }
}
