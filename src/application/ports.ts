import type { Role, User } from '../domain/auth/user.js';
import type { NewParkingBill, ParkingBill } from '../domain/parking/bill.js';

export interface NewUser {
  username: string;
  passwordHash: string;
  role: Role;
  isPrimary: boolean;
}

export interface UserRepository {
  findByUsername(username: string): Promise<User | null>;
  findById(id: number): Promise<User | null>;
  findPrimary(): Promise<User | null>;
  list(): Promise<User[]>;
  /** Throws DuplicateUsernameError when the username is taken. */
  create(user: NewUser): Promise<User>;
  delete(id: number): Promise<boolean>;
  incrementTokenVersion(id: number): Promise<void>;
}

export interface MonthlyTotalRow {
  month: string;
  year: string;
  count: number;
  totalCents: number;
}

export interface VehicleTypeCountRow {
  vehicleType: string;
  count: number;
}

export interface BillRepository {
  findByPeriod(slotNumber: string, month: string, year: string): Promise<ParkingBill | null>;
  /** Throws SlotOccupiedError when the (slot, month, year) triple is taken. */
  insert(bill: NewParkingBill): Promise<ParkingBill>;
  count(): Promise<number>;
  countCreatedBetween(from: Date, to: Date): Promise<number>;
  countOccupiedSlots(month: string, year: string): Promise<number>;
  listNewest(limit: number, offset: number): Promise<ParkingBill[]>;
  search(query: string, limit: number): Promise<ParkingBill[]>;
  monthlyTotals(): Promise<MonthlyTotalRow[]>;
  vehicleTypeCounts(): Promise<VehicleTypeCountRow[]>;
}
