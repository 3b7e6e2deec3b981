import type { NewParkingBill } from '../domain/parking/bill.js';
import { MONTHLY_CHARGE_CENTS } from '../domain/parking/bill.js';

export function newBill(overrides: Partial<NewParkingBill> = {}): NewParkingBill {
  return {
    customerName: 'Test Customer',
    vehicleNumber: 'TN01AA0001',
    vehicleType: 'car',
    slotNumber: 'SLOT-01',
    month: 'January',
    year: '2025',
    paymentMode: 'cash',
    amountCents: MONTHLY_CHARGE_CENTS,
    billDate: new Date(2025, 0, 1, 12, 0),
    generatedBy: 'admin',
    isPaid: true,
    ...overrides,
  };
}
