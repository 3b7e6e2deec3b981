/**
 * Flat monthly charge, in paise (Rs. 1000.00).
 */
export const MONTHLY_CHARGE_CENTS = 100_000;

export interface ParkingBill {
  readonly id: number;
  readonly customerName: string;
  readonly vehicleNumber: string;
  readonly vehicleType: string;
  readonly slotNumber: string;
  readonly month: string;
  readonly year: string;
  readonly paymentMode: string;
  readonly amountCents: number;
  readonly billDate: Date;
  readonly generatedBy: string;
  readonly isPaid: boolean;
}

export type NewParkingBill = Omit<ParkingBill, 'id'>;

/**
 * Bill identifier as printed, e.g. `PB000042`.
 */
export function formatBillId(id: number): string {
  return `PB${String(id).padStart(6, '0')}`;
}

export function formatRupees(cents: number): string {
  return `Rs. ${(cents / 100).toFixed(2)}`;
}

export function billFilename(bill: Pick<ParkingBill, 'id' | 'customerName' | 'month' | 'year'>): string {
  return `Parking_Bill_${bill.customerName.replace(/ /g, '_')}_${bill.month}_${bill.year}_${bill.id}.pdf`;
}
