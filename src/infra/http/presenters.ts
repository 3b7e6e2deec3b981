import { formatBillId, type ParkingBill } from '../../domain/parking/bill.js';

export interface BillView extends ParkingBill {
  billNumber: string;
  amount: number;
}

export function toBillView(bill: ParkingBill): BillView {
  return {
    ...bill,
    billNumber: formatBillId(bill.id),
    amount: bill.amountCents / 100,
  };
}
