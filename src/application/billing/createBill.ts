import { MONTHLY_CHARGE_CENTS, type ParkingBill } from '../../domain/parking/bill.js';
import { SlotOccupiedError } from '../../domain/parking/errors.js';
import type { BillRepository } from '../ports.js';

export interface CreateBillCommand {
  customerName: string;
  vehicleNumber: string;
  vehicleType: string;
  slotNumber: string;
  month: string;
  year: string;
  paymentMode: string;
  /** Username of the staff member issuing the bill. */
  generatedBy: string;
}

export class CreateBillUseCase {
  constructor(
    private billRepo: BillRepository,
    private now: () => Date = () => new Date()
  ) {}

  async execute(command: CreateBillCommand): Promise<ParkingBill> {
    const existing = await this.billRepo.findByPeriod(command.slotNumber, command.month, command.year);
    if (existing) {
      throw new SlotOccupiedError(command.slotNumber, command.month, command.year);
    }

    // insert() re-checks through the unique constraint, so a concurrent
    // booking of the same slot/period still fails with SlotOccupiedError.
    return this.billRepo.insert({
      customerName: command.customerName,
      vehicleNumber: command.vehicleNumber.toUpperCase(),
      vehicleType: command.vehicleType,
      slotNumber: command.slotNumber,
      month: command.month,
      year: command.year,
      paymentMode: command.paymentMode,
      amountCents: MONTHLY_CHARGE_CENTS,
      billDate: this.now(),
      generatedBy: command.generatedBy,
      isPaid: true,
    });
  }
}
