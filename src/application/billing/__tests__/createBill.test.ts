import { describe, it, expect, beforeEach } from 'vitest';
import { CreateBillUseCase, type CreateBillCommand } from '../createBill.js';
import { InMemoryBillRepo } from '../../../testing/inMemoryRepos.js';
import { SlotOccupiedError } from '../../../domain/parking/errors.js';

describe('CreateBillUseCase', () => {
  const issuedAt = new Date(2025, 0, 3, 10, 30);
  let billRepo: InMemoryBillRepo;
  let useCase: CreateBillUseCase;

  const aliceBooking: CreateBillCommand = {
    customerName: 'Alice',
    vehicleNumber: 'tn10ab1234',
    vehicleType: 'car',
    slotNumber: 'SLOT-01',
    month: 'January',
    year: '2025',
    paymentMode: 'cash',
    generatedBy: 'admin',
  };

  beforeEach(() => {
    billRepo = new InMemoryBillRepo();
    useCase = new CreateBillUseCase(billRepo, () => issuedAt);
  });

  it('should store the bill with the fixed charge and uppercased vehicle number', async () => {
    const bill = await useCase.execute(aliceBooking);

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
      billDate: issuedAt,
      generatedBy: 'admin',
      isPaid: true,
    });
    expect(await billRepo.count()).toBe(1);
  });

  it('should reject a second booking of the same slot and period', async () => {
    await useCase.execute(aliceBooking);

    const error = await useCase.execute(aliceBooking).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SlotOccupiedError);
    expect(error).toMatchObject({ slot: 'SLOT-01', month: 'January', year: '2025' });
    expect(await billRepo.count()).toBe(1);
  });

  it('should allow the same slot for a different month or year', async () => {
    await useCase.execute(aliceBooking);
    await useCase.execute({ ...aliceBooking, month: 'February' });
    await useCase.execute({ ...aliceBooking, year: '2026' });

    expect(await billRepo.count()).toBe(3);
  });

  it('should allow different slots in the same period', async () => {
    await useCase.execute(aliceBooking);
    const second = await useCase.execute({ ...aliceBooking, slotNumber: 'SLOT-02', customerName: 'Bob' });

    expect(second.id).toBe(2);
  });

  it('should let exactly one of two concurrent bookings succeed', async () => {
    const results = await Promise.allSettled([
      useCase.execute(aliceBooking),
      useCase.execute({ ...aliceBooking, customerName: 'Mallory' }),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r) => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].status === 'rejected' && rejected[0].reason).toBeInstanceOf(SlotOccupiedError);
    expect(await billRepo.count()).toBe(1);
  });
});
