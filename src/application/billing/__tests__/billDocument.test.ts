import { describe, it, expect } from 'vitest';
import { buildBillDocument, TERMS } from '../billDocument.js';
import type { ParkingBill } from '../../../domain/parking/bill.js';

describe('buildBillDocument', () => {
  const facility = { name: 'VENGATESAN CAR PARKING', contact: 'Tittagudi | Contact: 9791365506' };
  const bill: ParkingBill = {
    id: 1,
    customerName: 'Alice',
    vehicleNumber: 'TN10AB1234',
    vehicleType: 'car',
    slotNumber: 'SLOT-01',
    month: 'January',
    year: '2025',
    paymentMode: 'cash',
    amountCents: 100000,
    billDate: new Date(2025, 0, 15, 9, 5),
    generatedBy: 'admin',
    isPaid: true,
  };

  it('should print the header, title and padded bill id', () => {
    const doc = buildBillDocument(bill, facility);

    expect(doc.facility).toEqual(facility);
    expect(doc.title).toBe('MONTHLY PARKING BILL');
    expect(doc.billId).toBe('PB000001');
  });

  it('should list the bill details in order', () => {
    const doc = buildBillDocument(bill, facility);

    expect(doc.details).toEqual([
      { label: 'Bill Date', value: '15-01-2025 09:05' },
      { label: 'Customer Name', value: 'Alice' },
      { label: 'Vehicle Number', value: 'TN10AB1234' },
      { label: 'Vehicle Type', value: 'CAR' },
      { label: 'Parking Slot', value: 'SLOT-01' },
      { label: 'Parking Period', value: 'January 2025' },
      { label: 'Payment Mode', value: 'cash' },
      { label: 'Generated By', value: 'admin' },
      { label: 'Status', value: 'PAID' },
    ]);
  });

  it('should show the monthly charge and total', () => {
    const doc = buildBillDocument(bill, facility);

    expect(doc.charges).toEqual({ label: 'Monthly Parking Charges:', value: 'Rs. 1000.00' });
    expect(doc.total).toEqual({ label: 'TOTAL AMOUNT:', value: 'Rs. 1000.00' });
  });

  it('should include the five terms and the footer', () => {
    const doc = buildBillDocument(bill, facility);

    expect(doc.terms).toEqual([...TERMS]);
    expect(doc.terms).toHaveLength(5);
    expect(doc.terms[4]).toBe('5. Renewal should be done before 5th of every month.');
    expect(doc.footer.partnerName).toBe('CODE HIVE');
    expect(doc.footer.closingLines).toEqual([
      'Thank you for choosing Vengatesan Car Parking!',
      'This is a computer-generated bill.',
    ]);
  });
});
