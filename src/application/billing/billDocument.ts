import { format } from 'date-fns';
import { formatBillId, formatRupees, type ParkingBill } from '../../domain/parking/bill.js';

export interface FacilityHeader {
  name: string;
  contact: string;
}

export interface DetailLine {
  label: string;
  value: string;
}

/**
 * Everything printed on a bill, independent of the output format.
 */
export interface BillDocument {
  facility: FacilityHeader;
  title: string;
  billId: string;
  details: DetailLine[];
  charges: DetailLine;
  total: DetailLine;
  terms: string[];
  footer: {
    partnerName: string;
    partnerTagline: string;
    partnerHeading: string;
    partnerContacts: string[];
    closingLines: string[];
  };
}

export const BILL_TITLE = 'MONTHLY PARKING BILL';

export const TERMS = [
  '1. This bill is valid only for the specified month.',
  '2. Vehicle should not block other slots.',
  '3. Parking charges are non-refundable.',
  '4. Management is not responsible for any damage/theft.',
  '5. Renewal should be done before 5th of every month.',
] as const;

export const BILL_DATE_FORMAT = 'dd-MM-yyyy HH:mm';

export function buildBillDocument(bill: ParkingBill, facility: FacilityHeader): BillDocument {
  const amount = formatRupees(bill.amountCents);

  return {
    facility,
    title: BILL_TITLE,
    billId: formatBillId(bill.id),
    details: [
      { label: 'Bill Date', value: format(bill.billDate, BILL_DATE_FORMAT) },
      { label: 'Customer Name', value: bill.customerName },
      { label: 'Vehicle Number', value: bill.vehicleNumber },
      { label: 'Vehicle Type', value: bill.vehicleType.toUpperCase() },
      { label: 'Parking Slot', value: bill.slotNumber },
      { label: 'Parking Period', value: `${bill.month} ${bill.year}` },
      { label: 'Payment Mode', value: bill.paymentMode },
      { label: 'Generated By', value: bill.generatedBy },
      { label: 'Status', value: bill.isPaid ? 'PAID' : 'UNPAID' },
    ],
    charges: { label: 'Monthly Parking Charges:', value: amount },
    total: { label: 'TOTAL AMOUNT:', value: amount },
    terms: [...TERMS],
    footer: {
      partnerName: 'CODE HIVE',
      partnerTagline: 'LEARN AND LEAD',
      partnerHeading: 'Development Partner',
      partnerContacts: [
        'Email: codehive143@gmail.com',
        'Phone: +91 63745 76277',
        'Web: www.codehive.dev',
      ],
      closingLines: [
        `Thank you for choosing ${toTitleCase(facility.name)}!`,
        'This is a computer-generated bill.',
      ],
    },
  };
}

function toTitleCase(value: string): string {
  return value.toLowerCase().replace(/\b\w/g, (ch) => ch.toUpperCase());
}
