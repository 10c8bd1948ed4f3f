import {
  Discount,
  DiscountInput,
  InvoiceItemInput,
  NewInvoiceItem,
} from '../../models/financial/invoice.model';
import { InvalidDiscountError, InvalidItemError, ValidationError } from '../../utils/errors';
import { Money, MONEY_SCALE, Percentage, PERCENT_SCALE, QUANTITY_SCALE, divRound, parseQuantity, parseScaled } from '../../utils/money';

const QUANTITY_FACTOR = 10n ** BigInt(QUANTITY_SCALE);

export interface InvoiceTotals {
  items: NewInvoiceItem[];
  tax_rate: Percentage;
  discount: Discount | null;
  sub_total: Money;
  discount_amount: Money;
  tax_amount: Money;
  total_amount: Money;
}

const parseItem = (input: InvoiceItemInput, position: number): NewInvoiceItem => {
  if (typeof input.description !== 'string' || input.description.trim() === '') {
    throw new InvalidItemError(position, 'description is required');
  }

  let quantity: bigint;
  let unitPrice: Money;
  try {
    quantity = parseQuantity(input.quantity);
    unitPrice = Money.fromDecimal(input.unit_price, 'Unit price');
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new InvalidItemError(position, err.message);
    }
    throw err;
  }

  if (quantity <= 0n) {
    throw new InvalidItemError(position, 'quantity must be greater than 0');
  }
  if (unitPrice.isNegative()) {
    throw new InvalidItemError(position, 'unit price must not be negative');
  }

  const taxRate =
    input.tax_rate === undefined || input.tax_rate === null
      ? null
      : Percentage.fromValue(input.tax_rate, `Item ${position + 1} tax rate`);

  return {
    position,
    description: input.description.trim(),
    quantity,
    unit_price: unitPrice,
    tax_rate: taxRate,
    total_price: unitPrice.multiply(quantity, QUANTITY_FACTOR),
  };
};

/**
 * Parses and checks a discount against the subtotal it applies to.
 */
export const parseDiscount = (input: DiscountInput | null | undefined, subTotal: Money): Discount | null => {
  if (!input) {
    return null;
  }

  if (input.type === 'percentage') {
    let basisPoints: bigint;
    try {
      basisPoints = parseScaled(input.value, PERCENT_SCALE, 'Discount percentage');
    } catch (err) {
      if (err instanceof ValidationError) throw new InvalidDiscountError(err.message);
      throw err;
    }
    if (basisPoints < 0n) {
      throw new InvalidDiscountError('Discount percentage must not be negative');
    }
    if (basisPoints > Percentage.HUNDRED) {
      throw new InvalidDiscountError('Discount percentage must not exceed 100');
    }
    return { type: 'percentage', value: Percentage.fromBasisPoints(basisPoints) };
  }

  if (input.type === 'fixed') {
    let value: Money;
    try {
      value = Money.fromMinor(parseScaled(input.value, MONEY_SCALE, 'Discount amount'));
    } catch (err) {
      if (err instanceof ValidationError) throw new InvalidDiscountError(err.message);
      throw err;
    }
    if (value.isNegative()) {
      throw new InvalidDiscountError('Discount amount must not be negative');
    }
    if (value.greaterThan(subTotal)) {
      throw new InvalidDiscountError(
        `Discount amount ${value.toDecimal()} exceeds the subtotal of ${subTotal.toDecimal()}`
      );
    }
    return { type: 'fixed', value };
  }

  throw new InvalidDiscountError(`Unknown discount type "${String(input.type)}"`);
};

const discountAmountOf = (discount: Discount | null, subTotal: Money): Money => {
  if (!discount) return Money.zero();
  return discount.type === 'fixed' ? discount.value : subTotal.percent(discount.value);
};

/**
 * Computes line totals, subtotal, discount, tax and grand total.
 *
 * Tax is charged on the discounted base. Lines with their own tax rate are taxed
 * at that rate, the others at the invoice rate; the resulting line tax is scaled
 * by (subtotal - discount) / subtotal and rounded once.
 */
export function calculateInvoiceTotals(
  itemInputs: InvoiceItemInput[],
  taxRateInput: number | string = 0,
  discountInput?: DiscountInput | null
): InvoiceTotals {
  const taxRate = Percentage.fromValue(taxRateInput, 'Tax rate');
  const items = itemInputs.map(parseItem);

  const subTotal = Money.sum(items.map((item) => item.total_price));
  const discount = parseDiscount(discountInput, subTotal);
  const discountAmount = discountAmountOf(discount, subTotal);
  const taxableBase = subTotal.subtract(discountAmount);

  let taxAmount = Money.zero();
  if (subTotal.isPositive()) {
    // Σ line_total × rate, in minor units × basis points
    const weightedTax = items.reduce(
      (acc, item) => acc + item.total_price.minor * (item.tax_rate ?? taxRate).basisPoints,
      0n
    );
    taxAmount = Money.fromMinor(
      divRound(weightedTax * taxableBase.minor, Percentage.HUNDRED * subTotal.minor)
    );
  }

  const total = taxableBase.add(taxAmount);

  return {
    items,
    tax_rate: taxRate,
    discount,
    sub_total: subTotal,
    discount_amount: discountAmount,
    tax_amount: taxAmount,
    total_amount: Money.max(total, Money.zero()),
  };
}
