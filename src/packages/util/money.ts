import Decimal, { type Numeric } from "decimal.js-light";

export type MoneyValue = Numeric;

// Enough significant digits that sums and products of rates, hours and
// prices (each at most 17 digits) are never rounded.
const MoneyDecimal = Decimal.clone({ precision: 100 });

export type Currency = "USD" | "JPY";

const SYMBOL: { [currency in Currency]: string } = {
  USD: "$",
  JPY: "¥",
};

// JPY has no minor unit
const DEFAULT_DECIMALS: { [currency in Currency]: number } = {
  USD: 2,
  JPY: 0,
};

export function toDecimal(value: MoneyValue): Decimal {
  return new MoneyDecimal(value);
}

export function moneyAdd(a: MoneyValue, b: MoneyValue): Decimal {
  return new MoneyDecimal(a).add(b);
}

export function moneyMultiply(...factors: MoneyValue[]): Decimal {
  let product = new MoneyDecimal(1);
  for (const factor of factors) {
    product = product.mul(factor);
  }
  return product;
}

export function moneyDivide(a: MoneyValue, b: MoneyValue): Decimal {
  return new MoneyDecimal(a).div(b);
}

export function moneySum(values: Iterable<MoneyValue>): Decimal {
  let total = new MoneyDecimal(0);
  for (const value of values) {
    total = total.add(value);
  }
  return total;
}

export function isCurrency(value: unknown): value is Currency {
  return (
    typeof value == "string" &&
    Object.prototype.hasOwnProperty.call(SYMBOL, value)
  );
}

function addCommas(value: string): string {
  const [whole, fraction] = value.split(".");
  const withCommas = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  if (fraction == null) {
    return withCommas;
  }
  return `${withCommas}.${fraction}`;
}

export function moneyToCurrency(
  amount: MoneyValue,
  decimals?: number,
  currency: Currency = "USD",
): string {
  const dec = new MoneyDecimal(amount);
  const symbol = SYMBOL[currency];
  const dp = decimals ?? DEFAULT_DECIMALS[currency];
  if (dec.eq(0)) {
    return `${symbol}${(0).toFixed(dp)}`;
  }
  let s = `${symbol}${addCommas(dec.abs().toFixed(dp))}`;
  if (dec.isNegative()) {
    s = `-${s}`;
  }
  return s;
}
