import { config } from "./config";

export const CURRENCY = "eur";

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function roundMoney(amount: number): number {
  return fromCents(toCents(amount));
}

export type Charge = { amount: number; commission: number; commission_rate: number; total_amount: number };

export function computeCharge(price: number, rate = config.commissionRate): Charge {
  const amount = roundMoney(price);
  const commission = fromCents(Math.round(toCents(amount) * rate));
  return { amount, commission, commission_rate: rate, total_amount: fromCents(toCents(amount) + toCents(commission)) };
}

export function computeVat(total: number, rate = config.vatRate): number {
  return fromCents(Math.round(toCents(total) * rate));
}

export function formatEuro(amount: number): string {
  return `€${amount.toFixed(2)}`;
}
