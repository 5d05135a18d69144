import { PricedLine } from '../types/inventory.types';

export function roundCurrency(amount: number): number {
     return Math.round(amount * 100) / 100;
}

export function formatCurrency(amount: number): string {
     return `$${amount.toLocaleString('en-US', {
          minimumFractionDigits: 2,
          maximumFractionDigits: 2,
     })}`;
}

/** Sum of salePrice × quantity, rounded to cents */
export function linesTotal(lines: Array<Pick<PricedLine, 'salePrice' | 'quantity'>>): number {
     return roundCurrency(lines.reduce((sum, line) => sum + line.salePrice * line.quantity, 0));
}
