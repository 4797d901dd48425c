import Decimal from 'decimal.js';

/**
 * "+1.23% (+$45.60)" / "-1.23% (-$45.60)"
 *
 * The sign follows the dollar change; zero is shown as "+".
 * @param percentChange - Fraction (0.0123 = 1.23%)
 */
export function formatChange(dollarChange: Decimal.Value, percentChange: Decimal.Value): string {
  const dollar = new Decimal(dollarChange);
  const percent = new Decimal(percentChange).times(100);
  const sign = dollar.lessThan(0) ? '-' : '+';

  return `${sign}${percent.abs().toFixed(2)}% (${sign}$${dollar.abs().toFixed(2)})`;
}
