const moneyFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const numberFormatter = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 2,
});

/** "$1,234.50", "-$20.00" */
export function formatMoney(value: number): string {
  return moneyFormatter.format(value);
}

/** Up to two decimals, grouped: "1,234.5" */
export function formatNumber(value: number): string {
  return numberFormatter.format(value);
}

