const GROUPED = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/** "Rp 1,234" style; negative values keep the sign after the currency. */
export function formatCurrency(value: number, currency = "Rp"): string {
  if (Number.isNaN(value)) return `${currency} n/a`;
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
  return `${currency} ${GROUPED.format(Math.round(value))}`;
}

export function formatPct(value: number, digits = 1): string {
  if (Number.isNaN(value)) return "n/a";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
  return `${value.toFixed(digits)}%`;
}

/** Infinity is not representable in JSON or a spreadsheet cell. */
export function exportNumber(value: number): number | string {
  if (Number.isNaN(value)) return "";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
  return value;
}
