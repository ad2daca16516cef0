const THOUSANDS = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/** Compact count: 2.30M, 1.5K, 999. */
export function fmtInt(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(2)}M`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)}K`;
  return String(Math.trunc(n));
}

export function fmtPct(percent: number): string {
  return `${percent.toFixed(2)}%`;
}

export function fmtThousands(n: number): string {
  return THOUSANDS.format(Math.trunc(n));
}
