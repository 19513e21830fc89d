/**
 * Decimal rounding, half away from zero: 20.5627 → 20.56, 3.125 → 3.13.
 * Shifts through the decimal string so 1.005 rounds to 1.01, not 1.
 */
export function roundHalfUp(value: number, digits: number): number {
  if (!Number.isFinite(value)) return value;
  const sign = value < 0 ? -1 : 1;
  const abs = Math.abs(value);
  const text = String(abs);

  if (text.includes("e")) {
    const factor = 10 ** digits;
    return (sign * Math.round(abs * factor)) / factor;
  }

  const shifted = Math.round(Number(`${text}e${digits}`));
  const result = Number(`${shifted}e-${digits}`);
  return result === 0 ? 0 : sign * result;
}

/** count as a percentage of total; 0 when total is 0 */
export function percentageOf(count: number, total: number, digits = 2): number {
  if (total === 0) return 0;
  return roundHalfUp((count * 100) / total, digits);
}
