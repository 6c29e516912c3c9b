/**
 * Float formatting for dump: 12 significant digits when that reads back to the exact
 * same value, the shortest round-trip form otherwise.
 */

const PRETTY_PRECISION = 12;

export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';

  const pretty = trimZeros(value.toPrecision(PRETTY_PRECISION));
  const text = Object.is(Number(pretty), value) ? pretty : String(value);
  // Keeps the literal a float when read back
  return /[.e]/.test(text) ? text : `${text}.0`;
}

/** Drops trailing fraction zeros: "1.50000e+21" -> "1.5e+21", "100.000" -> "100". */
function trimZeros(text: string): string {
  const [mantissa = '', exponent] = text.split('e');
  const trimmed = mantissa.includes('.') ? mantissa.replace(/\.?0+$/, '') : mantissa;
  return exponent === undefined ? trimmed : `${trimmed}e${exponent}`;
}
