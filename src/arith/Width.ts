/**
 * Width arithmetic for overflow-free bit-vector operations.
 *
 * The `*NoOverflow` predicates gate rule conditions; `maxPlus1` and
 * `widthOfLeftShift` compute the widths that derived right-hand sides use.
 */

/** Constant value of an unsigned sign class */
export const UNSIGNED = 0;
/** Constant value of a signed sign class */
export const SIGNED = 1;

/**
 * Output width of a sum that cannot wrap: max(wa, wb) + 1
 */
export function maxPlus1(wa: number, wb: number): number {
  return Math.max(wa, wb) + 1;
}

/**
 * Output width of `value << amount` when the amount is any `amountWidth`-bit
 * number: valueWidth + 2^amountWidth - 1
 */
export function widthOfLeftShift(valueWidth: number, amountWidth: number): number {
  return valueWidth + (2 ** amountWidth - 1);
}

export function addNoOverflow(wo: number, wa: number, wb: number): boolean {
  return wo >= maxPlus1(wa, wb);
}

export function mulNoOverflow(wo: number, wa: number, wb: number): boolean {
  return wo >= wa + wb;
}

export function shiftNoOverflow(wo: number, valueWidth: number, amountWidth: number): boolean {
  return wo >= widthOfLeftShift(valueWidth, amountWidth);
}
