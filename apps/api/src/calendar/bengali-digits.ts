/** Bengali digit glyphs indexed by their ASCII digit value */
const BENGALI_DIGITS = ['০', '১', '২', '৩', '৪', '৫', '৬', '৭', '৮', '৯'] as const;

/**
 * Replace every ASCII digit with its Bengali glyph; other characters pass
 * through unchanged.
 */
export function toBengaliDigits(value: string): string {
  return value.replace(/[0-9]/g, (digit) => BENGALI_DIGITS[Number(digit)]);
}
