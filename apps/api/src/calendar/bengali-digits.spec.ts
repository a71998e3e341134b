import { toBengaliDigits } from './bengali-digits';

describe('toBengaliDigits', () => {
  it('maps every ASCII digit', () => {
    expect(toBengaliDigits('0123456789')).toBe('০১২৩৪৫৬৭৮৯');
  });

  it('leaves other characters in place', () => {
    expect(toBengaliDigits('day 12a')).toBe('day ১২a');
  });

  it('returns Bengali input unchanged', () => {
    expect(toBengaliDigits('১২')).toBe('১২');
  });
});
