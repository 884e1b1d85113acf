import { getSafetyProfile } from '../../src/llm/safety-profiles';

describe('getSafetyProfile', () => {
  it('returns a known profile', () => {
    expect(getSafetyProfile('strict')?.temperature).toBe(0);
  });

  it('returns undefined for empty or unknown names', () => {
    expect(getSafetyProfile(undefined)).toBeUndefined();
    expect(getSafetyProfile('')).toBeUndefined();
    expect(getSafetyProfile('lenient')).toBeUndefined();
  });

  it('ignores names inherited from Object.prototype', () => {
    expect(getSafetyProfile('constructor')).toBeUndefined();
    expect(getSafetyProfile('toString')).toBeUndefined();
    expect(getSafetyProfile('__proto__')).toBeUndefined();
  });
});
