import { isPastDue } from './trigger';

describe('isPastDue', () => {
  const expectedAt = new Date('2026-10-19T08:00:10.000Z');

  it('accepts ticks within the tolerance', () => {
    expect(isPastDue(expectedAt, new Date('2026-10-19T08:00:10.000Z'), 1000)).toBe(false);
    expect(isPastDue(expectedAt, new Date('2026-10-19T08:00:11.000Z'), 1000)).toBe(false);
  });

  it('flags ticks later than the tolerance', () => {
    expect(isPastDue(expectedAt, new Date('2026-10-19T08:00:11.001Z'), 1000)).toBe(true);
  });

  it('never flags early ticks', () => {
    expect(isPastDue(expectedAt, new Date('2026-10-19T08:00:09.990Z'), 0)).toBe(false);
  });
});
