import { SeededRandomSource } from './random-source';

describe('SeededRandomSource', () => {
  it('draws from [0, 1)', () => {
    const random = new SeededRandomSource(1);
    for (let i = 0; i < 1000; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('repeats its sequence for the same seed', () => {
    const a = new SeededRandomSource(31);
    const b = new SeededRandomSource(31);
    const c = new SeededRandomSource(32);

    const first = [a.next(), a.next(), a.next()];
    expect([b.next(), b.next(), b.next()]).toEqual(first);
    expect([c.next(), c.next(), c.next()]).not.toEqual(first);
  });
});
