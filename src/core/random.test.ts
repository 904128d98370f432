import { SeededRandom } from './random';

describe('SeededRandom', () => {
  it('should produce the same sequence for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);

    const first = [a.next(), a.next(), a.next()];
    const second = [b.next(), b.next(), b.next()];

    expect(first).toEqual(second);
  });

  it('should produce different sequences for different seeds', () => {
    const a = new SeededRandom(1);
    const b = new SeededRandom(2);

    expect(a.next()).not.toBe(b.next());
  });

  it('should replay from the start after reset', () => {
    const rng = new SeededRandom(9);
    const first = rng.next();
    rng.next();

    rng.reset();

    expect(rng.next()).toBe(first);
    expect(rng.seed).toBe(9);
  });

  it('should keep draws inside their ranges', () => {
    const rng = new SeededRandom(3);

    for (let i = 0; i < 200; i++) {
      const value = rng.range(-2, 2);
      expect(value).toBeGreaterThanOrEqual(-2);
      expect(value).toBeLessThan(2);

      const whole = rng.int(1, 3);
      expect([1, 2, 3]).toContain(whole);

      const angle = rng.angle();
      expect(angle).toBeGreaterThanOrEqual(0);
      expect(angle).toBeLessThan(Math.PI * 2);
    }
  });

  it('should pick items from the list', () => {
    const rng = new SeededRandom(5);

    expect(['a', 'b']).toContain(rng.pick(['a', 'b']));
  });

  it('should throw when picking from an empty list', () => {
    const rng = new SeededRandom(5);

    expect(() => rng.pick([])).toThrow(RangeError);
  });
});
