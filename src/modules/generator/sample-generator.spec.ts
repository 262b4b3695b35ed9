import { SequenceRandomSource } from '../../testing/sequence-random-source';
import { DAYS_OF_WEEK, SEASONS, TIMES_OF_DAY } from './observation';
import { SeededRandomSource } from './random-source';
import { generateObservations } from './sample-generator';

describe('generateObservations', () => {
  it('returns exactly the requested number of complete records', () => {
    const observations = generateObservations(250, new SeededRandomSource(7));

    expect(observations).toHaveLength(250);
    for (const observation of observations) {
      expect(TIMES_OF_DAY).toContain(observation.timeOfDay);
      expect(SEASONS).toContain(observation.season);
      expect(DAYS_OF_WEEK).toContain(observation.dayOfWeek);
      expect(Number.isFinite(observation.temperature)).toBe(true);
      expect(Number.isInteger(observation.householdSize)).toBe(true);
      expect(observation.householdSize).toBeGreaterThanOrEqual(1);
      expect(observation.householdSize).toBeLessThanOrEqual(5);
      expect(Number.isFinite(observation.waterConsumption)).toBe(true);
      expect([0, 1]).toContain(observation.isAnomaly);
    }
  });

  it('derives every field from the random source in a fixed order', () => {
    // Per record: time of day, season, 2 temperature draws, household size,
    // day of week, 2 noise draws, anomaly flag, then the offset when flagged.
    // A second Box-Muller draw of 0.25 gives cos(pi / 2), i.e. a zero deviation.
    const random = new SequenceRandomSource([
      0.0, 0.3, 0.5, 0.25, 0.6, 0.7, 0.5, 0.25, 0.9,
      0.99, 0.8, 0.5, 0.25, 0.0, 0.0, 0.5, 0.25, 0.01, 0.75,
      0.5, 0.55, 0.5, 0.25, 0.45, 0.2, 0.5, 0.25, 0.04, 0.2,
    ]);

    const [first, second, third] = generateObservations(3, random);

    expect(random.remaining).toBe(0);

    expect(first).toMatchObject({
      timeOfDay: 'morning',
      season: 'summer',
      householdSize: 4,
      dayOfWeek: 'weekend',
      isAnomaly: 0,
    });
    expect(first.temperature).toBeCloseTo(20, 10);
    expect(first.waterConsumption).toBeCloseTo(200, 10);

    expect(second).toMatchObject({
      timeOfDay: 'night',
      season: 'winter',
      householdSize: 1,
      dayOfWeek: 'weekday',
      isAnomaly: 1,
    });
    expect(second.waterConsumption).toBeCloseTo(300, 10);

    // Flagged, but the drawn offset is 0.
    expect(third).toMatchObject({
      timeOfDay: 'evening',
      season: 'fall',
      householdSize: 3,
      dayOfWeek: 'weekday',
      isAnomaly: 1,
    });
    expect(third.waterConsumption).toBeCloseTo(150, 10);
  });

  it('produces the same batch for the same seed', () => {
    expect(generateObservations(20, new SeededRandomSource(99))).toEqual(
      generateObservations(20, new SeededRandomSource(99)),
    );
  });

  it('centres regular consumption on 50 litres per resident', () => {
    const observations = generateObservations(20000, new SeededRandomSource(12345));
    const regular = observations.filter((observation) => observation.isAnomaly === 0);

    const meanResidual =
      regular.reduce(
        (sum, observation) => sum + observation.waterConsumption - observation.householdSize * 50,
        0,
      ) / regular.length;
    const meanTemperature =
      observations.reduce((sum, observation) => sum + observation.temperature, 0) /
      observations.length;
    const anomalyRate = (observations.length - regular.length) / observations.length;

    expect(Math.abs(meanResidual)).toBeLessThan(0.5);
    expect(Math.abs(meanTemperature - 20)).toBeLessThan(0.2);
    expect(anomalyRate).toBeGreaterThan(0.04);
    expect(anomalyRate).toBeLessThan(0.06);
    expect(new Set(observations.map((observation) => observation.householdSize))).toEqual(
      new Set([1, 2, 3, 4, 5]),
    );
  });

  it.each([0, -3, 2.5])('rejects a count of %p', (count) => {
    expect(() => generateObservations(count, new SeededRandomSource(1))).toThrow(RangeError);
  });
});
