import { RandomSource } from './random-source';
import {
  DAYS_OF_WEEK,
  Observation,
  SEASONS,
  TIMES_OF_DAY,
} from './observation';

const TEMPERATURE_MEAN = 20;
const TEMPERATURE_STD_DEV = 5;
const MIN_HOUSEHOLD_SIZE = 1;
const MAX_HOUSEHOLD_SIZE = 5;
const LITRES_PER_RESIDENT = 50;
const CONSUMPTION_NOISE_STD_DEV = 10;
const ANOMALY_PROBABILITY = 0.05;
// Only the second offset actually moves consumption; half of all flagged
// records keep their baseline value.
const ANOMALY_OFFSETS = [0, 250] as const;

function pick<T>(random: RandomSource, values: readonly T[]): T {
  return values[Math.floor(random.next() * values.length)];
}

function uniformInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

/**
 * Box-Muller transform. Consumes two uniform draws per value.
 */
function normal(random: RandomSource, mean: number, stdDev: number): number {
  const u1 = 1 - random.next(); // (0, 1], keeps log() finite
  const u2 = random.next();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + stdDev * z;
}

function generateObservation(random: RandomSource): Observation {
  const timeOfDay = pick(random, TIMES_OF_DAY);
  const season = pick(random, SEASONS);
  const temperature = normal(random, TEMPERATURE_MEAN, TEMPERATURE_STD_DEV);
  const householdSize = uniformInt(random, MIN_HOUSEHOLD_SIZE, MAX_HOUSEHOLD_SIZE);
  const dayOfWeek = pick(random, DAYS_OF_WEEK);

  let waterConsumption =
    householdSize * LITRES_PER_RESIDENT + normal(random, 0, CONSUMPTION_NOISE_STD_DEV);

  const isAnomaly = random.next() < ANOMALY_PROBABILITY ? 1 : 0;
  if (isAnomaly === 1) {
    waterConsumption += pick(random, ANOMALY_OFFSETS);
  }

  return {
    timeOfDay,
    season,
    temperature,
    householdSize,
    dayOfWeek,
    waterConsumption,
    isAnomaly,
  };
}

/**
 * Generates `count` synthetic observations in generation order.
 *
 * Every field is drawn independently per record: categorical fields uniformly,
 * temperature from N(20, 5), household size uniformly from 1..5, and
 * consumption as `householdSize * 50 + N(0, 10)`. Each record is flagged as an
 * anomaly with probability 0.05; a flagged record gets 0 or 250 litres added.
 *
 * @throws RangeError when `count` is not a positive integer
 */
export function generateObservations(count: number, random: RandomSource): Observation[] {
  if (!Number.isInteger(count) || count <= 0) {
    throw new RangeError(`Sample count must be a positive integer, got ${count}`);
  }

  const observations: Observation[] = [];
  for (let i = 0; i < count; i++) {
    observations.push(generateObservation(random));
  }
  return observations;
}
