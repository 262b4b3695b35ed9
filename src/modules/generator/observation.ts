export const TIMES_OF_DAY = ['morning', 'afternoon', 'evening', 'night'] as const;
export const SEASONS = ['spring', 'summer', 'fall', 'winter'] as const;
export const DAYS_OF_WEEK = ['weekday', 'weekend'] as const;

export type TimeOfDay = (typeof TIMES_OF_DAY)[number];
export type Season = (typeof SEASONS)[number];
export type DayOfWeek = (typeof DAYS_OF_WEEK)[number];

/**
 * One synthetic water-usage measurement, in the column order of
 * `WATER_CONSUMPTION_DATA`.
 */
export interface Observation {
  timeOfDay: TimeOfDay;
  season: Season;
  /** Outdoor temperature in °C. */
  temperature: number;
  /** Number of residents, 1 to 5. */
  householdSize: number;
  dayOfWeek: DayOfWeek;
  /** Litres consumed during the period. */
  waterConsumption: number;
  isAnomaly: 0 | 1;
}
