import type { IsoDate, LocationInfo } from '../types/journal';

/**
 * Source of the per-day location shown in each day heading. The engine only
 * reads from it; how holidays or work patterns are stored is up to the provider.
 */
export interface CalendarProvider {
  locationFor(date: IsoDate): LocationInfo;
}
