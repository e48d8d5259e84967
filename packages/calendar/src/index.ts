/**
 * spanset calendar
 *
 * Timezone-aware recurring windows and bound coercion for spanset timelines.
 *
 * @packageDocumentation
 */

// Recurring windows
export { CalendarWindow, businessHours, dayOfWeek, timeOfDay, weekdays, weekends } from './windows.js';
export type { BusinessHoursOptions, DayOfWeek, TimeOfDayOptions } from './windows.js';
// Zones
export { isValidTimeZone, zonedBounds } from './zoned.js';
