import type { MedicationFrequency } from "@glucocare/shared";
import { addDays, atLocalTime, dayjs, eachLocalDate, localDate } from "../common/time";

export interface ScheduledMedication {
  isActive: boolean;
  reminderEnabled: boolean;
  reminderTimes: string[];
  startDate: Date;
  endDate: Date | null;
}

export function defaultReminderTimes(frequency: MedicationFrequency): string[] {
  switch (frequency) {
    case "Once Daily":
      return ["08:00"];
    case "Twice Daily":
      return ["08:00", "20:00"];
    case "Three Times Daily":
      return ["08:00", "14:00", "20:00"];
    case "Four Times Daily":
      return ["08:00", "12:00", "16:00", "20:00"];
    default:
      return ["08:00"];
  }
}

export function sortedTimes(times: string[]): string[] {
  return [...new Set(times)].sort();
}

/**
 * Next reminder instant after `now`: the earliest of today's remaining
 * reminder times, else the first reminder time tomorrow.
 */
export function nextDoseTime(
  medication: ScheduledMedication,
  now: Date,
  tz: string,
): Date | null {
  if (!medication.isActive || !medication.reminderEnabled) return null;
  const times = sortedTimes(medication.reminderTimes);
  if (times.length === 0) return null;

  const today = localDate(now, tz);
  for (const time of times) {
    const at = atLocalTime(today, time, tz);
    if (at.getTime() > now.getTime()) return at;
  }
  return atLocalTime(addDays(today, 1), times[0], tz);
}

/** End of the dose schedule: the end date, or one year after the start. */
export function scheduleEnd(medication: ScheduledMedication): Date {
  return medication.endDate ?? dayjs.utc(medication.startDate).add(1, "year").toDate();
}

/** Every dose instant from the start date through the schedule end. */
export function doseTimes(medication: ScheduledMedication, tz: string): Date[] {
  const times = sortedTimes(medication.reminderTimes);
  const result: Date[] = [];
  for (const date of eachLocalDate(medication.startDate, scheduleEnd(medication), tz)) {
    for (const time of times) {
      result.push(atLocalTime(date, time, tz));
    }
  }
  return result;
}
