import {
  ADHERENCE_PERIOD_LABELS,
  type AdherencePeriod,
  type DoseStatus,
} from "@glucocare/shared";
import { dayjs, endOfLocalUnit, startOfLocalUnit } from "../common/time";

export interface DoseLike {
  status: DoseStatus;
  scheduledTime: Date;
}

export interface PeriodBounds {
  start: Date;
  end: Date;
}

export interface AdherenceStats {
  totalDoses: number;
  takenDoses: number;
  skippedDoses: number;
  adherencePercentage: number;
  currentStreak: number;
  longestStreak: number;
}

export function isOverdue(dose: DoseLike, now: Date): boolean {
  return dose.status === "Pending" && dose.scheduledTime.getTime() < now.getTime();
}

export function doseAdherenceScore(dose: DoseLike, now: Date): number {
  switch (dose.status) {
    case "Taken":
      return 1;
    case "Skipped":
      return 0;
    case "Pending":
      return isOverdue(dose, now) ? 0 : 1;
  }
}

/** Mean dose score of a day; an empty day counts as fully adherent. */
export function dayAdherenceScore(doses: DoseLike[], now: Date): number {
  if (doses.length === 0) return 1;
  const total = doses.reduce((sum, d) => sum + doseAdherenceScore(d, now), 0);
  return total / doses.length;
}

export function periodBounds(period: AdherencePeriod, now: Date, tz: string): PeriodBounds {
  switch (period) {
    case "week":
    case "month":
    case "year":
      return {
        start: startOfLocalUnit(now, period, tz),
        end: endOfLocalUnit(now, period, tz),
      };
    case "quarter":
      return { start: dayjs.utc(now).subtract(3, "month").toDate(), end: now };
  }
}

export function periodLabel(period: AdherencePeriod): string {
  return ADHERENCE_PERIOD_LABELS[period];
}

/**
 * Streaks over doses newest first. The current streak is captured on the
 * first taken dose seen and is not extended afterwards.
 */
export function streaks(doses: DoseLike[]): { current: number; longest: number } {
  const sorted = [...doses].sort(
    (a, b) => b.scheduledTime.getTime() - a.scheduledTime.getTime(),
  );

  let current = 0;
  let max = 0;
  let temp = 0;
  for (const dose of sorted) {
    if (dose.status === "Taken") {
      temp += 1;
      if (current === 0) current = temp;
    } else {
      max = Math.max(max, temp);
      temp = 0;
    }
  }
  return { current, longest: Math.max(max, temp) };
}

export function adherenceStats(doses: DoseLike[], bounds: PeriodBounds): AdherenceStats {
  const inPeriod = doses.filter(
    (d) =>
      d.scheduledTime.getTime() >= bounds.start.getTime() &&
      d.scheduledTime.getTime() <= bounds.end.getTime(),
  );

  const takenDoses = inPeriod.filter((d) => d.status === "Taken").length;
  const skippedDoses = inPeriod.filter((d) => d.status === "Skipped").length;
  const { current, longest } = streaks(inPeriod);

  return {
    totalDoses: inPeriod.length,
    takenDoses,
    skippedDoses,
    adherencePercentage: inPeriod.length > 0 ? (takenDoses / inPeriod.length) * 100 : 0,
    currentStreak: current,
    longestStreak: longest,
  };
}

/** Taken share of every dose scheduled since `since`; 100 when there are none. */
export function overallAdherence(doses: DoseLike[], since: Date): number {
  const relevant = doses.filter((d) => d.scheduledTime.getTime() >= since.getTime());
  if (relevant.length === 0) return 100;
  const taken = relevant.filter((d) => d.status === "Taken").length;
  return (taken / relevant.length) * 100;
}
