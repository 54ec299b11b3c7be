import { ForbiddenException, Injectable, NotFoundException } from "@nestjs/common";
import { and, asc, eq, gt, gte, lte } from "drizzle-orm";
import type {
  AdherencePeriod,
  AdherenceReportResponse,
  CalendarDayResponse,
  DoseResponse,
  MarkTakenDto,
  NotificationActionDto,
} from "@glucocare/shared";
import {
  atLocalTime,
  datesOfMonth,
  dayjs,
  endOfLocalDay,
  localDate,
  startOfLocalDay,
} from "../common/time";
import { DatabaseService } from "../database/database.service";
import { MedicationDose, medicationDoses } from "../database/schema";
import { NotificationSchedulerService } from "../reminders/notification-scheduler.service";
import { UsersService } from "../users/users.service";
import {
  adherenceStats,
  dayAdherenceScore,
  isOverdue,
  overallAdherence,
  periodBounds,
  periodLabel,
} from "./adherence";
import { MedicationsService } from "./medications.service";

export const DEFAULT_SNOOZE_MINUTES = 15;

export function toDoseResponse(dose: MedicationDose, now: Date): DoseResponse {
  return {
    id: dose.id,
    medicationId: dose.medicationId,
    scheduledTime: dose.scheduledTime.toISOString(),
    actualTime: dose.actualTime?.toISOString() ?? null,
    status: dose.status,
    notes: dose.notes,
    sideEffectsExperienced: dose.sideEffectsExperienced,
    skippedReason: dose.skippedReason,
    isOverdue: isOverdue(dose, now),
  };
}

@Injectable()
export class DosesService {
  constructor(
    private database: DatabaseService,
    private scheduler: NotificationSchedulerService,
    private medications: MedicationsService,
    private users: UsersService,
  ) {}

  private between(userId: string, from: Date, to: Date): MedicationDose[] {
    return this.database.db
      .select()
      .from(medicationDoses)
      .where(
        and(
          eq(medicationDoses.userId, userId),
          gte(medicationDoses.scheduledTime, from),
          lte(medicationDoses.scheduledTime, to),
        ),
      )
      .orderBy(asc(medicationDoses.scheduledTime))
      .all();
  }

  private getOwned(userId: string, doseId: string): MedicationDose {
    const dose = this.database.db
      .select()
      .from(medicationDoses)
      .where(eq(medicationDoses.id, doseId))
      .get();
    if (!dose) throw new NotFoundException("Dose not found");
    if (dose.userId !== userId) throw new ForbiddenException();
    return dose;
  }

  today(userId: string, now = new Date()): DoseResponse[] {
    const tz = this.users.getTimezone(userId);
    return this.between(userId, startOfLocalDay(now, tz), endOfLocalDay(now, tz)).map((d) =>
      toDoseResponse(d, now),
    );
  }

  upcoming(userId: string, now = new Date()): DoseResponse[] {
    const until = dayjs.utc(now).add(7, "day").toDate();
    return this.database.db
      .select()
      .from(medicationDoses)
      .where(
        and(
          eq(medicationDoses.userId, userId),
          gt(medicationDoses.scheduledTime, now),
          lte(medicationDoses.scheduledTime, until),
        ),
      )
      .orderBy(asc(medicationDoses.scheduledTime))
      .all()
      .map((d) => toDoseResponse(d, now));
  }

  calendar(userId: string, month: string, now = new Date()): CalendarDayResponse[] {
    const tz = this.users.getTimezone(userId);
    const dates = datesOfMonth(month);
    const from = atLocalTime(dates[0], "00:00", tz);
    const to = endOfLocalDay(atLocalTime(dates[dates.length - 1], "12:00", tz), tz);

    const byDate = new Map<string, MedicationDose[]>();
    for (const dose of this.between(userId, from, to)) {
      const key = localDate(dose.scheduledTime, tz);
      byDate.set(key, [...(byDate.get(key) ?? []), dose]);
    }

    return dates.map((date) => {
      const doses = byDate.get(date) ?? [];
      return {
        date,
        doses: doses.map((d) => toDoseResponse(d, now)),
        adherenceScore: dayAdherenceScore(doses, now),
        hasOverdueDoses: doses.some((d) => isOverdue(d, now)),
        completedDoses: doses.filter((d) => d.status === "Taken").length,
        totalDoses: doses.length,
      };
    });
  }

  markTaken(userId: string, doseId: string, dto: MarkTakenDto = {}, now = new Date()): DoseResponse {
    const dose = this.getOwned(userId, doseId);
    const updated = this.database.db
      .update(medicationDoses)
      .set({
        status: "Taken",
        actualTime: dto.takenAt ? new Date(dto.takenAt) : now,
        skippedReason: null,
        notes: dto.notes,
        sideEffectsExperienced: dto.sideEffectsExperienced,
      })
      .where(eq(medicationDoses.id, dose.id))
      .returning()
      .get();
    this.scheduler.cancelForDose(userId, dose.id);
    return toDoseResponse(updated, now);
  }

  markSkipped(userId: string, doseId: string, reason?: string, now = new Date()): DoseResponse {
    const dose = this.getOwned(userId, doseId);
    const updated = this.database.db
      .update(medicationDoses)
      .set({ status: "Skipped", actualTime: null, skippedReason: reason ?? null })
      .where(eq(medicationDoses.id, dose.id))
      .returning()
      .get();
    this.scheduler.cancelForDose(userId, dose.id);
    return toDoseResponse(updated, now);
  }

  snooze(userId: string, doseId: string, minutes = DEFAULT_SNOOZE_MINUTES, now = new Date()) {
    const dose = this.getOwned(userId, doseId);
    const medication = this.medications.getOwned(userId, dose.medicationId);
    this.scheduler.cancelForDose(userId, dose.id);
    const request = this.scheduler.scheduleSnooze(
      dose,
      medication,
      dayjs.utc(now).add(minutes, "minute").toDate(),
    );
    return { identifier: request.identifier, fireAt: request.fireAt.toISOString() };
  }

  handleAction(userId: string, dto: NotificationActionDto, now = new Date()) {
    switch (dto.action) {
      case "DOSE_TAKEN":
        return this.markTaken(userId, dto.doseId, {}, now);
      case "DOSE_SKIP":
        return this.markSkipped(userId, dto.doseId, "Skipped from notification", now);
      case "DOSE_SNOOZE":
        return this.snooze(userId, dto.doseId, DEFAULT_SNOOZE_MINUTES, now);
    }
  }

  adherenceReport(
    userId: string,
    medicationId: string,
    period: AdherencePeriod,
    now = new Date(),
  ): AdherenceReportResponse {
    const medication = this.medications.getOwned(userId, medicationId);
    const bounds = periodBounds(period, now, this.users.getTimezone(userId));
    const doses = this.database.db
      .select()
      .from(medicationDoses)
      .where(eq(medicationDoses.medicationId, medication.id))
      .all();

    return {
      medicationId: medication.id,
      period,
      periodLabel: periodLabel(period),
      startDate: bounds.start.toISOString(),
      endDate: bounds.end.toISOString(),
      ...adherenceStats(doses, bounds),
    };
  }

  overallAdherence(userId: string, period: AdherencePeriod, now = new Date()) {
    const bounds = periodBounds(period, now, this.users.getTimezone(userId));
    const doses = this.database.db
      .select({ status: medicationDoses.status, scheduledTime: medicationDoses.scheduledTime })
      .from(medicationDoses)
      .where(
        and(
          eq(medicationDoses.userId, userId),
          gte(medicationDoses.scheduledTime, bounds.start),
        ),
      )
      .all();

    return {
      period,
      periodLabel: periodLabel(period),
      adherencePercentage: overallAdherence(doses, bounds.start),
    };
  }
}
