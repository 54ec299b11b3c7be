import {
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from "@nestjs/common";
import { and, asc, eq, gt } from "drizzle-orm";
import type {
  CreateMedicationDto,
  MedicationResponse,
  UpdateMedicationDto,
} from "@glucocare/shared";
import { describeError } from "../common/domain-error";
import { DatabaseService } from "../database/database.service";
import { Medication, medicationDoses, medications } from "../database/schema";
import { NotificationSchedulerService } from "../reminders/notification-scheduler.service";
import { UsersService } from "../users/users.service";
import { MedicationError } from "./medication.errors";
import {
  defaultReminderTimes,
  doseTimes,
  nextDoseTime,
  sortedTimes,
} from "./medication-schedule";

export function toMedicationResponse(
  med: Medication,
  now: Date,
  tz: string,
): MedicationResponse {
  return {
    id: med.id,
    name: med.name,
    dosage: med.dosage,
    frequency: med.frequency,
    medicationType: med.medicationType,
    prescribedBy: med.prescribedBy,
    startDate: med.startDate.toISOString(),
    endDate: med.endDate?.toISOString() ?? null,
    instructions: med.instructions,
    sideEffects: med.sideEffects,
    isActive: med.isActive,
    reminderEnabled: med.reminderEnabled,
    reminderTimes: med.reminderTimes,
    color: med.color,
    shape: med.shape,
    nextDoseTime: nextDoseTime(med, now, tz)?.toISOString() ?? null,
    createdAt: med.createdAt.toISOString(),
    updatedAt: med.updatedAt.toISOString(),
  };
}

@Injectable()
export class MedicationsService {
  private readonly logger = new Logger(MedicationsService.name);

  constructor(
    private database: DatabaseService,
    private scheduler: NotificationSchedulerService,
    private users: UsersService,
  ) {}

  create(userId: string, dto: CreateMedicationDto, now = new Date()): MedicationResponse {
    const startDate = dto.startDate ? new Date(dto.startDate) : now;
    const endDate = dto.endDate ? new Date(dto.endDate) : null;
    if (endDate && endDate.getTime() < startDate.getTime()) {
      throw MedicationError.invalidData();
    }

    const reminderTimes =
      dto.reminderTimes && dto.reminderTimes.length > 0
        ? sortedTimes(dto.reminderTimes)
        : defaultReminderTimes(dto.frequency);

    let medication: Medication;
    try {
      medication = this.database.db
        .insert(medications)
        .values({
          userId,
          name: dto.name,
          dosage: dto.dosage,
          frequency: dto.frequency,
          medicationType: dto.medicationType,
          prescribedBy: dto.prescribedBy,
          startDate,
          endDate,
          instructions: dto.instructions,
          sideEffects: dto.sideEffects,
          isActive: dto.isActive,
          reminderEnabled: dto.reminderEnabled,
          reminderTimes,
          color: dto.color,
          shape: dto.shape,
        })
        .returning()
        .get();
    } catch (err) {
      this.logger.error(`Failed to save medication for user ${userId}: ${err}`);
      throw MedicationError.saveFailed(describeError(err));
    }

    const tz = this.users.getTimezone(userId);
    this.syncDoses(medication, tz, now);
    this.scheduler.scheduleReminders(medication, now);
    return toMedicationResponse(medication, now, tz);
  }

  findAll(userId: string, activeOnly = false, now = new Date()): MedicationResponse[] {
    const tz = this.users.getTimezone(userId);
    try {
      const rows = this.database.db
        .select()
        .from(medications)
        .where(
          activeOnly
            ? and(eq(medications.userId, userId), eq(medications.isActive, true))
            : eq(medications.userId, userId),
        )
        .orderBy(asc(medications.name))
        .all();
      return rows.map((m) => toMedicationResponse(m, now, tz));
    } catch (err) {
      throw MedicationError.loadFailed(describeError(err));
    }
  }

  getOwned(userId: string, id: string): Medication {
    const medication = this.database.db
      .select()
      .from(medications)
      .where(eq(medications.id, id))
      .get();
    if (!medication) throw new NotFoundException("Medication not found");
    if (medication.userId !== userId) throw new ForbiddenException();
    return medication;
  }

  findOne(userId: string, id: string, now = new Date()): MedicationResponse {
    const medication = this.getOwned(userId, id);
    return toMedicationResponse(medication, now, this.users.getTimezone(userId));
  }

  update(
    userId: string,
    id: string,
    dto: UpdateMedicationDto,
    now = new Date(),
  ): MedicationResponse {
    const existing = this.getOwned(userId, id);

    const startDate = dto.startDate ? new Date(dto.startDate) : existing.startDate;
    const endDate =
      dto.endDate === undefined
        ? existing.endDate
        : dto.endDate === null
          ? null
          : new Date(dto.endDate);
    if (endDate && endDate.getTime() < startDate.getTime()) {
      throw MedicationError.invalidData();
    }

    let reminderTimes = existing.reminderTimes;
    if (dto.reminderTimes && dto.reminderTimes.length > 0) {
      reminderTimes = sortedTimes(dto.reminderTimes);
    } else if (dto.frequency && dto.frequency !== existing.frequency) {
      reminderTimes = defaultReminderTimes(dto.frequency);
    }

    let medication: Medication;
    try {
      medication = this.database.db
        .update(medications)
        .set({
          name: dto.name,
          dosage: dto.dosage,
          frequency: dto.frequency,
          medicationType: dto.medicationType,
          prescribedBy: dto.prescribedBy,
          startDate,
          endDate,
          instructions: dto.instructions,
          sideEffects: dto.sideEffects,
          isActive: dto.isActive,
          reminderEnabled: dto.reminderEnabled,
          reminderTimes,
          color: dto.color,
          shape: dto.shape,
          updatedAt: now,
        })
        .where(eq(medications.id, existing.id))
        .returning()
        .get();
    } catch (err) {
      this.logger.error(`Failed to update medication ${id}: ${err}`);
      throw MedicationError.updateFailed(describeError(err));
    }

    const tz = this.users.getTimezone(userId);
    this.syncDoses(medication, tz, now);
    this.scheduler.scheduleReminders(medication, now);
    return toMedicationResponse(medication, now, tz);
  }

  remove(userId: string, id: string) {
    const medication = this.getOwned(userId, id);
    this.scheduler.cancelForMedication(userId, medication.id);
    try {
      this.database.transaction(() => {
        this.database.db
          .delete(medicationDoses)
          .where(eq(medicationDoses.medicationId, medication.id))
          .run();
        this.database.db.delete(medications).where(eq(medications.id, medication.id)).run();
      });
    } catch (err) {
      this.logger.error(`Failed to delete medication ${id}: ${err}`);
      throw MedicationError.deleteFailed(describeError(err));
    }
    return { deleted: true };
  }

  /** Explicit reminder (re)scheduling; fails when the user cannot receive push. */
  scheduleReminders(userId: string, id: string, now = new Date()) {
    const medication = this.getOwned(userId, id);
    const scheduled = this.scheduler.scheduleReminders(medication, now, { explicit: true });
    return { scheduled: scheduled.length };
  }

  /** Moves every active medication's 30-day reminder window forward. */
  refreshAllReminders(now = new Date()): number {
    const active = this.database.db
      .select()
      .from(medications)
      .where(and(eq(medications.isActive, true), eq(medications.reminderEnabled, true)))
      .all();

    let refreshed = 0;
    for (const medication of active) {
      try {
        this.scheduler.scheduleReminders(medication, now);
        refreshed++;
      } catch (err) {
        this.logger.error(`Error refreshing reminders for medication ${medication.id}: ${err}`);
      }
    }
    return refreshed;
  }

  /**
   * Replaces future pending doses with the medication's current schedule.
   * Doses already taken, skipped or in the past are kept.
   */
  private syncDoses(medication: Medication, tz: string, now: Date) {
    this.database.transaction(() => {
      this.database.db
        .delete(medicationDoses)
        .where(
          and(
            eq(medicationDoses.medicationId, medication.id),
            eq(medicationDoses.status, "Pending"),
            gt(medicationDoses.scheduledTime, now),
          ),
        )
        .run();

      if (!medication.isActive) return;

      for (const scheduledTime of doseTimes(medication, tz)) {
        this.database.db
          .insert(medicationDoses)
          .values({
            userId: medication.userId,
            medicationId: medication.id,
            scheduledTime,
            sideEffectsExperienced: [],
          })
          .onConflictDoNothing()
          .run();
      }
    });
  }
}
