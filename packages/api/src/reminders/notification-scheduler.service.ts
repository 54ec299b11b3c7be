import { Injectable, Logger } from "@nestjs/common";
import { and, asc, desc, eq, isNotNull, isNull, lte, or, sql } from "drizzle-orm";
import { NOTIFICATION_ACTIONS, NOTIFICATION_ACTION_CONFIG } from "@glucocare/shared";
import type { NotificationRequestResponse } from "@glucocare/shared";
import { atLocalTime, dayjs, eachLocalDate } from "../common/time";
import { DatabaseService } from "../database/database.service";
import {
  Medication,
  MedicationDose,
  NotificationRequest,
  medicationDoses,
  notificationRequests,
} from "../database/schema";
import { MedicationError } from "../medications/medication.errors";
import { sortedTimes } from "../medications/medication-schedule";
import { PushService } from "../push/push.service";
import { UsersService } from "../users/users.service";

export const MEDICATION_REMINDER_CATEGORY = "MEDICATION_REMINDER";

const REMINDER_WINDOW_DAYS = 30;

export function reminderIdentifier(medicationId: string, fireAt: Date): string {
  return `medication_${medicationId}_${Math.floor(fireAt.getTime() / 1000)}`;
}

export function snoozeIdentifier(doseId: string, fireAt: Date): string {
  return `snooze_${doseId}_${Math.floor(fireAt.getTime() / 1000)}`;
}

export function toNotificationResponse(req: NotificationRequest): NotificationRequestResponse {
  return {
    identifier: req.identifier,
    medicationId: req.medicationId,
    doseId: req.doseId,
    kind: req.kind,
    title: req.title,
    body: req.body,
    category: req.category,
    fireAt: req.fireAt.toISOString(),
    deliveredAt: req.deliveredAt?.toISOString() ?? null,
  };
}

const contains = (needle: string) =>
  sql`instr(${notificationRequests.identifier}, ${needle}) > 0`;

const startsWith = (prefix: string) =>
  sql`instr(${notificationRequests.identifier}, ${prefix}) = 1`;

@Injectable()
export class NotificationSchedulerService {
  private readonly logger = new Logger(NotificationSchedulerService.name);

  constructor(
    private database: DatabaseService,
    private push: PushService,
    private users: UsersService,
  ) {}

  /**
   * Replaces the medication's pending reminders with one request per reminder
   * time over the next 30 days (bounded by the end date).
   *
   * When `explicit` is false a user without push subscriptions is skipped with
   * a warning instead of an error.
   */
  scheduleReminders(
    medication: Medication,
    now: Date,
    { explicit = false }: { explicit?: boolean } = {},
  ): NotificationRequest[] {
    this.cancelForMedication(medication.userId, medication.id);

    if (!medication.isActive || !medication.reminderEnabled) return [];

    if (!this.push.hasSubscriptions(medication.userId)) {
      if (explicit) throw MedicationError.notificationPermissionDenied();
      this.logger.warn(
        `[${medication.id}] "${medication.name}": no push subscriptions, reminders not scheduled`,
      );
      return [];
    }

    const tz = this.users.getTimezone(medication.userId);
    const windowEnd = dayjs.utc(now).add(REMINDER_WINDOW_DAYS, "day").toDate();
    const end = new Date(
      Math.min(
        (medication.endDate ?? dayjs.utc(now).add(1, "year").toDate()).getTime(),
        windowEnd.getTime(),
      ),
    );
    const start = new Date(Math.max(medication.startDate.getTime(), now.getTime()));

    const doses = this.database.db
      .select({ id: medicationDoses.id, scheduledTime: medicationDoses.scheduledTime })
      .from(medicationDoses)
      .where(eq(medicationDoses.medicationId, medication.id))
      .all();
    const doseByTime = new Map(doses.map((d) => [d.scheduledTime.getTime(), d.id]));

    const created: NotificationRequest[] = [];
    const times = sortedTimes(medication.reminderTimes);
    this.database.transaction(() => {
      for (const date of eachLocalDate(start, end, tz)) {
        for (const time of times) {
          const fireAt = atLocalTime(date, time, tz);
          if (fireAt.getTime() <= now.getTime()) continue;

          const row = this.database.db
            .insert(notificationRequests)
            .values({
              identifier: reminderIdentifier(medication.id, fireAt),
              userId: medication.userId,
              medicationId: medication.id,
              doseId: doseByTime.get(fireAt.getTime()) ?? null,
              kind: "reminder",
              title: "💊 Medication Reminder",
              body: `Time to take your ${medication.name} (${medication.dosage})`,
              category: MEDICATION_REMINDER_CATEGORY,
              fireAt,
            })
            .onConflictDoNothing()
            .returning()
            .get();
          if (row) created.push(row);
        }
      }
    });

    this.logger.debug(
      `[${medication.id}] "${medication.name}": scheduled ${created.length} reminders`,
    );
    return created;
  }

  scheduleSnooze(
    dose: MedicationDose,
    medication: Medication,
    fireAt: Date,
  ): NotificationRequest {
    return this.database.db
      .insert(notificationRequests)
      .values({
        identifier: snoozeIdentifier(dose.id, fireAt),
        userId: medication.userId,
        medicationId: medication.id,
        doseId: dose.id,
        kind: "snooze",
        title: "💊 Medication Reminder (Snoozed)",
        body: `Don't forget to take your ${medication.name} (${medication.dosage})`,
        category: MEDICATION_REMINDER_CATEGORY,
        fireAt,
      })
      .onConflictDoUpdate({
        target: notificationRequests.identifier,
        set: { deliveredAt: null },
      })
      .returning()
      .get();
  }

  cancelForMedication(userId: string, medicationId: string): number {
    return this.database.db
      .delete(notificationRequests)
      .where(
        and(
          eq(notificationRequests.userId, userId),
          isNull(notificationRequests.deliveredAt),
          contains(medicationId),
        ),
      )
      .run().changes;
  }

  cancelForDose(userId: string, doseId: string): number {
    return this.database.db
      .delete(notificationRequests)
      .where(
        and(
          eq(notificationRequests.userId, userId),
          isNull(notificationRequests.deliveredAt),
          or(contains(doseId), eq(notificationRequests.doseId, doseId)),
        ),
      )
      .run().changes;
  }

  cancelAll(userId: string): { cancelled: number } {
    const cancelled = this.database.db
      .delete(notificationRequests)
      .where(
        and(
          eq(notificationRequests.userId, userId),
          isNull(notificationRequests.deliveredAt),
          or(startsWith("medication_"), startsWith("snooze_")),
        ),
      )
      .run().changes;
    return { cancelled };
  }

  pending(userId: string): NotificationRequest[] {
    return this.database.db
      .select()
      .from(notificationRequests)
      .where(
        and(eq(notificationRequests.userId, userId), isNull(notificationRequests.deliveredAt)),
      )
      .orderBy(asc(notificationRequests.fireAt))
      .all();
  }

  delivered(userId: string, limit = 50): NotificationRequest[] {
    return this.database.db
      .select()
      .from(notificationRequests)
      .where(
        and(eq(notificationRequests.userId, userId), isNotNull(notificationRequests.deliveredAt)),
      )
      .orderBy(desc(notificationRequests.deliveredAt))
      .limit(limit)
      .all();
  }

  /**
   * Sends every due, undelivered request. A request that reached no subscription
   * stays pending for the next run.
   */
  async dispatchDue(now: Date): Promise<number> {
    const due = this.database.db
      .select()
      .from(notificationRequests)
      .where(
        and(isNull(notificationRequests.deliveredAt), lte(notificationRequests.fireAt, now)),
      )
      .orderBy(asc(notificationRequests.fireAt))
      .all();

    let delivered = 0;
    for (const req of due) {
      try {
        const result = await this.push.sendToUser(req.userId, {
          title: req.title,
          body: req.body,
          category: req.category,
          actions: NOTIFICATION_ACTIONS.map((action) => ({
            action,
            title: NOTIFICATION_ACTION_CONFIG[action].title,
          })),
          data: {
            identifier: req.identifier,
            medicationId: req.medicationId,
            doseId: req.doseId,
          },
        });
        if (result.sent === 0) {
          this.logger.warn(
            `[${req.identifier}] not delivered (0/${result.total} subscriptions), retrying next run`,
          );
          continue;
        }
        if (result.sent < result.total) {
          this.logger.warn(
            `[${req.identifier}] delivered to ${result.sent}/${result.total} subscriptions`,
          );
        }
        this.database.db
          .update(notificationRequests)
          .set({ deliveredAt: now })
          .where(eq(notificationRequests.identifier, req.identifier))
          .run();
        delivered++;
        this.logger.debug(`[${req.identifier}] "${req.title}": delivered to user ${req.userId}`);
      } catch (err) {
        this.logger.error(`Error delivering notification ${req.identifier}: ${err}`);
      }
    }
    return delivered;
  }
}
