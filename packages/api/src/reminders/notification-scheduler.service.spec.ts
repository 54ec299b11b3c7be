import { Test } from "@nestjs/testing";
import * as webPush from "web-push";
import { NotificationSchedulerService } from "./notification-scheduler.service";
import { DatabaseService } from "../database/database.service";
import { Medication, medicationDoses, medications } from "../database/schema";
import { createTestDatabase, insertTestUser } from "../database/testing";
import { MedicationError } from "../medications/medication.errors";
import { PushService } from "../push/push.service";
import { UsersService } from "../users/users.service";

jest.mock("web-push", () => {
  class WebPushError extends Error {
    constructor(
      message: string,
      public statusCode: number,
      public headers: Record<string, string>,
      public body: string,
      public endpoint: string,
    ) {
      super(message);
    }
  }
  return { setVapidDetails: jest.fn(), sendNotification: jest.fn(), WebPushError };
});

describe("NotificationSchedulerService", () => {
  let service: NotificationSchedulerService;
  let database: DatabaseService;
  let push: { hasSubscriptions: jest.Mock; sendToUser: jest.Mock };
  let users: { getTimezone: jest.Mock };
  let userId: string;
  let medication: Medication;

  const now = new Date("2024-03-10T10:00:00Z");

  beforeEach(async () => {
    database = createTestDatabase();
    userId = insertTestUser(database).id;
    medication = database.db
      .insert(medications)
      .values({
        userId,
        name: "Metformin",
        dosage: "500mg",
        frequency: "Twice Daily",
        medicationType: "Metformin",
        startDate: new Date("2024-03-01T08:00:00Z"),
        sideEffects: [],
        reminderTimes: ["08:00", "20:00"],
        color: "Blue",
        shape: "Round",
      })
      .returning()
      .get();

    push = {
      hasSubscriptions: jest.fn().mockReturnValue(true),
      sendToUser: jest.fn().mockResolvedValue({ sent: 1, total: 1 }),
    };
    users = { getTimezone: jest.fn().mockReturnValue("UTC") };

    const module = await Test.createTestingModule({
      providers: [
        NotificationSchedulerService,
        { provide: DatabaseService, useValue: database },
        { provide: PushService, useValue: push },
        { provide: UsersService, useValue: users },
      ],
    }).compile();

    service = module.get(NotificationSchedulerService);
  });

  afterEach(() => database.onModuleDestroy());

  const insertDose = (iso: string) =>
    database.db
      .insert(medicationDoses)
      .values({
        userId,
        medicationId: medication.id,
        scheduledTime: new Date(iso),
        sideEffectsExperienced: [],
      })
      .returning()
      .get();

  // -- scheduleReminders ------------------------------------------------------

  describe("scheduleReminders", () => {
    it("creates one request per reminder time over the next 30 days", () => {
      const created = service.scheduleReminders(medication, now);

      // 31 days walked from 10:00 today, minus this morning's 08:00
      expect(created).toHaveLength(61);
      expect(created[0]).toMatchObject({
        identifier: `medication_${medication.id}_1710100800`,
        kind: "reminder",
        title: "💊 Medication Reminder",
        body: "Time to take your Metformin (500mg)",
        category: "MEDICATION_REMINDER",
      });
      expect(created[0].fireAt.toISOString()).toBe("2024-03-10T20:00:00.000Z");
      expect(created[created.length - 1].fireAt.toISOString()).toBe(
        "2024-04-09T20:00:00.000Z",
      );
    });

    it("stops at the medication's end date", () => {
      const ending = { ...medication, endDate: new Date("2024-03-11T12:00:00Z") };

      const created = service.scheduleReminders(ending, now);

      expect(created.map((r) => r.fireAt.toISOString())).toEqual([
        "2024-03-10T20:00:00.000Z",
        "2024-03-11T08:00:00.000Z",
        "2024-03-11T20:00:00.000Z",
      ]);
    });

    it("links requests to the dose scheduled at the same instant", () => {
      const dose = insertDose("2024-03-10T20:00:00Z");

      const created = service.scheduleReminders(medication, now);

      expect(created[0].doseId).toBe(dose.id);
      expect(created[1].doseId).toBeNull();
    });

    it("replaces previously pending requests", () => {
      service.scheduleReminders(medication, now);
      service.scheduleReminders(medication, now);

      expect(service.pending(userId)).toHaveLength(61);
    });

    it("schedules nothing for inactive medications and clears old requests", () => {
      service.scheduleReminders(medication, now);

      const created = service.scheduleReminders({ ...medication, isActive: false }, now);

      expect(created).toEqual([]);
      expect(service.pending(userId)).toEqual([]);
    });

    it("skips users without push subscriptions", () => {
      push.hasSubscriptions.mockReturnValue(false);

      expect(service.scheduleReminders(medication, now)).toEqual([]);
    });

    it("rejects explicit scheduling without push subscriptions", () => {
      push.hasSubscriptions.mockReturnValue(false);

      expect(() => service.scheduleReminders(medication, now, { explicit: true })).toThrow(
        MedicationError,
      );
    });
  });

  // -- cancellation -----------------------------------------------------------

  describe("cancellation", () => {
    it("cancels the pending requests of a dose, including snoozes", () => {
      const dose = insertDose("2024-03-10T20:00:00Z");
      service.scheduleReminders(medication, now);
      service.scheduleSnooze(dose, medication, new Date("2024-03-10T20:15:00Z"));

      expect(service.cancelForDose(userId, dose.id)).toBe(2);
      expect(service.pending(userId)).toHaveLength(60);
    });

    it("builds snooze identifiers from the dose id", () => {
      const dose = insertDose("2024-03-10T20:00:00Z");

      const snooze = service.scheduleSnooze(dose, medication, new Date("2024-03-10T20:15:00Z"));

      expect(snooze.identifier).toBe(`snooze_${dose.id}_1710101700`);
      expect(snooze.title).toBe("💊 Medication Reminder (Snoozed)");
      expect(snooze.body).toBe("Don't forget to take your Metformin (500mg)");
    });

    it("cancels every medication and snooze request", () => {
      const dose = insertDose("2024-03-10T20:00:00Z");
      service.scheduleReminders(medication, now);
      service.scheduleSnooze(dose, medication, new Date("2024-03-10T20:15:00Z"));

      expect(service.cancelAll(userId)).toEqual({ cancelled: 62 });
      expect(service.pending(userId)).toEqual([]);
    });
  });

  // -- dispatchDue ------------------------------------------------------------

  describe("dispatchDue", () => {
    it("sends due requests with dose actions and marks them delivered", async () => {
      service.scheduleReminders(medication, now);
      const at = new Date("2024-03-11T08:00:00Z");

      const delivered = await service.dispatchDue(at);

      expect(delivered).toBe(2);
      expect(push.sendToUser).toHaveBeenCalledWith(
        userId,
        expect.objectContaining({
          title: "💊 Medication Reminder",
          category: "MEDICATION_REMINDER",
          actions: [
            { action: "DOSE_TAKEN", title: "Mark as Taken" },
            { action: "DOSE_SKIP", title: "Skip Dose" },
            { action: "DOSE_SNOOZE", title: "Remind in 15 min" },
          ],
        }),
      );
      expect(service.delivered(userId)).toHaveLength(2);
      expect(service.pending(userId)).toHaveLength(59);
    });

    it("leaves failed sends pending for the next run", async () => {
      service.scheduleReminders(medication, now);
      push.sendToUser.mockRejectedValueOnce(new Error("push down"));

      const delivered = await service.dispatchDue(new Date("2024-03-11T08:00:00Z"));

      expect(delivered).toBe(1);
      expect(service.pending(userId)).toHaveLength(60);
    });

    it("leaves requests pending when no subscription received them", async () => {
      service.scheduleReminders(medication, now);
      push.sendToUser.mockResolvedValue({ sent: 0, total: 1 });

      const delivered = await service.dispatchDue(new Date("2024-03-11T08:00:00Z"));

      expect(delivered).toBe(0);
      expect(service.delivered(userId)).toHaveLength(0);
      expect(service.pending(userId)).toHaveLength(61);
    });

    it("marks requests delivered when at least one subscription received them", async () => {
      service.scheduleReminders(medication, now);
      push.sendToUser.mockResolvedValue({ sent: 1, total: 2 });

      const delivered = await service.dispatchDue(new Date("2024-03-11T08:00:00Z"));

      expect(delivered).toBe(2);
      expect(service.pending(userId)).toHaveLength(59);
    });

    describe("through PushService", () => {
      const sendNotification = jest.mocked(webPush.sendNotification);
      const vapid = {
        email: "mailto:test@example.com",
        publicKey: "test-public",
        privateKey: "test-private",
      };

      const withPush = async (pushService: PushService) => {
        pushService.subscribe(userId, {
          endpoint: "https://push.example.com/1",
          keys: { p256dh: "p", auth: "a" },
        });
        const module = await Test.createTestingModule({
          providers: [
            NotificationSchedulerService,
            { provide: DatabaseService, useValue: database },
            { provide: PushService, useValue: pushService },
            { provide: UsersService, useValue: users },
          ],
        }).compile();
        return module.get(NotificationSchedulerService);
      };

      beforeEach(() => sendNotification.mockReset());

      it("retries requests whose every send failed", async () => {
        const scheduler = await withPush(new PushService(database, { vapid }));
        scheduler.scheduleReminders(medication, now);
        sendNotification.mockRejectedValue(
          new webPush.WebPushError("Busy", 503, {}, "", "https://push.example.com/1"),
        );
        const at = new Date("2024-03-11T08:00:30Z");

        expect(await scheduler.dispatchDue(at)).toBe(0);
        expect(scheduler.delivered(userId)).toHaveLength(0);

        sendNotification.mockResolvedValue({ statusCode: 201, body: "", headers: {} });

        expect(await scheduler.dispatchDue(at)).toBe(2);
        expect(scheduler.delivered(userId)).toHaveLength(2);
      });

      it("keeps requests pending while push delivery is disabled", async () => {
        const scheduler = await withPush(new PushService(database, { vapid: null }));
        scheduler.scheduleReminders(medication, now);

        const delivered = await scheduler.dispatchDue(new Date("2024-03-11T08:00:30Z"));

        expect(delivered).toBe(0);
        expect(sendNotification).not.toHaveBeenCalled();
        expect(scheduler.pending(userId)).toHaveLength(61);
      });
    });
  });
});
