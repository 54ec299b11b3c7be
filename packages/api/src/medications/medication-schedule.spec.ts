import {
  defaultReminderTimes,
  doseTimes,
  nextDoseTime,
  scheduleEnd,
  ScheduledMedication,
} from "./medication-schedule";

const med = (overrides: Partial<ScheduledMedication> = {}): ScheduledMedication => ({
  isActive: true,
  reminderEnabled: true,
  reminderTimes: ["08:00", "20:00"],
  startDate: new Date("2024-01-01T08:00:00Z"),
  endDate: null,
  ...overrides,
});

describe("medication schedule", () => {
  // -- defaultReminderTimes ---------------------------------------------------

  describe("defaultReminderTimes", () => {
    it.each([
      ["Once Daily", ["08:00"]],
      ["Twice Daily", ["08:00", "20:00"]],
      ["Three Times Daily", ["08:00", "14:00", "20:00"]],
      ["Four Times Daily", ["08:00", "12:00", "16:00", "20:00"]],
      ["Weekly", ["08:00"]],
      ["As Needed", ["08:00"]],
    ] as const)("%s", (frequency, expected) => {
      expect(defaultReminderTimes(frequency)).toEqual(expected);
    });
  });

  // -- nextDoseTime -----------------------------------------------------------

  describe("nextDoseTime", () => {
    it("returns the next reminder later today", () => {
      const next = nextDoseTime(med(), new Date("2024-03-10T10:00:00Z"), "UTC");
      expect(next?.toISOString()).toBe("2024-03-10T20:00:00.000Z");
    });

    it("rolls over to the first reminder tomorrow", () => {
      const next = nextDoseTime(med(), new Date("2024-03-10T21:00:00Z"), "UTC");
      expect(next?.toISOString()).toBe("2024-03-11T08:00:00.000Z");
    });

    it("sorts reminder times before picking", () => {
      const next = nextDoseTime(
        med({ reminderTimes: ["20:00", "08:00"] }),
        new Date("2024-03-10T07:00:00Z"),
        "UTC",
      );
      expect(next?.toISOString()).toBe("2024-03-10T08:00:00.000Z");
    });

    it("treats a reminder at exactly now as passed", () => {
      const next = nextDoseTime(med(), new Date("2024-03-10T08:00:00Z"), "UTC");
      expect(next?.toISOString()).toBe("2024-03-10T20:00:00.000Z");
    });

    it("works in the user's time zone", () => {
      // 09:00 in New York (EDT, UTC-4)
      const next = nextDoseTime(med(), new Date("2024-06-01T13:00:00Z"), "America/New_York");
      expect(next?.toISOString()).toBe("2024-06-02T00:00:00.000Z");
    });

    it("is null for inactive medications", () => {
      expect(nextDoseTime(med({ isActive: false }), new Date(), "UTC")).toBeNull();
    });

    it("is null when reminders are disabled", () => {
      expect(nextDoseTime(med({ reminderEnabled: false }), new Date(), "UTC")).toBeNull();
    });

    it("is null without reminder times", () => {
      expect(nextDoseTime(med({ reminderTimes: [] }), new Date(), "UTC")).toBeNull();
    });
  });

  // -- doseTimes --------------------------------------------------------------

  describe("doseTimes", () => {
    it("expands every reminder time for each day the cursor reaches", () => {
      const times = doseTimes(
        med({ endDate: new Date("2024-01-03T07:59:00Z") }),
        "UTC",
      );

      expect(times.map((t) => t.toISOString())).toEqual([
        "2024-01-01T08:00:00.000Z",
        "2024-01-01T20:00:00.000Z",
        "2024-01-02T08:00:00.000Z",
        "2024-01-02T20:00:00.000Z",
      ]);
    });

    it("includes the end day when the cursor lands on it", () => {
      const times = doseTimes(
        med({ reminderTimes: ["09:00"], endDate: new Date("2024-01-03T08:00:00Z") }),
        "UTC",
      );

      expect(times).toHaveLength(3);
    });

    it("defaults the schedule to one year", () => {
      expect(scheduleEnd(med()).toISOString()).toBe("2025-01-01T08:00:00.000Z");
    });
  });
});
