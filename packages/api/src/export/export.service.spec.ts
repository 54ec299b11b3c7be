import { Test } from "@nestjs/testing";
import { BadRequestException } from "@nestjs/common";
import type { Workbook } from "exceljs";
import { DatabaseService } from "../database/database.service";
import { createTestDatabase, insertTestUser } from "../database/testing";
import {
  glucoseReadings,
  healthMetrics,
  medicationDoses,
  medications,
  workouts,
} from "../database/schema";
import { ExportService, parseSections } from "./export.service";

function sheetNamed(workbook: Workbook, name: string) {
  const sheet = workbook.getWorksheet(name);
  if (!sheet) throw new Error(`Missing sheet ${name}`);
  return sheet;
}

describe("ExportService", () => {
  let service: ExportService;
  let database: DatabaseService;
  let userId: string;

  beforeEach(async () => {
    database = createTestDatabase();
    userId = insertTestUser(database).id;

    const module = await Test.createTestingModule({
      providers: [ExportService, { provide: DatabaseService, useValue: database }],
    }).compile();

    service = module.get(ExportService);
  });

  afterEach(() => database.onModuleDestroy());

  const reading = (owner: string, level: number, iso: string) =>
    database.db
      .insert(glucoseReadings)
      .values({ userId: owner, level, timestamp: new Date(iso) })
      .run();

  // -- sections -----------------------------------------------------------------

  it("parses the section filter in sheet order", () => {
    expect(parseSections(undefined)).toEqual(["glucose", "meals", "doses", "workouts", "vitals"]);
    expect(parseSections(" vitals, glucose ,")).toEqual(["glucose", "vitals"]);
    expect(() => parseSections("glucose,steps")).toThrow(BadRequestException);
  });

  it("writes one sheet per section", () => {
    const workbook = service.buildWorkbook(userId, {});

    expect(workbook.worksheets.map((s) => s.name)).toEqual([
      "Glucose",
      "Meals",
      "Medication doses",
      "Workouts",
      "Vitals",
    ]);
  });

  // -- sheets -------------------------------------------------------------------

  it("writes readings newest first under a bold frozen header", () => {
    reading(userId, 95, "2024-03-09T08:00:00.000Z");
    reading(userId, 210, "2024-03-10T08:00:00.000Z");
    reading(insertTestUser(database).id, 120, "2024-03-10T09:00:00.000Z");

    const sheet = sheetNamed(service.buildWorkbook(userId, { sections: "glucose" }), "Glucose");

    expect(sheet.rowCount).toBe(3);
    expect(sheet.getRow(1).getCell(2).value).toBe("Level (mg/dL)");
    expect(sheet.getRow(1).font).toMatchObject({ bold: true });
    expect(sheet.views[0]).toMatchObject({ state: "frozen", ySplit: 1 });
    expect(sheet.getRow(2).getCell(1).value).toEqual(new Date("2024-03-10T08:00:00.000Z"));
    expect(sheet.getRow(2).getCell(1).numFmt).toBe("yyyy-mm-dd hh:mm");
    expect(sheet.getRow(2).getCell(3).value).toBe("High");
    expect(sheet.getRow(3).getCell(2).value).toBe(95);
  });

  it("limits rows to the requested range", () => {
    reading(userId, 95, "2024-03-09T08:00:00.000Z");
    reading(userId, 210, "2024-03-10T08:00:00.000Z");

    const workbook = service.buildWorkbook(userId, {
      from: "2024-03-10T00:00:00.000Z",
      sections: "glucose",
    });

    expect(sheetNamed(workbook, "Glucose").rowCount).toBe(2);
  });

  it("names the medication of each dose", () => {
    const medication = database.db
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
    database.db
      .insert(medicationDoses)
      .values({
        userId,
        medicationId: medication.id,
        scheduledTime: new Date("2024-03-10T08:00:00.000Z"),
        status: "Skipped",
        skippedReason: "Felt nauseous",
        sideEffectsExperienced: [],
      })
      .run();

    const sheet = sheetNamed(service.buildWorkbook(userId, { sections: "doses" }), "Medication doses");

    expect(sheet.getRow(2).values).toEqual([
      undefined,
      new Date("2024-03-10T08:00:00.000Z"),
      "Metformin",
      "500mg",
      "Skipped",
      "",
      "Felt nauseous",
    ]);
  });

  it("writes workouts and vitals", () => {
    database.db
      .insert(workouts)
      .values({
        userId,
        type: "Running",
        duration: 30,
        intensity: "Vigorous",
        calories: 300,
        timestamp: new Date("2024-03-10T07:00:00.000Z"),
      })
      .run();
    database.db
      .insert(healthMetrics)
      .values({
        userId,
        type: "heart_rate",
        value: 72,
        unit: "bpm",
        timestamp: new Date("2024-03-10T07:30:00.000Z"),
      })
      .run();

    const workbook = service.buildWorkbook(userId, { sections: "workouts,vitals" });

    expect(sheetNamed(workbook, "Workouts").getRow(2).getCell(6).value).toBe("");
    expect(sheetNamed(workbook, "Vitals").getRow(2).getCell(2).value).toBe("Heart Rate");
  });

  it("produces an xlsx archive", async () => {
    const buffer = await service.generateXlsx(userId, { sections: "glucose" });

    expect(buffer.subarray(0, 2).toString("latin1")).toBe("PK");
  });
});
