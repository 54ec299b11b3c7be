import { BadRequestException, Injectable, Logger } from "@nestjs/common";
import { and, desc, eq, gte, lte, type SQL, type SQLWrapper } from "drizzle-orm";
import { Workbook } from "exceljs";
import {
  EXPORT_SECTIONS,
  HEALTH_METRIC_CONFIG,
  type ExportQueryDto,
  type ExportSection,
} from "@glucocare/shared";
import { DatabaseService } from "../database/database.service";
import {
  glucoseReadings,
  healthMetrics,
  meals,
  medicationDoses,
  medications,
  workouts,
} from "../database/schema";
import { glucoseStatus } from "../glucose/glucose-analytics";

export const MAX_EXPORT_ROWS = 10_000;
const DATE_FORMAT = "yyyy-mm-dd hh:mm";

type Cell = string | number | Date;

interface SheetData {
  name: string;
  columns: { header: string; key: string; width: number; date?: boolean }[];
  rows: Record<string, Cell>[];
}

export function parseSections(sections: string | undefined): ExportSection[] {
  if (!sections) return [...EXPORT_SECTIONS];

  const requested = sections
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  const unknown = requested.filter((s) => !EXPORT_SECTIONS.some((section) => section === s));
  if (unknown.length > 0) {
    throw new BadRequestException(`Unknown export section: ${unknown.join(", ")}`);
  }
  return EXPORT_SECTIONS.filter((section) => requested.includes(section));
}

@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  constructor(private database: DatabaseService) {}

  private range(userColumn: SQLWrapper, timeColumn: SQLWrapper, userId: string, query: ExportQueryDto) {
    const conditions: SQL[] = [eq(userColumn, userId)];
    if (query.from) conditions.push(gte(timeColumn, new Date(query.from)));
    if (query.to) conditions.push(lte(timeColumn, new Date(query.to)));
    return and(...conditions);
  }

  private glucoseSheet(userId: string, query: ExportQueryDto): SheetData {
    const rows = this.database.db
      .select()
      .from(glucoseReadings)
      .where(this.range(glucoseReadings.userId, glucoseReadings.timestamp, userId, query))
      .orderBy(desc(glucoseReadings.timestamp))
      .limit(MAX_EXPORT_ROWS)
      .all();

    return {
      name: "Glucose",
      columns: [
        { header: "Date & Time", key: "timestamp", width: 20, date: true },
        { header: "Level (mg/dL)", key: "level", width: 14 },
        { header: "Status", key: "status", width: 10 },
        { header: "Notes", key: "notes", width: 30 },
      ],
      rows: rows.map((r) => ({
        timestamp: r.timestamp,
        level: r.level,
        status: glucoseStatus(r.level),
        notes: r.notes ?? "",
      })),
    };
  }

  private mealsSheet(userId: string, query: ExportQueryDto): SheetData {
    const rows = this.database.db
      .select()
      .from(meals)
      .where(this.range(meals.userId, meals.timestamp, userId, query))
      .orderBy(desc(meals.timestamp))
      .limit(MAX_EXPORT_ROWS)
      .all();

    return {
      name: "Meals",
      columns: [
        { header: "Date & Time", key: "timestamp", width: 20, date: true },
        { header: "Name", key: "name", width: 24 },
        { header: "Type", key: "type", width: 12 },
        { header: "Carbs (g)", key: "carbs", width: 10 },
        { header: "Protein (g)", key: "protein", width: 10 },
        { header: "Fat (g)", key: "fat", width: 10 },
        { header: "Fiber (g)", key: "fiber", width: 10 },
        { header: "Calories", key: "calories", width: 10 },
        { header: "Notes", key: "notes", width: 30 },
      ],
      rows: rows.map((m) => ({
        timestamp: m.timestamp,
        name: m.name,
        type: m.type,
        carbs: m.carbs,
        protein: m.protein,
        fat: m.fat,
        fiber: m.fiber,
        calories: m.calories,
        notes: m.notes ?? "",
      })),
    };
  }

  private dosesSheet(userId: string, query: ExportQueryDto): SheetData {
    const rows = this.database.db
      .select({ dose: medicationDoses, medication: medications })
      .from(medicationDoses)
      .innerJoin(medications, eq(medicationDoses.medicationId, medications.id))
      .where(this.range(medicationDoses.userId, medicationDoses.scheduledTime, userId, query))
      .orderBy(desc(medicationDoses.scheduledTime))
      .limit(MAX_EXPORT_ROWS)
      .all();

    return {
      name: "Medication doses",
      columns: [
        { header: "Scheduled", key: "scheduledTime", width: 20, date: true },
        { header: "Medication", key: "medication", width: 20 },
        { header: "Dosage", key: "dosage", width: 12 },
        { header: "Status", key: "status", width: 10 },
        { header: "Taken At", key: "actualTime", width: 20, date: true },
        { header: "Notes", key: "notes", width: 30 },
      ],
      rows: rows.map(({ dose, medication }) => ({
        scheduledTime: dose.scheduledTime,
        medication: medication.name,
        dosage: medication.dosage,
        status: dose.status,
        actualTime: dose.actualTime ?? "",
        notes: dose.skippedReason ?? dose.notes ?? "",
      })),
    };
  }

  private workoutsSheet(userId: string, query: ExportQueryDto): SheetData {
    const rows = this.database.db
      .select()
      .from(workouts)
      .where(this.range(workouts.userId, workouts.timestamp, userId, query))
      .orderBy(desc(workouts.timestamp))
      .limit(MAX_EXPORT_ROWS)
      .all();

    return {
      name: "Workouts",
      columns: [
        { header: "Date & Time", key: "timestamp", width: 20, date: true },
        { header: "Type", key: "type", width: 18 },
        { header: "Duration (min)", key: "duration", width: 14 },
        { header: "Intensity", key: "intensity", width: 12 },
        { header: "Calories", key: "calories", width: 10 },
        { header: "Distance (mi)", key: "distance", width: 14 },
        { header: "Notes", key: "notes", width: 30 },
      ],
      rows: rows.map((w) => ({
        timestamp: w.timestamp,
        type: w.type,
        duration: w.duration,
        intensity: w.intensity,
        calories: w.calories,
        distance: w.distance ?? "",
        notes: w.notes ?? "",
      })),
    };
  }

  private vitalsSheet(userId: string, query: ExportQueryDto): SheetData {
    const rows = this.database.db
      .select()
      .from(healthMetrics)
      .where(this.range(healthMetrics.userId, healthMetrics.timestamp, userId, query))
      .orderBy(desc(healthMetrics.timestamp))
      .limit(MAX_EXPORT_ROWS)
      .all();

    return {
      name: "Vitals",
      columns: [
        { header: "Date & Time", key: "timestamp", width: 20, date: true },
        { header: "Metric", key: "metric", width: 16 },
        { header: "Value", key: "value", width: 10 },
        { header: "Unit", key: "unit", width: 8 },
      ],
      rows: rows.map((m) => ({
        timestamp: m.timestamp,
        metric: HEALTH_METRIC_CONFIG[m.type].title,
        value: m.value,
        unit: m.unit,
      })),
    };
  }

  private sheetFor(section: ExportSection, userId: string, query: ExportQueryDto): SheetData {
    switch (section) {
      case "glucose":
        return this.glucoseSheet(userId, query);
      case "meals":
        return this.mealsSheet(userId, query);
      case "doses":
        return this.dosesSheet(userId, query);
      case "workouts":
        return this.workoutsSheet(userId, query);
      case "vitals":
        return this.vitalsSheet(userId, query);
    }
  }

  buildWorkbook(userId: string, query: ExportQueryDto): Workbook {
    const workbook = new Workbook();

    for (const section of parseSections(query.sections)) {
      const data = this.sheetFor(section, userId, query);
      const sheet = workbook.addWorksheet(data.name);

      sheet.columns = data.columns.map(({ header, key, width }) => ({ header, key, width }));
      sheet.getRow(1).font = { bold: true };
      sheet.views = [{ state: "frozen", ySplit: 1 }];

      for (const row of data.rows) sheet.addRow(row);
      for (const column of data.columns) {
        if (column.date) sheet.getColumn(column.key).numFmt = DATE_FORMAT;
      }
    }
    return workbook;
  }

  async generateXlsx(userId: string, query: ExportQueryDto): Promise<Buffer> {
    const workbook = this.buildWorkbook(userId, query);
    this.logger.log(
      `Exporting ${workbook.worksheets.map((s) => s.name).join(", ")} for user ${userId}`,
    );
    const buffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
  }
}
