import { Injectable } from "@nestjs/common";
import { Workbook } from "exceljs";
import type { Worksheet } from "exceljs";
import { METRIC_KEYS, addDays, todayIso } from "@vitalog/shared";
import type {
  ExportFormat,
  ExportGoalsQueryDto,
  ExportMetricsQueryDto,
} from "@vitalog/shared";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { GoalsRepository } from "../database/repositories/goals.repository";
import { GOAL_CSV_COLUMNS, METRIC_CSV_COLUMNS } from "./data-columns";

const MAX_EXPORT_ROWS = 10_000;

const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: "text/csv; charset=utf-8",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
};

export interface ExportFile {
  buffer: Buffer;
  contentType: string;
  filename: string;
}

@Injectable()
export class ExportService {
  constructor(
    private entries: HealthEntriesRepository,
    private goals: GoalsRepository,
  ) {}

  async exportMetrics(
    userId: string,
    query: ExportMetricsQueryDto,
  ): Promise<ExportFile> {
    const rows = await this.entries.findInRange(
      userId,
      addDays(todayIso(), -query.days),
    );

    const workbook = new Workbook();
    const sheet = workbook.addWorksheet("Health Data");
    sheet.columns = [
      { header: "date", key: "date", width: 12 },
      ...METRIC_KEYS.map((key) => ({
        header: METRIC_CSV_COLUMNS[key],
        key,
        width: 14,
      })),
      { header: "mood", key: "mood", width: 12 },
      { header: "symptoms", key: "symptoms", width: 30 },
      { header: "notes", key: "notes", width: 30 },
    ];
    freezeHeader(sheet);

    for (const row of rows.slice(-MAX_EXPORT_ROWS)) {
      sheet.addRow({
        date: row.date,
        weightKg: row.weightKg,
        systolic: row.systolic,
        diastolic: row.diastolic,
        heartRate: row.heartRate,
        sleepHours: row.sleepHours,
        exerciseMinutes: row.exerciseMinutes,
        mood: row.mood,
        symptoms: row.symptoms,
        notes: row.notes,
      });
    }

    return this.write(workbook, query.format, "health-data");
  }

  async exportGoals(
    userId: string,
    query: ExportGoalsQueryDto,
  ): Promise<ExportFile> {
    const goals = await this.goals.findAll(userId);

    const workbook = new Workbook();
    const sheet = workbook.addWorksheet("Goals");
    sheet.columns = GOAL_CSV_COLUMNS.map((header) => ({
      header,
      key: header,
      width: header === "description" ? 40 : 14,
    }));
    freezeHeader(sheet);

    for (const goal of goals.slice(0, MAX_EXPORT_ROWS)) {
      sheet.addRow({
        goal_type: goal.type,
        description: goal.description,
        target_value: goal.targetValue,
        current_value: goal.currentValue,
        target_date: goal.targetDate,
        status: goal.status,
        created_date: goal.createdDate,
        completed_at: goal.completedAt?.toISOString() ?? null,
      });
    }

    return this.write(workbook, query.format, "goals");
  }

  private async write(
    workbook: Workbook,
    format: ExportFormat,
    name: string,
  ): Promise<ExportFile> {
    const buffer =
      format === "xlsx"
        ? await workbook.xlsx.writeBuffer()
        : await workbook.csv.writeBuffer();
    return {
      buffer: Buffer.from(buffer),
      contentType: CONTENT_TYPES[format],
      filename: `vitalog-${name}-${todayIso()}.${format}`,
    };
  }
}

function freezeHeader(sheet: Worksheet) {
  sheet.getRow(1).font = { bold: true };
  sheet.views = [{ state: "frozen", ySplit: 1 }];
}
