import { Injectable, Logger } from "@nestjs/common";
import { Readable } from "stream";
import { Workbook } from "exceljs";
import {
  GOAL_STATUSES,
  METRIC_CONFIG,
  METRIC_KEYS,
  createGoalDto,
  healthEntryDto,
  isValidIsoDate,
  todayIso,
} from "@vitalog/shared";
import type { ImportResult, MetricKey } from "@vitalog/shared";
import type { ZodIssue } from "zod";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { GoalsRepository } from "../database/repositories/goals.repository";
import { InsightsRepository } from "../database/repositories/insights.repository";
import {
  METRIC_CSV_COLUMNS,
  METRIC_HEADER_ALIASES,
  normalizeHeader,
} from "./data-columns";

export const MAX_IMPORT_ROWS = 5_000;
const MAX_REPORTED_ERRORS = 20;

/** Header-keyed cells of one data row; `line` is its row number in the file. */
export interface CsvRecord {
  line: number;
  cells: Map<string, string>;
}

/** Reads a CSV buffer into header-keyed records; cells are kept as text. */
export async function readCsv(buffer: Buffer): Promise<CsvRecord[]> {
  const workbook = new Workbook();
  const sheet = await workbook.csv.read(Readable.from(buffer), {
    map: (value: string) => value,
  });

  const headers: string[] = [];
  sheet.getRow(1).eachCell((cell, col) => {
    headers[col] = normalizeHeader(cell.text.replace(/^\uFEFF/, ""));
  });

  const records: CsvRecord[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;
    const cells = new Map<string, string>();
    headers.forEach((header, col) => {
      if (header) cells.set(header, row.getCell(col).text.trim());
    });
    records.push({ line: rowNumber, cells });
  });
  return records;
}

const metricColumn = new Map<string, MetricKey>([
  ...METRIC_KEYS.map((key): [string, MetricKey] => [METRIC_CSV_COLUMNS[key], key]),
  ...Object.entries(METRIC_HEADER_ALIASES),
]);

function metricValue(key: MetricKey, text: string): number | null | undefined {
  if (text === "") return undefined;
  const cfg = METRIC_CONFIG[key];
  const n = Number(text);
  // Zero marks "not recorded" for metrics whose valid range excludes it
  if (n === 0 && (cfg.min > 0 || !cfg.minInclusive)) return null;
  return cfg.integer && Number.isFinite(n) ? Math.round(n) : n;
}

function optional(text: string | undefined): string | undefined {
  return text ? text : undefined;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

class ImportReport implements ImportResult {
  imported = 0;
  updated = 0;
  skipped = 0;
  errors: string[] = [];

  skip(line: number, reason: string) {
    this.skipped++;
    if (this.errors.length < MAX_REPORTED_ERRORS) {
      this.errors.push(`Row ${line}: ${reason}`);
    }
  }

  toJSON(): ImportResult {
    return {
      imported: this.imported,
      updated: this.updated,
      skipped: this.skipped,
      errors: this.errors,
    };
  }
}

@Injectable()
export class ImportService {
  private readonly logger = new Logger(ImportService.name);

  constructor(
    private entries: HealthEntriesRepository,
    private goals: GoalsRepository,
    private insights: InsightsRepository,
  ) {}

  async importMetrics(userId: string, csv: Buffer): Promise<ImportResult> {
    const records = await readCsv(csv);
    const report = new ImportReport();
    const today = todayIso();

    for (const [index, { line, cells: record }] of records.entries()) {
      if (index >= MAX_IMPORT_ROWS) {
        report.skip(line, `more than ${MAX_IMPORT_ROWS} rows`);
        continue;
      }

      const candidate: Record<string, unknown> = {
        date: record.get("date") ?? "",
        mood: optional(record.get("mood")?.toLowerCase().replace(/\s+/g, "_")),
        symptoms: optional(record.get("symptoms")),
        notes: optional(record.get("notes")),
      };
      for (const [column, text] of record) {
        const key = metricColumn.get(column);
        if (key) candidate[key] = metricValue(key, text);
      }

      const parsed = healthEntryDto.safeParse(candidate);
      if (!parsed.success) {
        report.skip(line, formatIssues(parsed.error.issues));
        continue;
      }
      const { date, ...fields } = parsed.data;
      if (date > today) {
        report.skip(line, "Entry date cannot be in the future");
        continue;
      }

      const { created } = await this.entries.upsert(userId, date, fields);
      if (created) report.imported++;
      else report.updated++;
    }

    if (report.imported + report.updated > 0) {
      await this.insights.markStale(userId);
    }
    this.logger.log(
      `Imported metrics for user ${userId}: ${report.imported} new, ${report.updated} updated, ${report.skipped} skipped`,
    );
    return report.toJSON();
  }

  async importGoals(userId: string, csv: Buffer): Promise<ImportResult> {
    const records = await readCsv(csv);
    const report = new ImportReport();
    const today = todayIso();

    for (const [index, { line, cells: record }] of records.entries()) {
      if (index >= MAX_IMPORT_ROWS) {
        report.skip(line, `more than ${MAX_IMPORT_ROWS} rows`);
        continue;
      }

      const number = (column: string) => {
        const text = record.get(column);
        return text ? Number(text) : undefined;
      };
      const parsed = createGoalDto.safeParse({
        type: record.get("goal_type") ?? record.get("type"),
        description: record.get("description") ?? "",
        targetValue: number("target_value"),
        currentValue: number("current_value"),
        targetDate: record.get("target_date") ?? "",
      });
      if (!parsed.success) {
        report.skip(line, formatIssues(parsed.error.issues));
        continue;
      }

      const status =
        GOAL_STATUSES.find((s) => s === record.get("status")) ?? "active";
      const createdDate = record.get("created_date") ?? "";
      const completedAt = Date.parse(record.get("completed_at") ?? "");

      await this.goals.create({
        userId,
        ...parsed.data,
        status,
        createdDate: isValidIsoDate(createdDate) ? createdDate : today,
        completedAt:
          status === "completed"
            ? new Date(Number.isNaN(completedAt) ? Date.now() : completedAt)
            : null,
      });
      report.imported++;
    }

    this.logger.log(
      `Imported goals for user ${userId}: ${report.imported} new, ${report.skipped} skipped`,
    );
    return report.toJSON();
  }
}
