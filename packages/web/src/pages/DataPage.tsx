import { useEffect, useRef, useState, type ReactNode } from "react";
import { toast } from "sonner";
import { Database, Download, Upload, CheckCircle2, XCircle } from "lucide-react";
import {
  EXPORT_FORMATS,
  METRIC_CONFIG,
  type CompletenessKey,
  type ExportFormat,
  type ImportResult,
} from "@vitalog/shared";
import { useData, type Dataset } from "../hooks/useData";
import { ApiError } from "../api/client";

const COMPLETENESS_KEYS: CompletenessKey[] = [
  "weightKg",
  "heartRate",
  "systolic",
  "sleepHours",
  "exerciseMinutes",
];

const EXPORT_WINDOWS = [30, 90, 365, 3650] as const;

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof ApiError ? err.message : fallback;
}

export function DataPage() {
  const { status, quality, loading, fetchAll, exportData, importData } = useData();
  const [format, setFormat] = useState<ExportFormat>("csv");
  const [exportDays, setExportDays] = useState<number>(365);
  const [lastImport, setLastImport] = useState<{ dataset: Dataset; result: ImportResult } | null>(null);

  useEffect(() => {
    fetchAll().catch((err) => toast.error(errorMessage(err, "Failed to load data status")));
  }, [fetchAll]);

  const handleExport = async (dataset: Dataset) => {
    try {
      await exportData(dataset, format, exportDays);
    } catch (err) {
      toast.error(errorMessage(err, "Export failed"));
    }
  };

  const handleImport = async (dataset: Dataset, file: File) => {
    try {
      const result = await importData(dataset, file);
      setLastImport({ dataset, result });
      toast.success(`Imported ${result.imported}, updated ${result.updated}`);
    } catch (err) {
      toast.error(errorMessage(err, "Import failed"));
    }
  };

  return (
    <div className="px-4 pt-6 pb-8 space-y-6">
      <div className="flex items-center gap-2">
        <Database className="w-5 h-5 text-indigo-400" />
        <h1 className="text-xl font-bold text-white">Your Data</h1>
      </div>

      {/* Status */}
      <section className="bg-slate-800/50 rounded-2xl p-4 border border-slate-700/50">
        <div className="flex items-center justify-between mb-3">
          <h2 className="text-sm font-semibold text-slate-300">Database</h2>
          {status &&
            (status.connected ? (
              <span className="flex items-center gap-1 text-xs text-emerald-400">
                <CheckCircle2 className="w-3.5 h-3.5" /> Connected
              </span>
            ) : (
              <span className="flex items-center gap-1 text-xs text-red-400">
                <XCircle className="w-3.5 h-3.5" /> Unreachable
              </span>
            ))}
        </div>
        {loading && !status ? (
          <div className="h-12 animate-pulse bg-slate-800 rounded-lg" />
        ) : status ? (
          <div className="grid grid-cols-3 gap-2 text-center">
            <Count label="Entries" value={status.healthRecords} />
            <Count label="Goals" value={status.goals} />
            <Count label="Insights" value={status.insights} />
          </div>
        ) : null}
      </section>

      {/* Quality */}
      {quality && quality.totalRecords > 0 && (
        <section className="bg-slate-800/50 rounded-2xl p-4 border border-slate-700/50">
          <h2 className="text-sm font-semibold text-slate-300 mb-1">Data Quality</h2>
          {quality.dateRange && (
            <p className="text-xs text-slate-500 mb-3">
              {quality.totalRecords} records from {quality.dateRange.start} to {quality.dateRange.end}
            </p>
          )}
          <div className="space-y-2 mb-4">
            {COMPLETENESS_KEYS.map((key) => (
              <div key={key}>
                <div className="flex justify-between text-[11px] text-slate-400 mb-0.5">
                  <span>{METRIC_CONFIG[key].label}</span>
                  <span>{quality.completeness[key]}%</span>
                </div>
                <div className="h-1.5 rounded-full bg-slate-700 overflow-hidden">
                  <div
                    className="h-full rounded-full"
                    style={{
                      width: `${quality.completeness[key]}%`,
                      background: METRIC_CONFIG[key].color,
                    }}
                  />
                </div>
              </div>
            ))}
          </div>
          <IssueList title="Gaps in logging" items={quality.dateGaps} empty="No gaps longer than a week." />
          <IssueList title="Unusual weight readings" items={quality.outliers} empty="No outliers detected." />
          <p className="text-[11px] text-slate-500 mt-3">
            Goals: {quality.goals.active} active, {quality.goals.completed} completed
          </p>
        </section>
      )}

      {/* Export */}
      <section className="bg-slate-800/50 rounded-2xl p-4 border border-slate-700/50">
        <h2 className="text-sm font-semibold text-slate-300 mb-3">Export</h2>
        <div className="flex gap-2 mb-3">
          {EXPORT_FORMATS.map((f) => (
            <button
              key={f}
              onClick={() => setFormat(f)}
              className={`px-3 py-1.5 rounded-lg text-xs font-medium uppercase ${
                format === f ? "bg-indigo-600 text-white" : "bg-slate-800 text-slate-400"
              }`}
            >
              {f}
            </button>
          ))}
          <select
            value={exportDays}
            onChange={(e) => setExportDays(Number(e.target.value))}
            className="ml-auto bg-slate-800 text-xs text-slate-400 border border-slate-700 rounded-lg px-2 py-1.5"
          >
            {EXPORT_WINDOWS.map((d) => (
              <option key={d} value={d}>
                {d === 3650 ? "All time" : `Last ${d} days`}
              </option>
            ))}
          </select>
        </div>
        <div className="grid grid-cols-2 gap-2">
          <ActionButton icon={<Download className="w-4 h-4" />} label="Health data" onClick={() => void handleExport("metrics")} />
          <ActionButton icon={<Download className="w-4 h-4" />} label="Goals" onClick={() => void handleExport("goals")} />
        </div>
      </section>

      {/* Import */}
      <section className="bg-slate-800/50 rounded-2xl p-4 border border-slate-700/50">
        <h2 className="text-sm font-semibold text-slate-300 mb-1">Import CSV</h2>
        <p className="text-[11px] text-slate-500 mb-3">
          Health data needs a <code>date</code> column plus any of weight, blood_pressure_systolic,
          blood_pressure_diastolic, heart_rate, sleep_hours, exercise_minutes, mood, symptoms, notes.
          Existing days are updated.
        </p>
        <div className="grid grid-cols-2 gap-2">
          <FilePicker label="Health data" onFile={(f) => void handleImport("metrics", f)} />
          <FilePicker label="Goals" onFile={(f) => void handleImport("goals", f)} />
        </div>

        {lastImport && (
          <div className="mt-4 text-xs text-slate-300">
            <p>
              {lastImport.dataset === "metrics" ? "Health data" : "Goals"}: {lastImport.result.imported} imported,{" "}
              {lastImport.result.updated} updated, {lastImport.result.skipped} skipped
            </p>
            {lastImport.result.errors.length > 0 && (
              <ul className="mt-2 space-y-0.5 text-red-400/90">
                {lastImport.result.errors.map((e) => (
                  <li key={e}>{e}</li>
                ))}
              </ul>
            )}
          </div>
        )}
      </section>
    </div>
  );
}

function Count({ label, value }: { label: string; value: number }) {
  return (
    <div className="bg-slate-900/60 rounded-xl py-2">
      <p className="text-lg font-bold text-white">{value}</p>
      <p className="text-[10px] text-slate-500 uppercase tracking-wider">{label}</p>
    </div>
  );
}

function IssueList({ title, items, empty }: { title: string; items: string[]; empty: string }) {
  return (
    <div className="mb-2">
      <p className="text-[11px] font-medium text-slate-400">{title}</p>
      {items.length === 0 ? (
        <p className="text-[11px] text-slate-600">{empty}</p>
      ) : (
        <ul className="text-[11px] text-amber-300/80">
          {items.map((i) => (
            <li key={i}>• {i}</li>
          ))}
        </ul>
      )}
    </div>
  );
}

function ActionButton({ icon, label, onClick }: { icon: ReactNode; label: string; onClick: () => void }) {
  return (
    <button
      onClick={onClick}
      className="flex items-center justify-center gap-1.5 py-2.5 rounded-lg text-sm text-slate-200 bg-slate-800 hover:bg-slate-700"
    >
      {icon}
      {label}
    </button>
  );
}

function FilePicker({ label, onFile }: { label: string; onFile: (file: File) => void }) {
  const ref = useRef<HTMLInputElement>(null);
  return (
    <>
      <input
        ref={ref}
        type="file"
        accept=".csv,text/csv"
        className="hidden"
        onChange={(e) => {
          const file = e.target.files?.[0];
          if (file) onFile(file);
          e.target.value = "";
        }}
      />
      <ActionButton icon={<Upload className="w-4 h-4" />} label={label} onClick={() => ref.current?.click()} />
    </>
  );
}
