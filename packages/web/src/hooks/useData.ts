import { useState, useCallback } from "react";
import { api, apiDownload, apiUpload } from "../api/client";
import type {
  DataQualityReport,
  DatabaseStatus,
  ExportFormat,
  ImportResult,
} from "@vitalog/shared";

export type Dataset = "metrics" | "goals";

export function useData() {
  const [status, setStatus] = useState<DatabaseStatus | null>(null);
  const [quality, setQuality] = useState<DataQualityReport | null>(null);
  const [loading, setLoading] = useState(false);

  const fetchAll = useCallback(async () => {
    setLoading(true);
    try {
      const [s, q] = await Promise.all([
        api<DatabaseStatus>("/data/status"),
        api<DataQualityReport>("/data/quality"),
      ]);
      setStatus(s);
      setQuality(q);
    } finally {
      setLoading(false);
    }
  }, []);

  const exportData = useCallback(
    (dataset: Dataset, format: ExportFormat, days?: number) => {
      const params = new URLSearchParams({ format });
      if (dataset === "metrics" && days) params.set("days", String(days));
      return apiDownload(
        `/data/export/${dataset}?${params.toString()}`,
        `vitalog-${dataset}.${format}`,
      );
    },
    [],
  );

  const importData = useCallback(
    async (dataset: Dataset, file: File) => {
      const result = await apiUpload<ImportResult>(`/data/import/${dataset}`, file);
      await fetchAll();
      return result;
    },
    [fetchAll],
  );

  return { status, quality, loading, fetchAll, exportData, importData };
}
