import { useState, useCallback } from "react";
import { api, ApiError } from "../api/client";
import type {
  HealthEntryDto,
  HealthEntryResponse,
  HealthSummary,
  SaveEntryResponse,
  UpdateHealthEntryDto,
} from "@vitalog/shared";

export function useMetrics() {
  const [entries, setEntries] = useState<HealthEntryResponse[]>([]);
  const [loading, setLoading] = useState(false);

  const fetchEntries = useCallback(async (days: number) => {
    setLoading(true);
    try {
      const data = await api<HealthEntryResponse[]>(`/metrics?days=${days}`);
      setEntries(data);
      return data;
    } finally {
      setLoading(false);
    }
  }, []);

  /** The entry for `date`, or null when nothing was logged that day. */
  const fetchEntry = useCallback(async (date: string) => {
    try {
      return await api<HealthEntryResponse>(`/metrics/${date}`);
    } catch (err) {
      if (err instanceof ApiError && err.status === 404) return null;
      throw err;
    }
  }, []);

  const saveEntry = useCallback(async (dto: HealthEntryDto) => {
    const result = await api<SaveEntryResponse>("/metrics", {
      method: "POST",
      body: JSON.stringify(dto),
    });
    setEntries((prev) => {
      const rest = prev.filter((e) => e.date !== result.entry.date);
      return [...rest, result.entry].sort((a, b) => a.date.localeCompare(b.date));
    });
    return result;
  }, []);

  const updateEntry = useCallback(async (date: string, dto: UpdateHealthEntryDto) => {
    const updated = await api<HealthEntryResponse>(`/metrics/${date}`, {
      method: "PATCH",
      body: JSON.stringify(dto),
    });
    setEntries((prev) => prev.map((e) => (e.date === date ? updated : e)));
    return updated;
  }, []);

  const deleteEntry = useCallback(async (date: string) => {
    await api(`/metrics/${date}`, { method: "DELETE" });
    setEntries((prev) => prev.filter((e) => e.date !== date));
  }, []);

  const fetchSummary = useCallback(() => api<HealthSummary>("/metrics/summary"), []);

  return {
    entries,
    loading,
    fetchEntries,
    fetchEntry,
    saveEntry,
    updateEntry,
    deleteEntry,
    fetchSummary,
  };
}
