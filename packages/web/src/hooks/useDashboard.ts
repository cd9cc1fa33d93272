import { useState, useEffect, useCallback } from "react";
import { api, ApiError } from "../api/client";
import type { DashboardOverview } from "@vitalog/shared";

export function useDashboard(days: number) {
  const [overview, setOverview] = useState<DashboardOverview | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  const reload = useCallback(async () => {
    setLoading(true);
    setError(null);
    try {
      setOverview(await api<DashboardOverview>(`/dashboard?days=${days}`));
    } catch (err) {
      setError(err instanceof ApiError ? err.message : "Failed to load dashboard");
    } finally {
      setLoading(false);
    }
  }, [days]);

  useEffect(() => {
    void reload();
  }, [reload]);

  return { overview, loading, error, reload };
}
