import { useState, useCallback } from "react";
import { api } from "../api/client";
import type {
  CreateGoalDto,
  GoalResponse,
  GoalStats,
  GoalStatus,
} from "@vitalog/shared";

export function useGoals() {
  const [goals, setGoals] = useState<GoalResponse[]>([]);
  const [stats, setStats] = useState<GoalStats | null>(null);
  const [loading, setLoading] = useState(false);

  const fetchGoals = useCallback(async () => {
    setLoading(true);
    try {
      const [list, s] = await Promise.all([
        api<GoalResponse[]>("/goals"),
        api<GoalStats>("/goals/stats"),
      ]);
      setGoals(list);
      setStats(s);
    } finally {
      setLoading(false);
    }
  }, []);

  const replace = (updated: GoalResponse) =>
    setGoals((prev) => prev.map((g) => (g.id === updated.id ? updated : g)));

  const refreshStats = useCallback(async () => {
    setStats(await api<GoalStats>("/goals/stats"));
  }, []);

  const createGoal = useCallback(async (dto: CreateGoalDto) => {
    const goal = await api<GoalResponse>("/goals", {
      method: "POST",
      body: JSON.stringify(dto),
    });
    setGoals((prev) => [goal, ...prev]);
    await refreshStats();
    return goal;
  }, [refreshStats]);

  const updateProgress = useCallback(async (id: string, currentValue: number) => {
    const goal = await api<GoalResponse>(`/goals/${id}/progress`, {
      method: "PATCH",
      body: JSON.stringify({ currentValue }),
    });
    replace(goal);
    await refreshStats();
    return goal;
  }, [refreshStats]);

  const completeGoal = useCallback(async (id: string) => {
    const goal = await api<GoalResponse>(`/goals/${id}/complete`, { method: "POST" });
    replace(goal);
    await refreshStats();
    return goal;
  }, [refreshStats]);

  const setStatus = useCallback(async (id: string, status: Exclude<GoalStatus, "completed">) => {
    const goal = await api<GoalResponse>(`/goals/${id}/status`, {
      method: "PATCH",
      body: JSON.stringify({ status }),
    });
    replace(goal);
    await refreshStats();
    return goal;
  }, [refreshStats]);

  const extendDeadline = useCallback(async (id: string, targetDate: string) => {
    const goal = await api<GoalResponse>(`/goals/${id}/deadline`, {
      method: "PATCH",
      body: JSON.stringify({ targetDate }),
    });
    replace(goal);
    return goal;
  }, []);

  const deleteGoal = useCallback(async (id: string) => {
    await api(`/goals/${id}`, { method: "DELETE" });
    setGoals((prev) => prev.filter((g) => g.id !== id));
    await refreshStats();
  }, [refreshStats]);

  return {
    goals,
    stats,
    loading,
    fetchGoals,
    createGoal,
    updateProgress,
    completeGoal,
    setStatus,
    extendDeadline,
    deleteGoal,
  };
}
