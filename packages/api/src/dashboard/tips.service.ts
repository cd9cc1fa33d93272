import { Injectable } from "@nestjs/common";
import type { HealthTip } from "@vitalog/shared";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { InsightsRepository } from "../database/repositories/insights.repository";
import type { HealthEntryRow } from "../database/schema";

export const MAX_TIPS = 3;

const DEFAULT_TIPS: HealthTip[] = [
  { text: "💧 Stay hydrated - aim for 8 glasses of water daily", category: "general", source: "default" },
  { text: "🥗 Include more fruits and vegetables in your diet", category: "general", source: "default" },
  { text: "🚶‍♂️ Take regular breaks to move throughout the day", category: "general", source: "default" },
  { text: "📱 Limit screen time before bed for better sleep quality", category: "general", source: "default" },
];

function recommendationsOf(content: unknown): string[] {
  if (
    content &&
    typeof content === "object" &&
    "recommendations" in content &&
    Array.isArray(content.recommendations)
  ) {
    return content.recommendations.filter(
      (r): r is string => typeof r === "string" && r.trim() !== "",
    );
  }
  return [];
}

/** Tips triggered by the readings of one entry; unrecorded metrics trigger nothing. */
export function heuristicTips(entry: HealthEntryRow | null): HealthTip[] {
  const tips: HealthTip[] = [];
  if (entry) {
    if (entry.exerciseMinutes != null && entry.exerciseMinutes < 30) {
      tips.push({
        text: "🏃‍♂️ Try to get at least 30 minutes of exercise daily for better health.",
        category: "exercise",
        source: "heuristic",
      });
    }
    if (entry.sleepHours != null && entry.sleepHours < 7) {
      tips.push({
        text: "😴 Aim for 7-9 hours of sleep per night for optimal recovery.",
        category: "sleep",
        source: "heuristic",
      });
    }
    if (entry.mood === "poor" || entry.mood === "very_poor") {
      tips.push({
        text: "🧘‍♂️ Consider stress management techniques like meditation or deep breathing.",
        category: "mood",
        source: "heuristic",
      });
    }
    if ((entry.systolic ?? 0) > 130 || (entry.diastolic ?? 0) > 80) {
      tips.push({
        text: "🩺 Monitor your blood pressure regularly and consult a healthcare provider if elevated.",
        category: "blood_pressure",
        source: "heuristic",
      });
    }
  }
  return (tips.length ? tips : DEFAULT_TIPS).slice(0, MAX_TIPS);
}

@Injectable()
export class TipsService {
  constructor(
    private insights: InsightsRepository,
    private entries: HealthEntriesRepository,
  ) {}

  async getTips(userId: string): Promise<HealthTip[]> {
    // Primary path: recommendations from a current AI assessment
    const latest = await this.insights.findLatest(userId, "assessment");
    if (latest && !latest.stale) {
      const recommendations = recommendationsOf(latest.content);
      if (recommendations.length > 0) {
        return recommendations.slice(0, MAX_TIPS).map((text) => ({
          text,
          category: "insight",
          source: "insight",
        }));
      }
    }

    return heuristicTips(await this.entries.findLatest(userId));
  }
}
