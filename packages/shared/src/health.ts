import { daysBetween } from "./dates";
import type { GoalProgress, ProgressBand } from "./dto";

const round1 = (n: number) => Math.round(n * 10) / 10;

export function calculateBmi(
  weightKg: number | null | undefined,
  heightCm: number | null | undefined,
): number | null {
  if (!weightKg || !heightCm) return null;
  const heightM = heightCm / 100;
  return round1(weightKg / (heightM * heightM));
}

export function bmiCategory(bmi: number | null): string {
  if (bmi == null) return "Unknown";
  if (bmi < 18.5) return "Underweight";
  if (bmi < 25) return "Normal weight";
  if (bmi < 30) return "Overweight";
  return "Obese";
}

export function bloodPressureCategory(
  systolic: number | null | undefined,
  diastolic: number | null | undefined,
): string {
  if (systolic == null || diastolic == null) return "Unknown";
  if (systolic < 120 && diastolic < 80) return "Normal";
  if (systolic < 130 && diastolic < 80) return "Elevated";
  if (systolic < 140 || diastolic < 90) return "High Blood Pressure Stage 1";
  if (systolic < 180 || diastolic < 120) return "High Blood Pressure Stage 2";
  return "Hypertensive Crisis";
}

export function heartRateCategory(heartRate: number | null | undefined): string {
  if (heartRate == null) return "Unknown";
  if (heartRate < 60) return "Below Normal (Bradycardia)";
  if (heartRate <= 100) return "Normal";
  return "Above Normal (Tachycardia)";
}

const BAND_MESSAGES: Record<ProgressBand, string> = {
  achieved: "🎉 Goal achieved! Consider marking it as complete.",
  almost_there: "🔥 You're almost there! Keep up the great work!",
  halfway: "📈 Good progress! You're halfway to your goal.",
  making_progress:
    "⚡ You're making progress, but consider increasing your efforts.",
  get_started: "🚀 Time to get started! Focus on consistent daily actions.",
};

export function progressBand(percent: number): ProgressBand {
  if (percent >= 100) return "achieved";
  if (percent >= 75) return "almost_there";
  if (percent >= 50) return "halfway";
  if (percent >= 25) return "making_progress";
  return "get_started";
}

export function goalProgress(
  goal: { currentValue: number; targetValue: number; targetDate: string },
  today: string,
): GoalProgress {
  const raw =
    goal.targetValue > 0 ? (goal.currentValue / goal.targetValue) * 100 : 0;
  const band = progressBand(raw);
  const percent = round1(raw);
  return {
    percent,
    // Stays under 100 until the target is actually reached
    cappedPercent: raw >= 100 ? 100 : Math.min(percent, 99.9),
    daysLeft: daysBetween(today, goal.targetDate),
    band,
    message: BAND_MESSAGES[band],
  };
}
