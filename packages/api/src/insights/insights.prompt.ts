export const ASSESSMENT_SYSTEM_PROMPT =
  "You are a knowledgeable health advisor AI. Provide helpful, accurate health insights while emphasizing the importance of consulting healthcare professionals for medical advice.";

export const TRENDS_SYSTEM_PROMPT =
  "You are a health data analyst. Identify meaningful trends and patterns in health data.";

export const GOALS_SYSTEM_PROMPT =
  "You are a health goal advisor. Recommend SMART health goals based on user data.";

const json = (value: unknown) => JSON.stringify(value, null, 2);

export function assessmentPrompt(summary: unknown): string {
  return `Based on the following health data summary, provide comprehensive health insights and recommendations.

Health Data Summary:
${json(summary)}

Respond with a JSON object with exactly this structure:
{
  "overall_health": "Brief overall health assessment",
  "recommendations": ["3-5 specific actionable recommendations"],
  "trends": ["Notable trends observed in the data"],
  "risk_factors": ["Potential risk factors identified"],
  "positive_aspects": ["Positive health indicators"],
  "areas_for_improvement": ["Specific areas that need attention"]
}

Focus on:
- Practical, actionable advice
- Patterns and trends in the data
- A supportive and encouraging tone
- Health education and awareness`;
}

export function trendsPrompt(trendData: unknown): string {
  return `Analyze the following health trend data and identify significant patterns:

${json(trendData)}

Respond with a JSON object with exactly this structure:
{
  "trends": [
    {
      "metric": "health metric name",
      "trend": "increasing|decreasing|stable",
      "significance": "high|medium|low",
      "description": "detailed trend description"
    }
  ],
  "patterns": [
    {
      "pattern": "pattern description",
      "correlation": "related metrics or factors",
      "recommendation": "suggested action"
    }
  ]
}`;
}

export function goalsPrompt(summary: unknown, goals: unknown): string {
  return `Based on the user's health data and existing goals, recommend 3-5 SMART health goals.

Current Health Data:
${summary == null ? "No health data available" : json(summary)}

Existing Goals:
${goals == null ? "No existing goals" : json(goals)}

Respond with a JSON object with exactly this structure:
{
  "recommended_goals": [
    {
      "goal_type": "weight_loss|weight_gain|exercise|sleep|heart_rate|blood_pressure|general",
      "description": "Clear, specific goal description",
      "target_value": 0,
      "timeframe_days": 30,
      "rationale": "Why this goal is recommended"
    }
  ]
}

Goals must be specific, measurable, realistic, time-bound, based on the data above,
and must not duplicate existing active goals. target_value is a plain number.`;
}
