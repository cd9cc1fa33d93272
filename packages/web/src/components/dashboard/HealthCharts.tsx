import type { ReactNode } from "react";
import {
  ResponsiveContainer,
  LineChart,
  Line,
  BarChart,
  Bar,
  ComposedChart,
  PieChart,
  Pie,
  Cell,
  XAxis,
  YAxis,
  Tooltip,
  Legend,
  CartesianGrid,
  ReferenceLine,
  ReferenceArea,
} from "recharts";
import { METRIC_CONFIG } from "@vitalog/shared";
import type {
  BloodPressurePoint,
  GoalBar,
  MoodSlice,
  SleepExercisePoint,
  SummaryBar,
  ValuePoint,
  WeightPoint,
} from "../../lib/chart-data";
import { shortDate } from "../../lib/format";

const AXIS = { stroke: "#64748b", fontSize: 11 };
const GRID = "#1e293b";
const TOOLTIP_STYLE = {
  background: "#0f172a",
  border: "1px solid #334155",
  borderRadius: 8,
  fontSize: 12,
};

export function ChartCard({
  title,
  empty,
  children,
}: {
  title: string;
  empty?: boolean;
  children: ReactNode;
}) {
  return (
    <section className="bg-slate-800/50 rounded-2xl p-4 border border-slate-700/50">
      <h3 className="text-sm font-semibold text-slate-300 mb-3">{title}</h3>
      {empty ? (
        <p className="text-xs text-slate-500 py-10 text-center">No data for this period</p>
      ) : (
        <div className="h-56">{children}</div>
      )}
    </section>
  );
}

export function WeightChart({ data }: { data: WeightPoint[] }) {
  return (
    <ChartCard title="Weight Trend" empty={data.length === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={data}>
          <CartesianGrid stroke={GRID} strokeDasharray="3 3" />
          <XAxis dataKey="date" tickFormatter={shortDate} {...AXIS} />
          <YAxis domain={["dataMin - 1", "dataMax + 1"]} {...AXIS} width={36} />
          <Tooltip contentStyle={TOOLTIP_STYLE} labelFormatter={shortDate} />
          <Line
            type="monotone"
            dataKey="weight"
            name="Weight (kg)"
            stroke={METRIC_CONFIG.weightKg.color}
            strokeWidth={2}
            dot={{ r: 3 }}
          />
          <Line
            type="linear"
            dataKey="trend"
            name="Trend"
            stroke="#94a3b8"
            strokeDasharray="5 5"
            dot={false}
          />
        </LineChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}

export function BloodPressureChart({ data }: { data: BloodPressurePoint[] }) {
  return (
    <ChartCard title="Blood Pressure" empty={data.length === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={data}>
          <CartesianGrid stroke={GRID} strokeDasharray="3 3" />
          <XAxis dataKey="date" tickFormatter={shortDate} {...AXIS} />
          <YAxis domain={[40, "dataMax + 10"]} {...AXIS} width={36} />
          <Tooltip contentStyle={TOOLTIP_STYLE} labelFormatter={shortDate} />
          <ReferenceLine y={120} stroke="#f59e0b" strokeDasharray="4 4" label={{ value: "120", fill: "#f59e0b", fontSize: 10 }} />
          <ReferenceLine y={80} stroke="#3b82f6" strokeDasharray="4 4" label={{ value: "80", fill: "#3b82f6", fontSize: 10 }} />
          <Line
            type="monotone"
            dataKey="systolic"
            name="Systolic"
            stroke={METRIC_CONFIG.systolic.color}
            strokeWidth={2}
            connectNulls
          />
          <Line
            type="monotone"
            dataKey="diastolic"
            name="Diastolic"
            stroke={METRIC_CONFIG.diastolic.color}
            strokeWidth={2}
            connectNulls
          />
        </LineChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}

export function HeartRateChart({ data }: { data: ValuePoint[] }) {
  return (
    <ChartCard title="Heart Rate" empty={data.length === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={data}>
          <CartesianGrid stroke={GRID} strokeDasharray="3 3" />
          <XAxis dataKey="date" tickFormatter={shortDate} {...AXIS} />
          <YAxis domain={[40, "dataMax + 10"]} {...AXIS} width={36} />
          <Tooltip contentStyle={TOOLTIP_STYLE} labelFormatter={shortDate} />
          {/* Normal resting range */}
          <ReferenceArea y1={60} y2={100} fill="#10b981" fillOpacity={0.08} />
          <Line
            type="monotone"
            dataKey="value"
            name="Heart rate (bpm)"
            stroke={METRIC_CONFIG.heartRate.color}
            strokeWidth={2}
          />
        </LineChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}

export function SleepExerciseChart({ data }: { data: SleepExercisePoint[] }) {
  return (
    <ChartCard title="Sleep & Exercise" empty={data.length === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <ComposedChart data={data}>
          <CartesianGrid stroke={GRID} strokeDasharray="3 3" />
          <XAxis dataKey="date" tickFormatter={shortDate} {...AXIS} />
          <YAxis yAxisId="sleep" domain={[0, 12]} {...AXIS} width={28} />
          <YAxis yAxisId="exercise" orientation="right" {...AXIS} width={36} />
          <Tooltip contentStyle={TOOLTIP_STYLE} labelFormatter={shortDate} />
          <Legend wrapperStyle={{ fontSize: 11 }} />
          <ReferenceLine yAxisId="sleep" y={8} stroke="#10b981" strokeDasharray="4 4" />
          <Bar
            yAxisId="sleep"
            dataKey="sleep"
            name="Sleep (h)"
            fill={METRIC_CONFIG.sleepHours.color}
            fillOpacity={0.7}
            radius={[4, 4, 0, 0]}
          />
          <Line
            yAxisId="exercise"
            type="monotone"
            dataKey="exercise"
            name="Exercise (min)"
            stroke={METRIC_CONFIG.exerciseMinutes.color}
            strokeWidth={2}
            connectNulls
          />
        </ComposedChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}

export function MoodChart({ data }: { data: MoodSlice[] }) {
  return (
    <ChartCard title="Mood Distribution" empty={data.length === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <PieChart>
          <Pie data={data} dataKey="value" nameKey="name" innerRadius={45} outerRadius={80} paddingAngle={2}>
            {data.map((slice) => (
              <Cell key={slice.mood} fill={slice.color} />
            ))}
          </Pie>
          <Tooltip contentStyle={TOOLTIP_STYLE} />
          <Legend wrapperStyle={{ fontSize: 11 }} />
        </PieChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}

export function WeeklySummaryChart({ data }: { data: SummaryBar[] }) {
  return (
    <ChartCard title="Last 7 Entries" empty={data.length === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data}>
          <CartesianGrid stroke={GRID} strokeDasharray="3 3" />
          <XAxis dataKey="label" {...AXIS} />
          <YAxis {...AXIS} width={36} />
          <Tooltip contentStyle={TOOLTIP_STYLE} />
          <Bar dataKey="value" radius={[4, 4, 0, 0]}>
            {data.map((bar) => (
              <Cell key={bar.label} fill={bar.color} />
            ))}
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}

export function GoalProgressChart({ data }: { data: GoalBar[] }) {
  return (
    <ChartCard title="Goal Progress" empty={data.length === 0}>
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data} layout="vertical" margin={{ left: 8 }}>
          <CartesianGrid stroke={GRID} strokeDasharray="3 3" />
          <XAxis type="number" domain={[0, 100]} unit="%" {...AXIS} />
          <YAxis type="category" dataKey="label" width={110} {...AXIS} />
          <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(v) => `${v}%`} />
          <Bar dataKey="percent" radius={[0, 4, 4, 0]}>
            {data.map((bar) => (
              <Cell key={bar.id} fill={bar.achieved ? "#10B981" : "#6366F1"} />
            ))}
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </ChartCard>
  );
}
