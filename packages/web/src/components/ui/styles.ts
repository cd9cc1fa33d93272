export const inputClass =
  "w-full bg-slate-800 border border-slate-700 rounded-lg px-4 py-3 text-white placeholder-slate-500 focus:outline-none focus:border-indigo-500";

export const cardClass = "bg-slate-800/50 rounded-2xl p-4 border border-slate-700/50";

export const gradientButtonStyle = {
  background: "linear-gradient(135deg, #6366f1 0%, #8b5cf6 100%)",
  boxShadow: "0 0 0 1px rgba(99,102,241,0.3), 0 4px 15px rgba(99,102,241,0.25)",
};
