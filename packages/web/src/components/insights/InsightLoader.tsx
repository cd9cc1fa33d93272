import { useState, useEffect, type ReactNode } from "react";
import { motion, AnimatePresence } from "framer-motion";
import { BarChart3, TrendingUp, Target, Lightbulb } from "lucide-react";

const STEPS: { icon: ReactNode; text: string }[] = [
  { icon: <BarChart3 className="w-7 h-7 text-indigo-400" />, text: "Reading your entries..." },
  { icon: <TrendingUp className="w-7 h-7 text-emerald-400" />, text: "Looking for trends..." },
  { icon: <Target className="w-7 h-7 text-sky-400" />, text: "Checking your goals..." },
  { icon: <Lightbulb className="w-7 h-7 text-yellow-300" />, text: "Writing insights..." },
];

export function InsightLoader() {
  const [step, setStep] = useState(0);

  useEffect(() => {
    const interval = setInterval(() => {
      setStep((s) => (s + 1) % STEPS.length);
    }, 2800);
    return () => clearInterval(interval);
  }, []);

  return (
    <div className="flex flex-col items-center py-16">
      <div className="relative w-28 h-28 mb-8">
        <motion.div
          className="absolute inset-0 rounded-full border-2 border-indigo-500/20"
          animate={{ scale: [1, 1.15, 1], opacity: [0.3, 0.6, 0.3] }}
          transition={{ duration: 3, repeat: Infinity, ease: "easeInOut" }}
        />
        <motion.div
          className="absolute inset-5 rounded-full"
          style={{ border: "2px dashed rgba(129,140,248,0.3)" }}
          animate={{ rotate: 360 }}
          transition={{ duration: 8, repeat: Infinity, ease: "linear" }}
        />
        <div className="absolute inset-0 flex items-center justify-center">
          <AnimatePresence mode="wait">
            <motion.div
              key={step}
              initial={{ opacity: 0, scale: 0.5 }}
              animate={{ opacity: 1, scale: 1 }}
              exit={{ opacity: 0, scale: 0.5 }}
              transition={{ duration: 0.3 }}
            >
              {STEPS[step].icon}
            </motion.div>
          </AnimatePresence>
        </div>
      </div>

      <AnimatePresence mode="wait">
        <motion.p
          key={step}
          className="text-sm text-slate-300 font-medium"
          initial={{ opacity: 0, y: 8 }}
          animate={{ opacity: 1, y: 0 }}
          exit={{ opacity: 0, y: -8 }}
          transition={{ duration: 0.25 }}
        >
          {STEPS[step].text}
        </motion.p>
      </AnimatePresence>
    </div>
  );
}
