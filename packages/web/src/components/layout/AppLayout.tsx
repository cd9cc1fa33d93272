import type { ReactNode } from "react";
import { NavLink } from "react-router-dom";
import {
  LayoutDashboard,
  PenLine,
  Sparkles,
  Target,
  Database,
  type LucideIcon,
} from "lucide-react";
import { AppHeader } from "./AppHeader";

export function AppLayout({ children }: { children: ReactNode }) {
  return (
    <div className="min-h-screen flex flex-col">
      <AppHeader />
      <main className="flex-1 pt-14 pb-20 max-w-3xl w-full mx-auto">{children}</main>

      {/* Tab bar */}
      <nav className="fixed bottom-0 left-0 right-0 bg-slate-900/95 backdrop-blur border-t border-slate-800 flex justify-around py-2 pb-[max(0.5rem,env(safe-area-inset-bottom))] z-30">
        <TabLink to="/" icon={LayoutDashboard} label="Dashboard" />
        <TabLink to="/log" icon={PenLine} label="Log" />
        <TabLink to="/insights" icon={Sparkles} label="Insights" />
        <TabLink to="/goals" icon={Target} label="Goals" />
        <TabLink to="/data" icon={Database} label="Data" />
      </nav>
    </div>
  );
}

function TabLink({ to, icon: Icon, label }: { to: string; icon: LucideIcon; label: string }) {
  return (
    <NavLink
      to={to}
      end
      className={({ isActive }) =>
        `flex flex-col items-center gap-0.5 px-3 py-1 transition-colors ${
          isActive ? "text-indigo-400" : "text-slate-500"
        }`
      }
    >
      <Icon className="w-5 h-5" />
      <span className="text-[10px] font-medium">{label}</span>
    </NavLink>
  );
}
