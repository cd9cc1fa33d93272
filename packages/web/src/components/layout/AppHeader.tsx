import { Link } from "react-router-dom";
import { HeartPulse } from "lucide-react";
import { useAuth } from "../../auth/AuthContext";

export function AppHeader() {
  const { user } = useAuth();

  const initials = user?.name
    ? user.name
        .split(" ")
        .map((w) => w[0])
        .join("")
        .toUpperCase()
        .slice(0, 2)
    : user?.email?.[0]?.toUpperCase() ?? "?";

  return (
    <header
      className="fixed top-0 left-0 right-0 h-14 bg-slate-950/80 backdrop-blur-md border-b border-white/5 flex items-center justify-between px-4 z-30"
      style={{ boxShadow: "0 1px 0 0 rgba(99,102,241,0.15), 0 4px 20px 0 rgba(0,0,0,0.4)" }}
    >
      <Link to="/" className="flex items-center gap-2 text-lg font-bold text-white">
        <HeartPulse className="w-5 h-5 text-indigo-400" />
        Vitalog
      </Link>

      <Link
        to="/profile"
        aria-label="Profile"
        className="w-8 h-8 rounded-full bg-indigo-500/20 text-indigo-300 text-xs font-semibold flex items-center justify-center"
      >
        {initials}
      </Link>
    </header>
  );
}
