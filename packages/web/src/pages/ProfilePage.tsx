import { useState, type FormEvent } from "react";
import { toast } from "sonner";
import { useAuth } from "../auth/AuthContext";
import { api, ApiError } from "../api/client";
import { updateUserDto, type UserResponse } from "@vitalog/shared";
import { inputClass } from "../components/ui/styles";
import { parseNumberInput } from "../lib/format";

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof ApiError ? err.message : fallback;
}

export function ProfilePage() {
  const { user, logout, setUser } = useAuth();
  const [name, setName] = useState(user?.name ?? "");
  const [height, setHeight] = useState(user?.heightCm != null ? String(user.heightCm) : "");
  const [saving, setSaving] = useState(false);

  const [oldPassword, setOldPassword] = useState("");
  const [newPassword, setNewPassword] = useState("");
  const [changing, setChanging] = useState(false);

  const [deletePassword, setDeletePassword] = useState("");

  const handleSave = async (e: FormEvent) => {
    e.preventDefault();
    const parsed = updateUserDto.safeParse({
      name: name || undefined,
      heightCm: parseNumberInput(height),
    });
    if (!parsed.success) {
      toast.error(parsed.error.issues[0]?.message ?? "Please check the form");
      return;
    }

    setSaving(true);
    try {
      const updated = await api<UserResponse>("/users/me", {
        method: "PATCH",
        body: JSON.stringify(parsed.data),
      });
      setUser(updated);
      toast.success("Profile saved");
    } catch (err) {
      toast.error(errorMessage(err, "Failed to save profile"));
    } finally {
      setSaving(false);
    }
  };

  const handleChangePassword = async (e: FormEvent) => {
    e.preventDefault();
    setChanging(true);
    try {
      await api("/auth/change-password", {
        method: "POST",
        body: JSON.stringify({ oldPassword, newPassword }),
      });
      toast.success("Password changed. Please sign in again.");
      logout();
    } catch (err) {
      toast.error(errorMessage(err, "Failed to change password"));
    } finally {
      setChanging(false);
    }
  };

  const handleDeleteAccount = async () => {
    if (!window.confirm("Delete your account and all health data? This cannot be undone.")) return;
    try {
      await api("/users/me/delete", {
        method: "POST",
        body: JSON.stringify({ password: deletePassword }),
      });
      logout();
    } catch (err) {
      toast.error(errorMessage(err, "Failed to delete account"));
    }
  };

  return (
    <div className="px-4 pt-6 pb-8">
      <h1 className="text-xl font-bold mb-6">Profile</h1>

      <form onSubmit={handleSave} className="space-y-4 max-w-sm">
        <div>
          <label className="block text-sm text-slate-400 mb-1">Email</label>
          <input
            type="email"
            value={user?.email ?? ""}
            disabled
            className="w-full bg-slate-800/50 border border-slate-700 rounded-lg px-4 py-3 text-slate-500 cursor-not-allowed"
          />
        </div>

        <div>
          <label className="block text-sm text-slate-400 mb-1">Name</label>
          <input
            type="text"
            value={name}
            onChange={(e) => setName(e.target.value)}
            className={inputClass}
            placeholder="Your name"
          />
        </div>

        <div>
          <label className="block text-sm text-slate-400 mb-1">Height (cm)</label>
          <input
            type="number"
            step="0.5"
            min={50}
            max={272}
            value={height}
            onChange={(e) => setHeight(e.target.value)}
            className={inputClass}
            placeholder="Used to calculate BMI"
          />
        </div>

        <button
          type="submit"
          disabled={saving}
          className="w-full bg-indigo-600 hover:bg-indigo-500 disabled:opacity-50 text-white font-medium rounded-lg py-3 transition-colors"
        >
          {saving ? "Saving..." : "Save"}
        </button>
      </form>

      <div className="mt-8 pt-6 border-t border-slate-800 max-w-sm">
        <h2 className="text-sm font-semibold text-slate-300 mb-3">Change Password</h2>
        <form onSubmit={handleChangePassword} className="space-y-3">
          <input
            type="password"
            placeholder="Current password"
            autoComplete="current-password"
            value={oldPassword}
            onChange={(e) => setOldPassword(e.target.value)}
            required
            className={inputClass}
          />
          <input
            type="password"
            placeholder="New password (min 8 chars)"
            autoComplete="new-password"
            value={newPassword}
            onChange={(e) => setNewPassword(e.target.value)}
            required
            minLength={8}
            className={inputClass}
          />
          <button
            type="submit"
            disabled={changing}
            className="w-full bg-slate-800 hover:bg-slate-700 disabled:opacity-50 text-white text-sm font-medium rounded-lg py-2.5 transition-colors"
          >
            {changing ? "Changing..." : "Change Password"}
          </button>
        </form>
      </div>

      <div className="mt-8 pt-6 border-t border-slate-800 max-w-sm">
        <p className="text-xs text-slate-500 mb-4">
          Member since{" "}
          {user?.createdAt ? new Date(user.createdAt).toLocaleDateString() : "..."}
        </p>
        <button onClick={logout} className="text-red-400 hover:text-red-300 text-sm font-medium">
          Sign Out
        </button>
      </div>

      <div className="mt-8 pt-6 border-t border-red-500/20 max-w-sm">
        <h2 className="text-sm font-semibold text-red-400 mb-2">Delete Account</h2>
        <p className="text-xs text-slate-500 mb-3">
          Removes your entries, goals and insights permanently.
        </p>
        <div className="flex gap-2">
          <input
            type="password"
            placeholder="Password"
            value={deletePassword}
            onChange={(e) => setDeletePassword(e.target.value)}
            className="flex-1 bg-slate-800 border border-slate-700 rounded-lg px-3 py-2 text-sm text-white"
          />
          <button
            onClick={() => void handleDeleteAccount()}
            disabled={!deletePassword}
            className="px-4 rounded-lg text-sm font-medium bg-red-500/15 text-red-400 disabled:opacity-40"
          >
            Delete
          </button>
        </div>
      </div>
    </div>
  );
}
