/**
 * Launcher lifecycle: allowed states and transitions.
 *
 * `initialized` → `starting` → `started` → `terminated`. A launcher cancelled
 * before it spawned goes straight to `terminated`; a failed spawn does too.
 * Nothing re-enters `initialized`.
 */

export const LAUNCHER_STATES = ["initialized", "starting", "started", "terminated"] as const;

export type LauncherState = (typeof LAUNCHER_STATES)[number];

const ALLOWED_TRANSITIONS: Record<LauncherState, ReadonlySet<LauncherState>> = {
  initialized: new Set(["starting", "terminated"]),
  starting: new Set(["started", "terminated"]),
  started: new Set(["terminated"]),
  terminated: new Set(["terminated"]),
};

export function isLauncherTransitionAllowed(from: LauncherState, to: LauncherState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}
