import type { Desktop } from "./types.js";

const MARKERS: [string, Desktop][] = [
  ["gnome", "gnome"],
  ["unity", "gnome"],
  ["kde", "kde"],
  ["plasma", "kde"],
  ["xfce", "xfce"],
  ["mate", "mate"],
  ["cinnamon", "cinnamon"],
  ["lxde", "lxde"],
  ["lxqt", "lxde"],
];

function match(value: string | undefined): Desktop | undefined {
  if (!value) return undefined;
  const lower = value.toLowerCase();
  // XDG_CURRENT_DESKTOP may hold a colon-separated list, e.g. "ubuntu:GNOME"
  for (const part of lower.split(":")) {
    for (const [marker, desktop] of MARKERS) {
      if (part.includes(marker)) return desktop;
    }
  }
  return undefined;
}

/**
 * Identify the running desktop environment from the session variables.
 */
export function detectDesktop(env: NodeJS.ProcessEnv = process.env): Desktop {
  const fromNames = match(env.XDG_CURRENT_DESKTOP) ?? match(env.DESKTOP_SESSION);
  if (fromNames) return fromNames;

  if (env.KDE_FULL_SESSION === "true") return "kde";
  if (env.GNOME_DESKTOP_SESSION_ID) return "gnome";
  return "unknown";
}
