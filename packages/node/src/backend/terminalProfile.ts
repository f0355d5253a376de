/**
 * packages/node/src/backend/terminalProfile.ts — Terminal detection from env.
 *
 * Tolerant env parsers shared by the configuration, and the inline image
 * protocol guessed from the variables terminals export.
 */

export type EnvMap = Readonly<Record<string, string | undefined>>;

export type ImageProtocol = "kitty" | "iterm2" | "none";

export function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function envLower(env: EnvMap, key: string): string | undefined {
  const value = envText(env, key);
  return value?.toLowerCase();
}

/** Positive integers only. */
export function envInt(env: EnvMap, key: string): number | undefined {
  const raw = envText(env, key);
  if (!raw) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) return undefined;
  return value;
}

/** Like envInt, but 0 is accepted. */
export function envCount(env: EnvMap, key: string): number | undefined {
  const raw = envText(env, key);
  if (!raw || !/^\d+$/.test(raw)) return undefined;
  return Number.parseInt(raw, 10);
}

export function envBool(env: EnvMap, key: string): boolean | undefined {
  const raw = envLower(env, key);
  if (!raw) return undefined;
  if (raw === "1" || raw === "true" || raw === "yes" || raw === "on") return true;
  if (raw === "0" || raw === "false" || raw === "no" || raw === "off") return false;
  return undefined;
}

/**
 * Inline image protocol of the hosting terminal: kitty graphics for kitty,
 * WezTerm and Ghostty, OSC 1337 for iTerm2, none otherwise.
 */
export function detectImageProtocol(env: EnvMap): ImageProtocol {
  const term = envLower(env, "TERM") ?? "";
  const termProgram = envLower(env, "TERM_PROGRAM");

  // tmux swallows graphics escapes unless passthrough is configured.
  if (envText(env, "TMUX") !== undefined || term.startsWith("tmux")) return "none";

  if (
    envText(env, "KITTY_WINDOW_ID") !== undefined ||
    envText(env, "WEZTERM_PANE") !== undefined ||
    envText(env, "GHOSTTY_RESOURCES_DIR") !== undefined ||
    termProgram === "wezterm" ||
    termProgram === "ghostty" ||
    /kitty|wezterm|ghostty/.test(term)
  ) {
    return "kitty";
  }
  if (
    envText(env, "ITERM_SESSION_ID") !== undefined ||
    termProgram === "iterm.app" ||
    envLower(env, "LC_TERMINAL") === "iterm2"
  ) {
    return "iterm2";
  }
  return "none";
}
