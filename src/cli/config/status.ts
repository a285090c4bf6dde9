import type { OutputFormat } from "../../output/format";

export const DEFAULT_STATUS_FORMAT: OutputFormat = "panel";

export const LIVE_REFRESH_INTERVAL_MS = 4000;

// Erase display, cursor home.
export const CLEAR_SCREEN = "\u001b[2J\u001b[H";
