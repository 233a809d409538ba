import type { BannerKind } from "../types/events";

export interface Banner {
  message: string;
  expiresAt: number;
}

export interface UIState {
  status: Banner | null;
  error: Banner | null;
  cols: number;
  rows: number;
  /** Name of the container whose shell owns the terminal, if any. */
  shell: string | null;
  quitting: boolean;
}

export type UIAction =
  | { type: "SET_BANNER"; payload: { kind: BannerKind; message: string; expiresAt: number } }
  | { type: "EXPIRE_BANNER"; payload: { kind: BannerKind; at: number } }
  | { type: "RESIZE"; payload: { cols: number; rows: number } }
  | { type: "SHELL_STARTED"; payload: string }
  | { type: "SHELL_EXITED" }
  | { type: "QUIT" };

export const BANNER_TTL: Record<BannerKind, number> = {
  status: 2000,
  error: 3000,
};

export const initialUIState: UIState = {
  status: null,
  error: null,
  cols: 80,
  rows: 24,
  shell: null,
  quitting: false,
};

/**
 * Pure reducer for UI chrome: banners, terminal size, shell hand-off, quit.
 */
export function uiReducer(state: UIState, action: UIAction): UIState {
  switch (action.type) {
    case "SET_BANNER": {
      const { kind, message, expiresAt } = action.payload;
      const banner = { message, expiresAt };
      return kind === "status" ? { ...state, status: banner } : { ...state, error: banner };
    }

    case "EXPIRE_BANNER": {
      const { kind, at } = action.payload;
      const banner = state[kind];
      // A newer banner outlives the timer of the one it replaced
      if (!banner || banner.expiresAt > at) return state;
      return kind === "status" ? { ...state, status: null } : { ...state, error: null };
    }

    case "RESIZE":
      if (state.cols === action.payload.cols && state.rows === action.payload.rows) return state;
      return { ...state, cols: action.payload.cols, rows: action.payload.rows };

    case "SHELL_STARTED":
      return { ...state, shell: action.payload };

    case "SHELL_EXITED":
      return { ...state, shell: null };

    case "QUIT":
      return { ...state, quitting: true };

    default:
      return state;
  }
}
