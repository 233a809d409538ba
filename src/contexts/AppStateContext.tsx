import type React from "react";
import { createContext, useContext, useSyncExternalStore } from "react";
import type { Program } from "../runtime/scheduler";
import type { AppState } from "../state/app-state";
import type { AppEvent } from "../types/events";

export type AppProgram = Program<AppState, AppEvent>;

export const AppStateContext = createContext<AppProgram | null>(null);

export interface AppStateProviderProps {
  program: AppProgram;
  children: React.ReactNode;
}

// Provider component; the state itself lives in the Program, outside React
export const AppStateProvider: React.FC<AppStateProviderProps> = ({ program, children }) => (
  <AppStateContext.Provider value={program}>{children}</AppStateContext.Provider>
);

export const useAppState = () => {
  const program = useContext(AppStateContext);
  if (!program) {
    throw new Error("useAppState must be used within an AppStateProvider");
  }
  const state = useSyncExternalStore(program.subscribe, program.getState);
  return { state, dispatch: program.dispatch };
};

export const useTerminal = () => {
  const { state } = useAppState();
  return { cols: state.ui.cols, rows: state.ui.rows };
};
