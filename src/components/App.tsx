import { useInput, useStdout } from "ink";
import type React from "react";
import { useEffect } from "react";
import { useAppState } from "../contexts/AppStateContext";
import { toKeyStroke } from "../types/events";
import { MainLayout } from "./views/MainLayout";

export interface AppProps {
  dockerHost: string;
  version: string;
  logFile: string | null;
}

/**
 * Forwards keys and terminal resizes to the program as events and renders
 * whatever state it holds.
 */
export const App: React.FC<AppProps> = ({ dockerHost, version, logFile }) => {
  const { state, dispatch } = useAppState();
  const { stdout } = useStdout();

  useEffect(() => {
    const onResize = () => {
      dispatch({ type: "resize", cols: stdout.columns || 80, rows: stdout.rows || 24 });
    };
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout, dispatch]);

  useInput(
    (input, key) => {
      dispatch({ type: "key", key: toKeyStroke(input, key) });
    },
    { isActive: state.ui.shell === null && !state.ui.quitting },
  );

  // The shell owns the terminal
  if (state.ui.shell !== null || state.ui.quitting) return null;

  return <MainLayout dockerHost={dockerHost} version={version} logFile={logFile} />;
};
