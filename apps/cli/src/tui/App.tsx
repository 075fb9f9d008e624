import React, { useEffect, useState } from "react";
import { Box, useApp } from "ink";
import type { Logger } from "@numplace/core";
import type { Difficulty } from "@numplace/game-sudoku";
import {
  ControllerRejection,
  GameController,
  InputEvent,
  RenderSnapshot,
  SessionState,
} from "@numplace/engine";
import { Catalogs, Translator, createTranslator, nextLocale } from "../i18n.js";
import { StatusBar } from "./components/StatusBar.js";
import { Menu } from "./screens/Menu.js";
import { Board } from "./screens/Board.js";
import { Stats } from "./screens/Stats.js";

type View = "menu" | "stats";

interface AppProps {
  controller: GameController;
  catalogs: Catalogs;
  defaultDifficulty: Difficulty;
  dataDir: string;
  log: Logger;
}

/** Rejections worth telling the player about; the rest are silent no-ops */
function messageFor(reason: ControllerRejection, t: Translator["t"]): string {
  switch (reason) {
    case "generation_failed":
      return t("error_generation_failed");
    case "no_saved_game":
      return t("error_no_saved_game");
    default:
      return "";
  }
}

export function App({ controller, catalogs, defaultDifficulty, dataDir, log }: AppProps) {
  const { exit } = useApp();
  const [snapshot, setSnapshot] = useState<RenderSnapshot>(() => controller.snapshot());
  const [view, setView] = useState<View>("menu");
  const [message, setMessage] = useState("");
  const translator = createTranslator(catalogs, snapshot.locale);
  const { t } = translator;

  const send = (event: InputEvent) => {
    controller
      .dispatch(event)
      .then((result) => {
        setSnapshot(controller.snapshot());
        setMessage(result.ok ? "" : messageFor(result.reason, t));
      })
      .catch((err: unknown) => {
        log.error({ err, event: event.type }, "Input event failed");
        setMessage(`Error: ${err instanceof Error ? err.message : String(err)}`);
      });
  };

  // Redraw the clock while a game runs
  useEffect(() => {
    if (snapshot.state !== SessionState.IN_PROGRESS) return;
    const timer = setInterval(() => setSnapshot(controller.snapshot()), 1000);
    return () => clearInterval(timer);
  }, [controller, snapshot.state]);

  return (
    <Box flexDirection="column">
      <StatusBar title={t("app_title")} language={t("language_name")} dataDir={dataDir} />

      {snapshot.screen === "board" && (
        <Board t={t} snapshot={snapshot} message={message} onEvent={send} />
      )}

      {snapshot.screen === "menu" && view === "stats" && (
        <Stats
          translator={translator}
          statistics={snapshot.statistics}
          onReset={() => send({ type: "reset-stats" })}
          onBack={() => setView("menu")}
        />
      )}

      {snapshot.screen === "menu" && view === "menu" && (
        <Menu
          t={t}
          hasSavedGame={snapshot.hasSavedGame}
          defaultDifficulty={defaultDifficulty}
          message={message}
          onContinue={() => send({ type: "resume-saved" })}
          onNewGame={(difficulty) => send({ type: "new-game", difficulty })}
          onStats={() => setView("stats")}
          onLanguage={() => send({ type: "language", locale: nextLocale(snapshot.locale) })}
          onExit={() => exit()}
        />
      )}
    </Box>
  );
}
