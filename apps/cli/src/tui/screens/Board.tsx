import React from "react";
import { Box, Text, useInput } from "ink";
import { formatDuration } from "@numplace/core";
import { InputEvent, RenderSnapshot, SessionState } from "@numplace/engine";
import type { Translator } from "../../i18n.js";
import { Grid } from "../components/Grid.js";
import { colors } from "../theme.js";
import { digitPad, notesLine } from "../view.js";

interface BoardProps {
  t: Translator["t"];
  snapshot: RenderSnapshot;
  message: string;
  onEvent: (event: InputEvent) => void;
}

export function Board({ t, snapshot, message, onEvent }: BoardProps) {
  const complete = snapshot.state === SessionState.COMPLETE;
  const paused = snapshot.state === SessionState.PAUSED;

  useInput((input, key) => {
    if (complete) {
      if (key.return || key.escape) onEvent({ type: "menu" });
      return;
    }
    if (key.escape) return onEvent({ type: "menu" });
    if (input === "p") return onEvent({ type: "pause-toggle" });
    if (paused) return;

    if (key.upArrow) return onEvent({ type: "arrow", direction: "up" });
    if (key.downArrow) return onEvent({ type: "arrow", direction: "down" });
    if (key.leftArrow) return onEvent({ type: "arrow", direction: "left" });
    if (key.rightArrow) return onEvent({ type: "arrow", direction: "right" });
    if (key.tab || input === "n") return onEvent({ type: "toggle-notes" });
    if (key.backspace || key.delete || input === "0") return onEvent({ type: "clear" });
    if (input === "u") return onEvent({ type: "undo" });
    if (/^[1-9]$/.test(input)) return onEvent({ type: "digit", digit: Number(input) });
  });

  const difficulty = snapshot.difficulty ? t(`difficulty_${snapshot.difficulty}`) : "";
  const time = formatDuration(snapshot.elapsedMs);
  const notes = notesLine(snapshot);

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Box flexDirection="row" justifyContent="space-between" width={31}>
        <Text color={colors.secondary}>{t("game_difficulty", { difficulty })}</Text>
        <Text color={colors.white}>{time}</Text>
      </Box>

      {paused || !snapshot.cells ? (
        <Box height={13} alignItems="center" justifyContent="center" width={31}>
          <Text color={colors.warning}>{t("game_paused")}</Text>
        </Box>
      ) : (
        <Grid cells={snapshot.cells} />
      )}

      <Box flexDirection="row" justifyContent="space-between" width={31}>
        <Text color={snapshot.notesMode ? colors.primary : colors.dimmed}>
          {t("game_notes", { state: t(snapshot.notesMode ? "notes_on" : "notes_off") })}
        </Text>
        <Text color={colors.dimmed}>{digitPad(snapshot)}</Text>
      </Box>
      {notes && <Text color={colors.dimmed}>{notes}</Text>}

      {complete && snapshot.lastCompletion ? (
        <Box flexDirection="column" marginTop={1}>
          <Text color={colors.primary} bold>
            {t("win_title")}
          </Text>
          <Text>{t("win_difficulty", { difficulty })}</Text>
          <Text>{t("win_time", { time: formatDuration(snapshot.lastCompletion.elapsedMs) })}</Text>
          {snapshot.lastCompletion.newRecord && (
            <Text color={colors.secondary} bold>
              {t("win_record")}
            </Text>
          )}
          <Text color={colors.dimmed}>{t("win_return")}</Text>
        </Box>
      ) : (
        <Box marginTop={1}>
          <Text color={colors.dimmed}>{t("game_help")}</Text>
        </Box>
      )}

      {message && <Text color={colors.warning}>{message}</Text>}
    </Box>
  );
}
