import React, { useState } from "react";
import { Box, Text, useInput } from "ink";
import { DIFFICULTIES, Difficulty } from "@numplace/game-sudoku";
import type { Translator } from "../../i18n.js";
import { colors, symbols } from "../theme.js";
import { clampIndex } from "../view.js";

interface MenuProps {
  t: Translator["t"];
  hasSavedGame: boolean;
  defaultDifficulty: Difficulty;
  message: string;
  onContinue: () => void;
  onNewGame: (difficulty: Difficulty) => void;
  onStats: () => void;
  onLanguage: () => void;
  onExit: () => void;
}

interface Option {
  label: string;
  action: () => void;
}

export function Menu({
  t,
  hasSavedGame,
  defaultDifficulty,
  message,
  onContinue,
  onNewGame,
  onStats,
  onLanguage,
  onExit,
}: MenuProps) {
  const [selected, setSelected] = useState(0);
  const [chooseDifficulty, setChooseDifficulty] = useState(false);
  const [difficultyIndex, setDifficultyIndex] = useState(DIFFICULTIES.indexOf(defaultDifficulty));

  const options: Option[] = [
    ...(hasSavedGame ? [{ label: t("menu_continue"), action: onContinue }] : []),
    {
      label: t("menu_new_game"),
      action: () => setChooseDifficulty(true),
    },
    { label: t("menu_stats"), action: onStats },
    { label: t("menu_language", { language: t("language_name") }), action: onLanguage },
    { label: t("menu_exit"), action: onExit },
  ];

  const active = clampIndex(selected, options.length);

  useInput((input, key) => {
    if (chooseDifficulty) {
      if (key.upArrow) setDifficultyIndex((i) => Math.max(0, i - 1));
      if (key.downArrow) setDifficultyIndex((i) => Math.min(DIFFICULTIES.length - 1, i + 1));
      if (key.escape) setChooseDifficulty(false);
      if (key.return) {
        setChooseDifficulty(false);
        onNewGame(DIFFICULTIES[difficultyIndex]);
      }
      return;
    }

    if (key.upArrow) setSelected(clampIndex(active - 1, options.length));
    if (key.downArrow) setSelected(clampIndex(active + 1, options.length));
    if (key.return) options[active].action();
    if (input === "l") onLanguage();
    if (input === "q") onExit();
  });

  const entries = chooseDifficulty
    ? DIFFICULTIES.map((d) => t(`difficulty_${d}`))
    : options.map((opt) => opt.label);
  const current = chooseDifficulty ? difficultyIndex : active;

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Text color={colors.primary} bold>
        {`═══ ${chooseDifficulty ? t("menu_choose_difficulty") : t("app_title")} ═══`}
      </Text>
      <Text>{""}</Text>

      {entries.map((label, i) => (
        <Text key={i} color={i === current ? colors.primary : colors.dimmed}>
          {i === current ? ` ${symbols.arrow} ` : "   "}
          {label}
        </Text>
      ))}

      {message && (
        <>
          <Text>{""}</Text>
          <Text color={colors.warning}>  {message}</Text>
        </>
      )}

      <Text>{""}</Text>
      <Text color={colors.dimmed}>{t("menu_hint")}</Text>
    </Box>
  );
}
