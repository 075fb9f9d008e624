import React from "react";
import { Box, Text, useInput } from "ink";
import type { Statistics } from "@numplace/engine";
import type { Translator } from "../../i18n.js";
import { formatStatistics } from "../../statsTable.js";
import { colors } from "../theme.js";

interface StatsProps {
  translator: Translator;
  statistics: Statistics;
  onReset: () => void;
  onBack: () => void;
}

export function Stats({ translator, statistics, onReset, onBack }: StatsProps) {
  useInput((input, key) => {
    if (input === "r") onReset();
    if (key.escape || key.return) onBack();
  });

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Text color={colors.primary} bold>
        {`═══ ${translator.t("stats_title")} ═══`}
      </Text>
      <Text>{""}</Text>
      {formatStatistics(statistics, translator).map((line, i) => (
        <Text key={i} color={line.startsWith("    ") ? colors.text : colors.secondary}>
          {line}
        </Text>
      ))}
      <Text>{""}</Text>
      <Text color={colors.dimmed}>{translator.t("stats_hint")}</Text>
    </Box>
  );
}
