import React from "react";
import { Box, Text } from "ink";
import { colors } from "../theme.js";

interface StatusBarProps {
  title: string;
  language: string;
  dataDir: string;
}

export function StatusBar({ title, language, dataDir }: StatusBarProps) {
  return (
    <Box
      borderStyle="single"
      borderColor={colors.border}
      paddingX={1}
      flexDirection="row"
      justifyContent="space-between"
    >
      <Text color={colors.primary} bold>
        {title.toUpperCase()}
      </Text>
      <Text color={colors.dimmed}>
        {language} | {dataDir}
      </Text>
    </Box>
  );
}
