export const colors = {
  primary: "#00ff41",      // Matrix green
  secondary: "#ffb000",    // Amber
  dimmed: "#666666",
  error: "#ff3333",
  warning: "#ffaa00",
  text: "#cccccc",
  border: "#333333",
  white: "#ffffff",
  cyan: "#00ffff",
};

/** Cell highlighting, strongest first: selected, conflict, same value, peer */
export const cellColors = {
  clue: colors.primary,
  player: colors.cyan,
  conflict: colors.error,
  note: colors.dimmed,
  empty: colors.border,
  selectedBg: "#005f5f",
  sameValueBg: "#3a3a00",
  peerBg: "#1c1c1c",
};

export const symbols = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
  cross: "┼",
  tee: "├",
  teeRight: "┤",
  teeDown: "┬",
  teeUp: "┴",
  arrow: "▸",
  check: "✔",
  empty: "·",
  noted: "+",
  pencil: "✎",
};
