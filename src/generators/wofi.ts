/**
 * Wofi launcher stylesheet.
 */

import type { Theme } from "../theme/index.js";
import { cssCommentText, surfaceColor } from "./palette.js";

export function generateWofi(theme: Theme): string {
  const { colors, properties } = theme;
  const radius = properties.border_radius ?? 0;
  const width = properties.border_width ?? 2;
  const spacing = properties.spacing ?? 5;

  return `/* Wofi theme: ${cssCommentText(theme.name)} */

window {
  margin: 0px;
  border: ${width}px solid ${colors.accent};
  border-radius: ${radius}px;
  background-color: ${colors.bg};
  font-family: monospace;
}

#input {
  margin: ${spacing}px;
  border: none;
  border-radius: ${radius}px;
  color: ${colors.fg};
  background-color: ${surfaceColor(theme)};
}

#inner-box {
  margin: ${spacing}px;
  background-color: ${colors.bg};
}

#outer-box {
  margin: ${spacing}px;
  padding: ${spacing}px;
  background-color: ${colors.bg};
}

#text {
  margin: ${spacing}px;
  color: ${colors.fg};
}

#entry:selected {
  border-radius: ${radius}px;
  background-color: ${colors.accent};
}

#text:selected {
  color: ${colors.bg};
}
`;
}
