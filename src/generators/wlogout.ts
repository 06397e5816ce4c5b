/**
 * wlogout stylesheet.
 */

import type { Theme } from "../theme/index.js";
import { cssCommentText, mutedColor, surfaceColor } from "./palette.js";

const ACTIONS = ["lock", "logout", "suspend", "hibernate", "shutdown", "reboot"] as const;

export function generateWlogout(theme: Theme): string {
  const { colors, properties } = theme;
  const radius = properties.border_radius ?? 0;
  const width = properties.border_width ?? 2;
  const spacing = properties.spacing ?? 10;
  const transition =
    properties.animation_duration !== undefined
      ? `  transition: background-color ${properties.animation_duration}s ease-in-out;\n`
      : "";

  const icons = ACTIONS.map(
    (action) =>
      `#${action} {\n  background-image: image(url("/usr/share/wlogout/icons/${action}.png"));\n}`
  ).join("\n\n");

  return `/* wlogout theme: ${cssCommentText(theme.name)} */

* {
  background-image: none;
  box-shadow: none;
}

window {
  background-color: rgba(${colors.bg.toRgbString()}, 0.9);
}

button {
  color: ${colors.fg};
  background-color: ${surfaceColor(theme)};
  border-style: solid;
  border-width: ${width}px;
  border-color: ${mutedColor(theme)};
  border-radius: ${radius}px;
  margin: ${spacing}px;
  background-repeat: no-repeat;
  background-position: center;
  background-size: 25%;
${transition}}

button:focus, button:active, button:hover {
  background-color: ${colors.accent};
  color: ${colors.bg};
  outline-style: none;
}

${icons}
`;
}
