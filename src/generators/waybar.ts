/**
 * Waybar stylesheet (GTK CSS).
 */

import type { Color } from "../color/index.js";
import type { Theme } from "../theme/index.js";
import { cssCommentText } from "./palette.js";

function rgba(color: Color, alpha: number): string {
  return `rgba(${color.toRgbString()}, ${alpha})`;
}

export function generateWaybar(theme: Theme): string {
  const { colors, properties } = theme;
  const radius = properties.border_radius ?? 0;
  const spacing = properties.spacing ?? 8;
  const accentWash = rgba(colors.accent, 0.2);

  let css = `/* Waybar theme: ${cssCommentText(theme.name)} */

* {
  border: none;
  border-radius: ${radius}px;
  font-family: monospace;
  font-size: 12px;
  min-height: 0;
}

window#waybar {
  background-color: ${colors.bg};
  color: ${colors.fg};
  border-bottom: 2px solid ${colors.accent};
}

#workspaces button {
  color: ${colors.fg.darken(0.3)};
  padding: 0 ${spacing}px;
`;
  if (properties.animation_duration !== undefined) {
    css += `  transition: all ${properties.animation_duration}s ease-in-out;\n`;
  }
  css += `}

#workspaces button:hover {
  background-color: ${accentWash};
  color: ${colors.accent};
}

#workspaces button.focused {
  background-color: ${colors.accent};
  color: ${colors.bg};
}

#workspaces button.urgent {
  background-color: ${colors.red};
  color: ${colors.bg};
}

#clock {
  background-color: ${colors.accent};
  color: ${colors.bg};
  padding: 0 ${spacing + 4}px;
}

#custom-music {
  color: ${colors.fg};
  padding: 0 ${spacing}px;
}

#custom-music.disconnected { color: ${colors.red}; }
#custom-music.stopped { color: ${colors.yellow}; }
#custom-music.playing { color: ${colors.green}; }
#custom-music.paused { color: ${colors.cyan}; }

#pulseaudio, #network, #battery {
  color: ${colors.fg};
  padding: 0 ${spacing}px;
  border-left: 2px solid ${accentWash};
}

#pulseaudio { color: ${colors.blue}; }
#pulseaudio.muted { color: ${colors.red}; }

#network { color: ${colors.cyan}; }
#network.disconnected { color: ${colors.red}; }

#battery { color: ${colors.green}; }
#battery.warning { color: ${colors.yellow}; }
#battery.critical { color: ${colors.red}; }

tooltip {
  background-color: ${colors.bg};
  color: ${colors.fg};
  border: 1px solid ${colors.accent};
}
`;
  return css;
}
