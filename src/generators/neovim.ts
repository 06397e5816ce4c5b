/**
 * Neovim colorscheme (Lua).
 *
 * Writes a `colors` table, then highlight groups that reference it, then the
 * terminal palette. Groups are emitted in a fixed order.
 */

import type { Theme } from "../theme/index.js";
import {
  ansiPalette,
  commentText,
  isDarkTheme,
  mutedColor,
  orangeColor,
  purpleColor,
  surfaceColor,
} from "./palette.js";

/** Double-quoted Lua string literal. */
function luaString(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r");
  return `"${escaped}"`;
}

type Highlight = Partial<Record<"fg" | "bg" | "sp", string>> & {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  undercurl?: boolean;
  link?: string;
};

const HIGHLIGHTS: ReadonlyArray<readonly [string, Highlight]> = [
  ["Normal", { fg: "fg", bg: "bg" }],
  ["NormalFloat", { fg: "fg", bg: "surface" }],
  ["FloatBorder", { fg: "accent", bg: "surface" }],
  ["Cursor", { fg: "bg", bg: "accent" }],
  ["CursorLine", { bg: "surface" }],
  ["CursorLineNr", { fg: "accent", bold: true }],
  ["LineNr", { fg: "muted" }],
  ["SignColumn", { bg: "bg" }],
  ["ColorColumn", { bg: "surface" }],
  ["Visual", { bg: "selection" }],
  ["Search", { fg: "bg", bg: "yellow" }],
  ["IncSearch", { fg: "bg", bg: "orange" }],
  ["MatchParen", { fg: "accent", bold: true }],
  ["Pmenu", { fg: "fg", bg: "surface" }],
  ["PmenuSel", { fg: "bg", bg: "accent" }],
  ["StatusLine", { fg: "fg", bg: "surface" }],
  ["StatusLineNC", { fg: "muted", bg: "surface" }],
  ["VertSplit", { fg: "muted" }],
  ["WinSeparator", { link: "VertSplit" }],
  ["Title", { fg: "accent", bold: true }],
  ["NonText", { fg: "muted" }],
  ["Comment", { fg: "muted", italic: true }],
  ["Constant", { fg: "purple" }],
  ["String", { fg: "green" }],
  ["Character", { fg: "green" }],
  ["Number", { fg: "purple" }],
  ["Boolean", { fg: "purple" }],
  ["Identifier", { fg: "blue" }],
  ["Function", { fg: "yellow", bold: true }],
  ["Statement", { fg: "red" }],
  ["Keyword", { fg: "red" }],
  ["Operator", { fg: "fg" }],
  ["PreProc", { fg: "cyan" }],
  ["Type", { fg: "yellow" }],
  ["Special", { fg: "orange" }],
  ["Underlined", { fg: "blue", underline: true }],
  ["Error", { fg: "red", bold: true }],
  ["Todo", { fg: "bg", bg: "yellow", bold: true }],
  ["DiagnosticError", { fg: "red" }],
  ["DiagnosticWarn", { fg: "yellow" }],
  ["DiagnosticInfo", { fg: "blue" }],
  ["DiagnosticHint", { fg: "cyan" }],
  ["DiagnosticUnderlineError", { sp: "red", undercurl: true }],
  ["DiffAdd", { fg: "green" }],
  ["DiffChange", { fg: "yellow" }],
  ["DiffDelete", { fg: "red" }],
  ["DiffText", { fg: "blue" }],
];

function renderHighlight(group: string, hl: Highlight): string {
  const fields: string[] = [];
  for (const key of ["fg", "bg", "sp"] as const) {
    const ref = hl[key];
    if (ref) fields.push(`${key} = colors.${ref}`);
  }
  for (const key of ["bold", "italic", "underline", "undercurl"] as const) {
    if (hl[key]) fields.push(`${key} = true`);
  }
  if (hl.link) fields.push(`link = ${luaString(hl.link)}`);
  return `  ${group} = { ${fields.join(", ")} },`;
}

export function generateNeovim(theme: Theme): string {
  const { colors } = theme;
  const palette: Array<[string, string]> = [
    ["bg", colors.bg.toHex()],
    ["fg", colors.fg.toHex()],
    ["accent", colors.accent.toHex()],
    ["red", colors.red.toHex()],
    ["green", colors.green.toHex()],
    ["yellow", colors.yellow.toHex()],
    ["blue", colors.blue.toHex()],
    ["magenta", colors.magenta.toHex()],
    ["cyan", colors.cyan.toHex()],
    ["orange", orangeColor(theme).toHex()],
    ["purple", purpleColor(theme).toHex()],
    ["muted", mutedColor(theme).toHex()],
    ["surface", surfaceColor(theme).toHex()],
    ["selection", colors.accent.mix(colors.bg, 0.7).toHex()],
  ];

  const lines = [
    `-- Neovim colorscheme: ${commentText(theme.name)}`,
    "",
    'vim.cmd("highlight clear")',
    'if vim.fn.exists("syntax_on") == 1 then',
    '  vim.cmd("syntax reset")',
    "end",
    `vim.o.background = ${luaString(isDarkTheme(theme) ? "dark" : "light")}`,
    `vim.g.colors_name = ${luaString(theme.name)}`,
    "",
    "local colors = {",
    ...palette.map(([key, hex]) => `  ${key} = ${luaString(hex)},`),
    "}",
    "",
    "local highlights = {",
    ...HIGHLIGHTS.map(([group, hl]) => renderHighlight(group, hl)),
    "}",
    "",
    "for group, opts in pairs(highlights) do",
    "  vim.api.nvim_set_hl(0, group, opts)",
    "end",
    "",
    ...ansiPalette(theme).map((color, i) => `vim.g.terminal_color_${i} = ${luaString(color.toHex())}`),
  ];

  return lines.join("\n") + "\n";
}
