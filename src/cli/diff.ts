/**
 * Diff Rendering
 *
 * Colored line diffs for dry-run reports, built on the diff package.
 */

import { diffLines, type Change } from "diff";
import pc from "picocolors";

export interface DiffRenderOptions {
  /** Unchanged lines kept around each change (default: 3) */
  contextLines?: number;
  /** Output lines before truncating (default: 200) */
  maxLines?: number;
}

function splitLines(value: string): string[] {
  const lines = value.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

function gutter(oldNum: number | undefined, newNum: number | undefined): string {
  const oldStr = oldNum !== undefined ? String(oldNum).padStart(4) : "    ";
  const newStr = newNum !== undefined ? String(newNum).padStart(4) : "    ";
  return pc.dim(`${oldStr} ${newStr} `);
}

/**
 * Render the change from `original` (undefined for a new file) to `modified`.
 */
export function renderDiff(
  original: string | undefined,
  modified: string,
  options: DiffRenderOptions = {}
): string {
  const { contextLines = 3, maxLines = 200 } = options;
  const changes: Change[] = diffLines(original ?? "", modified);
  const out: string[] = [];
  let oldLine = 1;
  let newLine = 1;

  changes.forEach((change, index) => {
    const lines = splitLines(change.value);

    if (change.added) {
      for (const line of lines) {
        out.push(pc.green(`${gutter(undefined, newLine++)}+ ${line}`));
      }
      return;
    }
    if (change.removed) {
      for (const line of lines) {
        out.push(pc.red(`${gutter(oldLine++, undefined)}- ${line}`));
      }
      return;
    }

    // Unchanged run: keep the tail of it before a change and the head after one
    const keepHead = index === 0 ? 0 : contextLines;
    const keepTail = index === changes.length - 1 ? 0 : contextLines;
    lines.forEach((line, i) => {
      const inHead = i < keepHead;
      const inTail = i >= lines.length - keepTail;
      if (inHead || inTail) {
        out.push(pc.dim(`${gutter(oldLine, newLine)}  ${line}`));
      } else if (i === keepHead) {
        out.push(pc.dim("  ..."));
      }
      oldLine++;
      newLine++;
    });
  });

  if (out.length > maxLines) {
    const hidden = out.length - maxLines;
    return [...out.slice(0, maxLines), pc.yellow(`... (${hidden} more lines)`)].join("\n");
  }
  return out.join("\n");
}

/**
 * Short `+added, -removed` summary of a change.
 */
export function getDiffSummary(original: string | undefined, modified: string): string {
  if (original === undefined) {
    return `+${splitLines(modified).length} lines (new file)`;
  }

  let added = 0;
  let removed = 0;
  for (const change of diffLines(original, modified)) {
    const count = splitLines(change.value).length;
    if (change.added) {
      added += count;
    } else if (change.removed) {
      removed += count;
    }
  }

  const parts: string[] = [];
  if (added > 0) parts.push(pc.green(`+${added}`));
  if (removed > 0) parts.push(pc.red(`-${removed}`));
  return parts.length > 0 ? parts.join(", ") : "no changes";
}
