/**
 * Managed blocks inside files the user also edits.
 */

export const BLOCK_START = "# >>> huectl >>>";
export const BLOCK_END = "# <<< huectl <<<";

function wrap(content: string): string {
  const body = content.endsWith("\n") ? content : `${content}\n`;
  return `${BLOCK_START}\n${body}${BLOCK_END}\n`;
}

/**
 * Replace the managed block in `existing`, or append one.
 *
 * @throws Error when a start marker has no matching end marker
 */
export function mergeBlock(existing: string | undefined, content: string): string {
  const block = wrap(content);
  if (existing === undefined || existing.trim() === "") {
    return block;
  }

  const start = existing.indexOf(BLOCK_START);
  if (start === -1) {
    const separator = existing.endsWith("\n") ? "\n" : "\n\n";
    return existing + separator + block;
  }

  const end = existing.indexOf(BLOCK_END, start);
  if (end === -1) {
    throw new Error(`found "${BLOCK_START}" without a matching "${BLOCK_END}"`);
  }

  let after = end + BLOCK_END.length;
  if (existing[after] === "\n") {
    after += 1;
  }
  return existing.slice(0, start) + block + existing.slice(after);
}
