/**
 * Terminal confirmation prompt for destructive commands.
 */

import * as readline from "readline";

export interface ConfirmOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Ask a yes/no question. Anything but `y` or `yes` is a no.
 */
export async function confirm(question: string, options: ConfirmOptions = {}): Promise<boolean> {
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
  });

  try {
    const answer = await new Promise<string>((resolve) => {
      // end of input counts as no
      rl.once("close", () => resolve(""));
      rl.question(`${question} [y/N]: `, resolve);
    });
    const normalized = answer.trim().toLowerCase();
    return normalized === "y" || normalized === "yes";
  } finally {
    rl.close();
  }
}
