import { createInterface } from "node:readline/promises";
import { widthSchema } from "./utils/validation.js";
import { Logger } from "./utils/logger.js";

/**
 * Decides what happens to an image the host would refuse as too large.
 * Batch callers pass `alwaysResize` or `neverResize`.
 */
export interface Prompter {
  confirm(question: string): Promise<boolean>;
  /** Returns the width to resize to, or undefined to give up on the image. */
  chooseWidth(currentWidth: number | undefined, suggested: number | undefined): Promise<number | undefined>;
}

export const alwaysResize: Prompter = {
  async confirm() {
    return true;
  },
  async chooseWidth(_currentWidth, suggested) {
    return suggested;
  },
};

export const neverResize: Prompter = {
  async confirm() {
    return false;
  },
  async chooseWidth() {
    return undefined;
  },
};

export function createInteractivePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): Prompter {
  const ask = async (question: string): Promise<string> => {
    const rl = createInterface({ input, output, terminal: false });
    try {
      return (await rl.question(question)).trim();
    } finally {
      rl.close();
    }
  };

  return {
    async confirm(question) {
      const answer = (await ask(`${question} [y/N] `)).toLowerCase();
      return answer === "y" || answer === "yes";
    },

    async chooseWidth(currentWidth, suggested) {
      const hint = suggested !== undefined ? ` [${suggested}]` : "";
      const current = currentWidth !== undefined ? `Current width: ${currentWidth}\n` : "";

      for (let attempt = 0; attempt < 3; attempt++) {
        const answer = await ask(`${current}Enter new width${hint}: `);
        if (answer === "" && suggested !== undefined) {
          return suggested;
        }

        const parsed = widthSchema.safeParse(answer);
        if (parsed.success && (currentWidth === undefined || parsed.data < currentWidth)) {
          return parsed.data;
        }

        Logger.error("Invalid input. Enter a whole number greater than 0 and lower than the current width.");
      }

      return undefined;
    },
  };
}
