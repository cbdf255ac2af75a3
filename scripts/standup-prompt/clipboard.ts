import clipboard from "clipboardy";
import { logWarning, toErrorMessage } from "../shared/errors";

/**
 * Copy text to the system clipboard. Failures (no display, missing xsel,
 * headless CI) are reported as a warning and never thrown.
 * @returns Whether the text was copied
 */
export async function copyToClipboard(text: string): Promise<boolean> {
  try {
    await clipboard.write(text);
    return true;
  } catch (error) {
    logWarning(
      `Could not copy to clipboard: ${toErrorMessage(error)}`,
      "standup:prompt"
    );
    return false;
  }
}
