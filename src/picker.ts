import { DialogUnavailableError } from "./errors.js";
import { PROGRAM_NAME, VERSION } from "./version.js";
import type { PickerOutcome, ProcessRunner, ScreenSize } from "./types.js";

export const HOME_CHOICE = "~/";
export const CLEAR_MARKER = "⚠ Clear recent folders";

const DIALOG = "zenity";
const TITLE = `${PROGRAM_NAME} ${VERSION}`;
const PROMPT = "Open a recently used folder:";
const CHAR_WIDTH = 8;
const SCREEN_SHARE = 0.8;

const CONFIRM_WIDTH = 360;
const CONFIRM_HEIGHT = 120;
const CONFIRM_TEXT =
  "Delete the whole list of recently used files and folders?\nThis cannot be undone.";

export interface DialogSize {
  width: number;
  height: number;
}

/**
 * Rows offered to the user: home first, then the folders, then the clear action.
 */
export function buildChoices(folders: string[]): string[] {
  return [HOME_CHOICE, ...folders, CLEAR_MARKER];
}

export function computeDialogSize(
  screen: ScreenSize,
  maxLength: number
): DialogSize {
  return {
    width: Math.floor(
      Math.min(screen.width * SCREEN_SHARE, maxLength * CHAR_WIDTH)
    ),
    height: Math.floor(screen.height * SCREEN_SHARE),
  };
}

function stripLineEnding(output: string): string {
  return output.replace(/\r?\n$/, "");
}

/**
 * Show the folder list and wait for the user's choice.
 */
export async function showPicker(
  runner: ProcessRunner,
  choices: string[],
  size: DialogSize
): Promise<PickerOutcome> {
  const result = await runner.run(DIALOG, [
    "--list",
    `--width=${size.width}`,
    `--height=${size.height}`,
    `--title=${TITLE}`,
    `--text=${PROMPT}`,
    "--column=Folder",
    "--hide-header",
    ...choices,
  ]);

  switch (result.kind) {
    case "spawn-error":
      throw new DialogUnavailableError(DIALOG, { cause: result.error });
    case "exit":
      return { kind: "dismissed" };
    case "ok": {
      const choice = stripLineEnding(result.stdout);
      if (choice === "") return { kind: "dismissed" };
      if (choice === CLEAR_MARKER) return { kind: "clear" };
      return { kind: "selected", path: choice };
    }
  }
}

/**
 * Ask before wiping the store. Resolves to true only on an explicit "Delete".
 */
export async function confirmClear(runner: ProcessRunner): Promise<boolean> {
  const result = await runner.run(DIALOG, [
    "--question",
    `--width=${CONFIRM_WIDTH}`,
    `--height=${CONFIRM_HEIGHT}`,
    `--title=${TITLE}`,
    "--icon-name=dialog-warning",
    `--text=${CONFIRM_TEXT}`,
    "--ok-label=Delete",
    "--cancel-label=Abort",
  ]);

  if (result.kind === "spawn-error") {
    throw new DialogUnavailableError(DIALOG, { cause: result.error });
  }
  return result.kind === "ok";
}
