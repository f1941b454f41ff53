import { describe, it, expect } from "vitest";
import {
  buildChoices,
  CLEAR_MARKER,
  computeDialogSize,
  confirmClear,
  HOME_CHOICE,
  showPicker,
} from "../src/picker.js";
import { DialogUnavailableError } from "../src/errors.js";
import { FakeRunner, exit, ok, spawnError } from "./fake-runner.js";

describe("buildChoices", () => {
  it("puts home first and the clear action last", () => {
    expect(buildChoices(["/b/", "/a/"])).toEqual([
      HOME_CHOICE,
      "/b/",
      "/a/",
      CLEAR_MARKER,
    ]);
  });

  it("offers only home and clear for an empty list", () => {
    expect(buildChoices([])).toEqual(["~/", "⚠ Clear recent folders"]);
  });
});

describe("computeDialogSize", () => {
  const screen = { width: 1920, height: 1080 };

  it("sizes the width from the longest path", () => {
    expect(computeDialogSize(screen, 40)).toEqual({ width: 320, height: 864 });
  });

  it("caps the width at 80% of the screen", () => {
    expect(computeDialogSize(screen, 500)).toEqual({ width: 1536, height: 864 });
  });

  it("rounds down fractional sizes", () => {
    expect(computeDialogSize({ width: 1366, height: 768 }, 500)).toEqual({
      width: 1092,
      height: 614,
    });
  });
});

describe("showPicker", () => {
  const size = { width: 320, height: 864 };

  it("passes size, title and rows to zenity", async () => {
    const runner = new FakeRunner([ok("/home/u/docs/\n")]);
    await showPicker(runner, ["~/", "/home/u/docs/", CLEAR_MARKER], size);

    expect(runner.runs).toEqual([
      {
        command: "zenity",
        args: [
          "--list",
          "--width=320",
          "--height=864",
          "--title=recent-folders 1.0.0",
          "--text=Open a recently used folder:",
          "--column=Folder",
          "--hide-header",
          "~/",
          "/home/u/docs/",
          CLEAR_MARKER,
        ],
      },
    ]);
  });

  it("returns the chosen row without its line ending", async () => {
    const runner = new FakeRunner([ok("/home/u/My Folder/\n")]);
    expect(await showPicker(runner, [], size)).toEqual({
      kind: "selected",
      path: "/home/u/My Folder/",
    });
  });

  it("recognises the clear action", async () => {
    const runner = new FakeRunner([ok(`${CLEAR_MARKER}\n`)]);
    expect(await showPicker(runner, [], size)).toEqual({ kind: "clear" });
  });

  it("treats a non-zero exit as dismissal", async () => {
    const runner = new FakeRunner([exit(1)]);
    expect(await showPicker(runner, [], size)).toEqual({ kind: "dismissed" });
  });

  it("treats an empty selection as dismissal", async () => {
    const runner = new FakeRunner([ok("\n")]);
    expect(await showPicker(runner, [], size)).toEqual({ kind: "dismissed" });
  });

  it("throws when zenity cannot be started", async () => {
    const runner = new FakeRunner([spawnError()]);
    await expect(showPicker(runner, [], size)).rejects.toBeInstanceOf(
      DialogUnavailableError
    );
  });
});

describe("confirmClear", () => {
  it("asks with Delete and Abort buttons", async () => {
    const runner = new FakeRunner([ok("")]);
    expect(await confirmClear(runner)).toBe(true);

    const args = runner.runs[0]?.args ?? [];
    expect(args[0]).toBe("--question");
    expect(args).toContain("--ok-label=Delete");
    expect(args).toContain("--cancel-label=Abort");
    expect(args).toContain("--width=360");
    expect(args).toContain("--height=120");
  });

  it("returns false when the user aborts", async () => {
    const runner = new FakeRunner([exit(1)]);
    expect(await confirmClear(runner)).toBe(false);
  });

  it("throws when zenity cannot be started", async () => {
    const runner = new FakeRunner([spawnError()]);
    await expect(confirmClear(runner)).rejects.toBeInstanceOf(
      DialogUnavailableError
    );
  });
});
