import type { Logger, ProcessRunner, ScreenSize } from "./types.js";

export const FALLBACK_SCREEN: ScreenSize = { width: 1280, height: 800 };

const PRIMARY_OUTPUT = / connected primary (\d+)x(\d+)\+/;
const FIRST_OUTPUT = / connected (?:primary )?(\d+)x(\d+)\+/;
const WHOLE_SCREEN = /current (\d+) x (\d+)/;

/**
 * Read the primary display's size from `xrandr --current` output, e.g.
 * "HDMI-1 connected primary 1920x1080+0+0 ...". Falls back to the first
 * connected output, then to the whole screen
 * ("Screen 0: minimum 320 x 200, current 3840 x 1080, ...").
 */
export function parseXrandr(output: string): ScreenSize | undefined {
  for (const pattern of [PRIMARY_OUTPUT, FIRST_OUTPUT, WHOLE_SCREEN]) {
    const match = pattern.exec(output);
    if (match) return { width: Number(match[1]), height: Number(match[2]) };
  }
  return undefined;
}

export async function getScreenSize(
  runner: ProcessRunner,
  logger: Logger
): Promise<ScreenSize> {
  const result = await runner.run("xrandr", ["--current"]);
  if (result.kind === "ok") {
    const size = parseXrandr(result.stdout);
    if (size) return size;
  }
  logger.warn(
    `Could not read the screen size, using ${FALLBACK_SCREEN.width}x${FALLBACK_SCREEN.height}`
  );
  return FALLBACK_SCREEN;
}
