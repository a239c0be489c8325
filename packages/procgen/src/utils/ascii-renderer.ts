/**
 * ASCII Maze Renderer
 *
 * Renders maze snapshots as text for debugging and tests.
 *
 * @example
 * ```typescript
 * import { MazeGenerator, renderAscii, SIMPLE_CHARSET } from "@sapling/procgen";
 *
 * const maze = new MazeGenerator({ width: 31, height: 21, seed: 12345 });
 * maze.build();
 * console.log(renderAscii(maze.snapshot(), { charset: SIMPLE_CHARSET }));
 * ```
 */

import type { MazeSnapshot, Point } from "@sapling/contracts";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * ASCII character mapping
 */
export interface AsciiCharset {
  readonly path: string;
  readonly empty: string;
  readonly entry: string;
  readonly exit: string;
}

/**
 * Default charset
 */
export const DEFAULT_CHARSET: AsciiCharset = {
  path: "█",
  empty: " ",
  entry: "▲",
  exit: "▼",
};

/**
 * Simple ASCII charset (for terminals without unicode support)
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  path: "#",
  empty: ".",
  entry: "@",
  exit: ">",
};

/**
 * Render options
 */
export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Prefix rows with their y coordinate and add an x ruler */
  readonly showCoordinates?: boolean;
  /** Color entry and exit (ANSI escape codes) */
  readonly useColors?: boolean;
}

const ANSI = {
  reset: "\x1b[0m",
  green: "\x1b[32m",
  red: "\x1b[31m",
} as const;

function colorize(text: string, code: string): string {
  return code + text + ANSI.reset;
}

function isAt(p: Point | null, x: number, y: number): boolean {
  return p !== null && p.x === x && p.y === y;
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

/**
 * Render a snapshot as ASCII art, one line per row, y = 0 first
 */
export function renderAscii(
  snapshot: MazeSnapshot,
  options: RenderOptions = {},
): string {
  const {
    charset = DEFAULT_CHARSET,
    showCoordinates = false,
    useColors = false,
  } = options;
  const { width, height, cells, entry, exit } = snapshot;

  const lines: string[] = [];

  if (showCoordinates) {
    let ruler = "    ";
    for (let x = 0; x < width; x += 10) {
      ruler += x.toString().padEnd(10);
    }
    lines.push(ruler.trimEnd());
  }

  for (let y = 0; y < height; y++) {
    let line = showCoordinates ? `${y.toString().padStart(3)} ` : "";
    for (let x = 0; x < width; x++) {
      if (isAt(entry, x, y)) {
        line += useColors ? colorize(charset.entry, ANSI.green) : charset.entry;
      } else if (isAt(exit, x, y)) {
        line += useColors ? colorize(charset.exit, ANSI.red) : charset.exit;
      } else {
        line += cells[y * width + x] === 1 ? charset.path : charset.empty;
      }
    }
    lines.push(line);
  }

  return lines.join("\n");
}

/**
 * Generate a legend for the current charset
 */
export function renderLegend(charset: AsciiCharset = DEFAULT_CHARSET): string {
  return [
    "Legend:",
    `  ${charset.path} Path`,
    `  ${charset.empty} Empty`,
    `  ${charset.entry} Entry`,
    `  ${charset.exit} Exit`,
  ].join("\n");
}
