/**
 * Geometry argument parsing for CLI options
 */

import { resize, scale, tile } from "../options";
import type { ResizeFlag } from "../options";
import type { ValuedOption } from "../types";

const SIZE = /^(\d+)x(\d+)([!<>^]?)$/;
const PERCENT = /^(\d+)%$/;
const FLAGS: readonly ResizeFlag[] = ["", "!", ">", "<", "^"];

function isResizeFlag(value: string): value is ResizeFlag {
  return FLAGS.some((flag) => flag === value);
}

/**
 * Parse "640x480", "640x480>" or "50%" into a resize option
 *
 * @example
 * parseResize("640x480>") // resize(640, 480, ">")
 * parseResize("50%") // scale(50)
 * parseResize("big") // null
 */
export function parseResize(value: string): ValuedOption | null {
  const percent = PERCENT.exec(value);
  if (percent) return scale(Number(percent[1]));

  const size = SIZE.exec(value);
  if (!size) return null;

  const [, width, height, flag] = size;
  return resize(Number(width), Number(height), isResizeFlag(flag) ? flag : "");
}

/**
 * Parse "4x3" into a montage tile option
 */
export function parseTile(value: string): ValuedOption | null {
  const size = SIZE.exec(value);
  if (!size || size[3] !== "") return null;
  return tile(Number(size[1]), Number(size[2]));
}
