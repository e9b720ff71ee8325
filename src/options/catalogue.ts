/**
 * Option catalogue
 * Builders for the gm switches callers use most
 */

import type { BareOption, ValuedOption } from "../types";
import { bare, valued } from "./base";

export type Gravity =
  | "NorthWest"
  | "North"
  | "NorthEast"
  | "West"
  | "Center"
  | "East"
  | "SouthWest"
  | "South"
  | "SouthEast";

export type Interlace = "None" | "Line" | "Plane" | "Partition";

export type ImageType =
  | "Bilevel"
  | "Grayscale"
  | "Palette"
  | "PaletteMatte"
  | "TrueColor"
  | "TrueColorMatte"
  | "ColorSeparation"
  | "ColorSeparationMatte"
  | "Optimize";

export type Colorspace = "RGB" | "sRGB" | "Gray" | "CMYK" | "Transparent";

// gm resize flags, appended to the geometry
export type ResizeFlag = "" | "!" | ">" | "<" | "^" | "%";

// Geometry

export function resize(
  width: number,
  height: number,
  flag: ResizeFlag = "",
): ValuedOption {
  return valued("-resize", ":widthx:height:flag", [
    ["width", width],
    ["height", height],
    ["flag", flag],
  ]);
}

/**
 * Resize by percentage, e.g. scale(50) renders as -resize "50%"
 */
export function scale(percent: number): ValuedOption {
  return valued("-resize", ":percent%", [["percent", percent]]);
}

export function thumbnail(width: number, height: number): ValuedOption {
  return valued("-thumbnail", ":widthx:height", [
    ["width", width],
    ["height", height],
  ]);
}

export function crop(
  width: number,
  height: number,
  x: number = 0,
  y: number = 0,
): ValuedOption {
  return valued("-crop", ":widthx:height+:x+:y", [
    ["width", width],
    ["height", height],
    ["x", x],
    ["y", y],
  ]);
}

export function extent(width: number, height: number): ValuedOption {
  return valued("-extent", ":widthx:height", [
    ["width", width],
    ["height", height],
  ]);
}

export function geometry(
  width: number,
  height: number,
  x: number = 0,
  y: number = 0,
): ValuedOption {
  return valued("-geometry", ":widthx:height+:x+:y", [
    ["width", width],
    ["height", height],
    ["x", x],
    ["y", y],
  ]);
}

export function size(width: number, height: number): ValuedOption {
  return valued("-size", ":widthx:height", [
    ["width", width],
    ["height", height],
  ]);
}

export function gravity(value: Gravity): ValuedOption {
  return valued("-gravity", ":gravity", [["gravity", value]]);
}

export function rotate(degrees: number): ValuedOption {
  return valued("-rotate", ":degrees", [["degrees", degrees]]);
}

export function density(x: number, y: number = x): ValuedOption {
  return valued("-density", ":xx:y", [
    ["x", x],
    ["y", y],
  ]);
}

export const flip = (): BareOption => bare("-flip");
export const flop = (): BareOption => bare("-flop");
export const autoOrient = (): BareOption => bare("-auto-orient");

// Output

export function quality(value: number): ValuedOption {
  return valued("-quality", ":quality", [["quality", value]]);
}

export function format(value: string): ValuedOption {
  return valued("-format", ":format", [["format", value]]);
}

export function interlace(value: Interlace): ValuedOption {
  return valued("-interlace", ":interlace", [["interlace", value]]);
}

export function type(value: ImageType): ValuedOption {
  return valued("-type", ":type", [["type", value]]);
}

export function colorspace(value: Colorspace): ValuedOption {
  return valued("-colorspace", ":colorspace", [["colorspace", value]]);
}

export function outputDirectory(path: string): ValuedOption {
  return valued("-output-directory", ":path", [["path", path]]);
}

/**
 * Coder-specific setting such as define("jpeg:size", "640x480").
 * gm's own key:value text goes in through a binding, since a literal
 * ":name" in a sub-template is read as a placeholder
 */
export function define(key: string, value: string | number): ValuedOption {
  return valued("-define", ":definition", [["definition", `${key}=${value}`]]);
}

export const strip = (): BareOption => bare("-strip");
export const createDirectories = (): BareOption => bare("-create-directories");
export const verbose = (): BareOption => bare("-verbose");

// Color and effects

export function background(color: string): ValuedOption {
  return valued("-background", ":color", [["color", color]]);
}

export function fill(color: string): ValuedOption {
  return valued("-fill", ":color", [["color", color]]);
}

export function transparent(color: string): ValuedOption {
  return valued("-transparent", ":color", [["color", color]]);
}

export function blur(radius: number, sigma: number): ValuedOption {
  return valued("-blur", ":radiusx:sigma", [
    ["radius", radius],
    ["sigma", sigma],
  ]);
}

export function sharpen(radius: number, sigma: number): ValuedOption {
  return valued("-sharpen", ":radiusx:sigma", [
    ["radius", radius],
    ["sigma", sigma],
  ]);
}

export const negate = (): BareOption => bare("-negate");
export const flatten = (): BareOption => bare("-flatten");

// Composite

export function dissolve(percent: number): ValuedOption {
  return valued("-dissolve", ":percent", [["percent", percent]]);
}

// Text and drawing

export function draw(primitive: string): ValuedOption {
  return valued("-draw", ":primitive", [["primitive", primitive]]);
}

export function font(name: string): ValuedOption {
  return valued("-font", ":font", [["font", name]]);
}

export function pointSize(points: number): ValuedOption {
  return valued("-pointsize", ":points", [["points", points]]);
}

export function label(text: string): ValuedOption {
  return valued("-label", ":text", [["text", text]]);
}

// Montage

export function tile(columns: number, rows: number): ValuedOption {
  return valued("-tile", ":columnsx:rows", [
    ["columns", columns],
    ["rows", rows],
  ]);
}
