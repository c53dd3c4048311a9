import type { BoardGroup, DepartureRow, StopDepartures, StopDisplay } from "./models/departures";
import { buildStopDisplay, findFirstLiveRow, LIVE_GLYPH, SCHEDULED_GLYPH } from "./format";

export const COLUMN_WIDTH = 32;
const COLUMN_GAP = "  ";

// Terminals draw the indicator emoji two cells wide.
const WIDE_GLYPHS = new Set([LIVE_GLYPH, SCHEDULED_GLYPH]);

export const displayWidth = (text: string): number => {
  let width = 0;
  for (const char of text) {
    width += WIDE_GLYPHS.has(char) ? 2 : 1;
  }
  return width;
};

export const padToWidth = (text: string, width: number): string => {
  const current = displayWidth(text);
  return current >= width ? text : `${text}${" ".repeat(width - current)}`;
};

/** Greedy word wrap; a word longer than `width` keeps its own overflowing line. */
export const wrapWords = (text: string, width: number): string[] => {
  const lines: string[] = [];
  let current = "";
  text
    .split(/\s+/)
    .filter(Boolean)
    .forEach((word) => {
      if (!current) {
        current = word;
        return;
      }
      if (displayWidth(current) + 1 + displayWidth(word) <= width) {
        current = `${current} ${word}`;
        return;
      }
      lines.push(current);
      current = word;
    });
  if (current) lines.push(current);
  return lines;
};

const renderRow = (cells: string[], width: number) =>
  cells.map((cell) => padToWidth(cell, width)).join(COLUMN_GAP);

export const renderStopDisplays = (title: string, stops: readonly StopDisplay[], width = COLUMN_WIDTH): string => {
  const wrappedNames = stops.map((stop) => wrapWords(stop.name, width));
  const nameHeight = Math.max(0, ...wrappedNames.map((lines) => lines.length));
  const timeHeight = Math.max(0, ...stops.map((stop) => stop.times.length));

  const lines = [title];
  for (let index = 0; index < nameHeight; index += 1) {
    lines.push(renderRow(wrappedNames.map((names) => names[index] ?? ""), width));
  }
  for (let index = 0; index < timeHeight; index += 1) {
    lines.push(renderRow(stops.map((stop) => stop.times[index] ?? ""), width));
  }
  return lines.join("\n");
};

export interface RenderGridOptions {
  /**
   * Row that receives seconds precision. Defaults to the first displayed live row
   * of this grid; pass `null` when another grid already claimed it.
   */
  highlightRow?: DepartureRow | null;
}

export const renderGrid = (
  title: string,
  stops: readonly StopDepartures[],
  now: Date,
  options: RenderGridOptions = {},
): string => {
  const highlightRow = options.highlightRow === undefined ? findFirstLiveRow(stops) : options.highlightRow;
  const displays = stops.map((stop) => buildStopDisplay(stop, now, highlightRow));
  return renderStopDisplays(title, displays);
};

/** Renders every group, one blank line apart, with a single seconds-precision row overall. */
export const renderBoard = (groups: readonly BoardGroup[], now: Date): string => {
  const highlightRow = findFirstLiveRow(groups.flatMap((group) => group.stops));
  return groups
    .map((group) => renderGrid(group.title, group.stops, now, { highlightRow }))
    .join("\n\n");
};
