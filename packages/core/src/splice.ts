import type { LineEnding, Markers } from "./block.js";
import {
  AnchorNotFoundError,
  MarkerMismatchError,
  MarkerNotFoundError,
} from "./errors.js";

/**
 * A file cut into three slices around the generated block. Concatenating
 * them always reproduces the text they were cut from.
 */
export interface FileSplice {
  prefix: string;
  block: string;
  suffix: string;
}

interface LineSpan {
  /** Offset of the first character of the line */
  start: number;
  /** Offset just past the line's content, before "\r\n" or "\n" */
  end: number;
  /** 1-based */
  line: number;
}

function findLines(text: string, wanted: string): LineSpan[] {
  const target = wanted.trim();
  const spans: LineSpan[] = [];
  let offset = 0;
  let line = 1;

  while (offset <= text.length) {
    const newline = text.indexOf("\n", offset);
    const lineEnd = newline === -1 ? text.length : newline;
    const contentEnd =
      lineEnd > offset && text[lineEnd - 1] === "\r" ? lineEnd - 1 : lineEnd;

    if (text.slice(offset, contentEnd).trim() === target) {
      spans.push({ start: offset, end: contentEnd, line });
    }

    if (newline === -1) break;
    offset = newline + 1;
    line++;
  }

  return spans;
}

export function detectLineEnding(text: string): LineEnding {
  return text.includes("\r\n") ? "\r\n" : "\n";
}

/**
 * Cut `text` around the block bounded by the marker lines. The block runs
 * from the start of the start-marker line to the end of the end-marker line;
 * the line break after it stays in the suffix.
 *
 * @throws {MarkerNotFoundError} when neither marker is present
 * @throws {MarkerMismatchError} when the markers do not bound exactly one region
 */
export function locateBlock(text: string, markers: Markers): FileSplice {
  const starts = findLines(text, markers.start);
  const ends = findLines(text, markers.end);

  const [start, secondStart] = starts;
  const [end, secondEnd] = ends;

  if (!start) {
    if (end) {
      throw new MarkerMismatchError("End marker without a start marker", end.line);
    }
    throw new MarkerNotFoundError(markers.start);
  }
  if (secondStart) {
    throw new MarkerMismatchError("More than one start marker", secondStart.line);
  }
  if (!end) {
    throw new MarkerMismatchError("Start marker has no matching end marker", start.line);
  }
  if (secondEnd) {
    throw new MarkerMismatchError("More than one end marker", secondEnd.line);
  }
  if (end.start < start.start) {
    throw new MarkerMismatchError("End marker precedes the start marker", end.line);
  }

  return {
    prefix: text.slice(0, start.start),
    block: text.slice(start.start, end.end),
    suffix: text.slice(end.end),
  };
}

/**
 * An empty splice where a new block belongs: on the line after the first
 * line equal to `anchor`, or at the end of the file without an anchor.
 *
 * @throws {AnchorNotFoundError} when `anchor` is given but absent
 */
export function insertionPoint(
  text: string,
  anchor?: string | undefined,
  eol: LineEnding = detectLineEnding(text),
): FileSplice {
  if (anchor === undefined) {
    const prefix = text === "" || text.endsWith("\n") ? text : text + eol;
    return { prefix, block: "", suffix: eol };
  }

  const [match] = findLines(text, anchor);
  if (!match) {
    throw new AnchorNotFoundError(anchor);
  }

  const newline = text.indexOf("\n", match.end);
  if (newline === -1) {
    return { prefix: text + eol, block: "", suffix: eol };
  }
  return {
    prefix: text.slice(0, newline + 1),
    block: "",
    suffix: eol + text.slice(newline + 1),
  };
}

/** Splice of `text` with `block` placed at the insertion point. */
export function insertBlock(
  text: string,
  block: string,
  anchor?: string | undefined,
  eol?: LineEnding | undefined,
): FileSplice {
  return spliceBlock(insertionPoint(text, anchor, eol), block);
}

export function spliceBlock(splice: FileSplice, block: string): FileSplice {
  return { prefix: splice.prefix, block, suffix: splice.suffix };
}

export function joinSplice(splice: FileSplice): string {
  return splice.prefix + splice.block + splice.suffix;
}
