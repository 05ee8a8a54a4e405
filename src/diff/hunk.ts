/** New-file position a hunk header points at. */
export interface HunkTarget {
  targetLine: number;
  lineCount: number;
}

export interface HunkLocation extends HunkTarget {
  oldStart: number;
  oldCount: number;
  /** 0-based index of the header line. */
  headerLine: number;
}

/** Returned by locateHunk when no header precedes the cursor. */
export const HUNK_NOT_FOUND: Readonly<HunkTarget> = Object.freeze({ targetLine: 0, lineCount: 0 });

// Only the full form with both counts present; anything after the closing @@ is a section label.
const HUNK_HEADER = /^@@ -(\d+),(\d+) \+(\d+),(\d+) @@/;

export function parseHunkHeader(line: string): Omit<HunkLocation, 'headerLine'> | null {
  const match = line.match(HUNK_HEADER);
  if (!match) return null;
  return {
    oldStart: Number(match[1]),
    oldCount: Number(match[2]),
    targetLine: Number(match[3]),
    lineCount: Number(match[4]),
  };
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Scan upward from `cursorLine` (inclusive) for the closest hunk header.
 * File headers are not boundaries: in a multi-file diff a cursor in the second
 * file's preamble resolves to the last hunk of the first file.
 */
export function findHunk(lines: readonly string[], cursorLine: number): HunkLocation | null {
  if (cursorLine < 0 || lines.length === 0) return null;

  for (let i = Math.min(cursorLine, lines.length - 1); i >= 0; i--) {
    const header = parseHunkHeader(lines[i]!);
    if (header) {
      return { ...header, headerLine: i };
    }
  }
  return null;
}

/** findHunk over raw text, with `{0, 0}` standing in for "no hunk". */
export function locateHunk(text: string, cursorLine: number): HunkTarget {
  const found = findHunk(splitLines(text), cursorLine);
  if (!found) return { ...HUNK_NOT_FOUND };
  return { targetLine: found.targetLine, lineCount: found.lineCount };
}

/** 0-based line index of a character offset, for editors that report cursor offsets. */
export function lineAtOffset(text: string, offset: number): number {
  const end = Math.max(0, Math.min(offset, text.length));
  let line = 0;
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}
