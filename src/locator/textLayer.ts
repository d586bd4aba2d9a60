import { collapseWhitespace } from '../utils/sentences';

/** Rectangle in page space: points, origin at the top-left corner. */
export interface TextRect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * Reading direction of a text run as displayed: left-to-right, right-to-left,
 * top-to-bottom or bottom-to-top. Rotated pages turn horizontal text into
 * vertical runs.
 */
export type TextRun = 'ltr' | 'rtl' | 'ttb' | 'btt';

/**
 * One run of text as laid out on the page. `x`/`y`/`width`/`height` is its
 * bounding box in page space; `run` defaults to `ltr`.
 */
export interface PositionedTextItem {
  str: string;
  x: number;
  y: number;
  width: number;
  height: number;
  hasEOL?: boolean;
  run?: TextRun;
}

/** Searchable text of one rendered page. */
export interface PageTextLayer {
  /** Whitespace-collapsed page text, in reading order. */
  readonly text: string;
  /** Every occurrence of `needle`, one rectangle per line it spans. */
  search(needle: string): TextRect[];
}

interface CharOwner {
  item: number;
  offset: number;
}

const WHITESPACE = /\s/;

function runOf(item: PositionedTextItem): TextRun {
  return item.run ?? 'ltr';
}

function isVertical(item: PositionedTextItem): boolean {
  const run = runOf(item);
  return run === 'ttb' || run === 'btt';
}

// Extent across the reading direction, i.e. the font size
function thickness(item: PositionedTextItem): number {
  return isVertical(item) ? item.width : item.height;
}

function sameLine(a: PositionedTextItem, b: PositionedTextItem): boolean {
  if (isVertical(a) !== isVertical(b)) {
    return false;
  }
  const tolerance = Math.max(Math.min(thickness(a), thickness(b)) / 2, 1);
  return isVertical(a) ? Math.abs(a.x - b.x) <= tolerance : Math.abs(a.y - b.y) <= tolerance;
}

function gapBetween(prev: PositionedTextItem, next: PositionedTextItem): number {
  switch (runOf(prev)) {
    case 'rtl':
      return prev.x - (next.x + next.width);
    case 'ttb':
      return next.y - (prev.y + prev.height);
    case 'btt':
      return prev.y - (next.y + next.height);
    default:
      return next.x - (prev.x + prev.width);
  }
}

// Adjacent items on one line are often fragments of a single word, so a
// separator is only implied by a line break or a visible gap along the line
function impliesSeparator(prev: PositionedTextItem, next: PositionedTextItem): boolean {
  if (prev.hasEOL || runOf(prev) !== runOf(next) || !sameLine(prev, next)) {
    return true;
  }
  return gapBetween(prev, next) > Math.max(thickness(prev), 1) * 0.15;
}

// Box covering characters first..last of an item, assuming equal advances
function spanRect(item: PositionedTextItem, first: number, last: number): TextRect {
  const length = Math.max(item.str.length, 1);
  const { x, y, width, height } = item;
  switch (runOf(item)) {
    case 'rtl': {
      const step = width / length;
      return { x0: x + width - step * (last + 1), y0: y, x1: x + width - step * first, y1: y + height };
    }
    case 'ttb': {
      const step = height / length;
      return { x0: x, y0: y + step * first, x1: x + width, y1: y + step * (last + 1) };
    }
    case 'btt': {
      const step = height / length;
      return { x0: x, y0: y + height - step * (last + 1), x1: x + width, y1: y + height - step * first };
    }
    default: {
      const step = width / length;
      return { x0: x + step * first, y0: y, x1: x + step * (last + 1), y1: y + height };
    }
  }
}

/**
 * Text layer over positioned text items. Matching ignores case and treats
 * any whitespace run, line break or gap between items as one space.
 */
export class PositionedTextLayer implements PageTextLayer {
  readonly text: string;
  private readonly haystack: string;
  private readonly owners: Array<CharOwner | null>;

  constructor(private readonly items: PositionedTextItem[]) {
    let display = '';
    const displayOwners: Array<CharOwner | null> = [];

    const pushSpace = (owner: CharOwner | null) => {
      if (display.length > 0 && !display.endsWith(' ')) {
        display += ' ';
        displayOwners.push(owner);
      }
    };

    items.forEach((item, index) => {
      const prev = index > 0 ? items[index - 1] : undefined;
      if (prev && impliesSeparator(prev, item)) {
        pushSpace(null);
      }
      for (let offset = 0; offset < item.str.length; offset++) {
        const ch = item.str[offset];
        if (WHITESPACE.test(ch)) {
          pushSpace({ item: index, offset });
        } else {
          display += ch;
          displayOwners.push({ item: index, offset });
        }
      }
    });

    // Trailing separator carries no text
    if (display.endsWith(' ')) {
      display = display.slice(0, -1);
      displayOwners.pop();
    }

    let haystack = '';
    const owners: Array<CharOwner | null> = [];
    for (let i = 0; i < display.length; i++) {
      const lower = display[i].toLowerCase();
      haystack += lower;
      for (let j = 0; j < lower.length; j++) {
        owners.push(displayOwners[i]);
      }
    }

    this.text = display;
    this.haystack = haystack;
    this.owners = owners;
  }

  search(needle: string): TextRect[] {
    const query = collapseWhitespace(needle).toLowerCase();
    if (!query) {
      return [];
    }

    const rects: TextRect[] = [];
    let from = 0;
    while (from <= this.haystack.length - query.length) {
      const start = this.haystack.indexOf(query, from);
      if (start === -1) {
        break;
      }
      rects.push(...this.rectsForRange(start, start + query.length));
      from = start + query.length;
    }
    return rects;
  }

  private rectsForRange(start: number, end: number): TextRect[] {
    // Covered character span per item, in reading order
    const spans = new Map<number, { first: number; last: number }>();
    for (let i = start; i < end; i++) {
      const owner = this.owners[i];
      if (!owner) {
        continue;
      }
      const span = spans.get(owner.item);
      if (span) {
        span.first = Math.min(span.first, owner.offset);
        span.last = Math.max(span.last, owner.offset);
      } else {
        spans.set(owner.item, { first: owner.offset, last: owner.offset });
      }
    }

    const lines: Array<{ item: PositionedTextItem; rect: TextRect }> = [];
    for (const [itemIndex, span] of spans) {
      const item = this.items[itemIndex];
      const rect = spanRect(item, span.first, span.last);

      const current = lines[lines.length - 1];
      if (current && sameLine(current.item, item)) {
        current.rect = {
          x0: Math.min(current.rect.x0, rect.x0),
          y0: Math.min(current.rect.y0, rect.y0),
          x1: Math.max(current.rect.x1, rect.x1),
          y1: Math.max(current.rect.y1, rect.y1),
        };
      } else {
        lines.push({ item, rect });
      }
    }
    return lines.map(line => line.rect);
  }
}
