import { HighlightSink, LocatedRegion } from './fuzzyLocator';

/**
 * Accepts regions that can be drawn on a page of the given size and rejects
 * empty or off-page rectangles.
 */
export class PageBoundsSink implements HighlightSink {
  readonly marked: LocatedRegion[] = [];

  constructor(
    private readonly width: number,
    private readonly height: number
  ) {}

  mark(region: LocatedRegion): void {
    const { x0, y0, x1, y1 } = region.rect;
    if (![x0, y0, x1, y1].every(Number.isFinite) || x1 <= x0 || y1 <= y0) {
      throw new RangeError(`Degenerate rectangle (${x0}, ${y0}, ${x1}, ${y1})`);
    }
    if (x0 < 0 || y0 < 0 || x1 > this.width || y1 > this.height) {
      throw new RangeError(`Rectangle (${x0}, ${y0}, ${x1}, ${y1}) lies outside the ${this.width}x${this.height} page`);
    }
    this.marked.push(region);
  }
}
