import { ANSWER_NOT_FOUND, HighlightSink, LocatedRegion, locateAnswer, ngramCandidates } from '../fuzzyLocator';
import { PageBoundsSink } from '../pageBoundsSink';
import { PageTextLayer, PositionedTextLayer } from '../textLayer';

const PAGE_TEXT = 'A firewall is a network security device. It monitors traffic.';
const splitter = (text: string) => text.split(/(?<=\.)\s+/);

function firewallLayer(): PositionedTextLayer {
  return new PositionedTextLayer([{ str: PAGE_TEXT, x: 50, y: 100, width: 305, height: 12 }]);
}

describe('ngramCandidates', () => {
  it('interleaves 3- and 4-word runs for longer answers', () => {
    expect(ngramCandidates('one two three four five')).toEqual([
      'one two three',
      'one two three four',
      'two three four',
      'two three four five',
      'three four five',
    ]);
  });

  it('falls back to words longer than three characters', () => {
    expect(ngramCandidates('a big firewall')).toEqual(['firewall']);
  });
});

describe('locateAnswer', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('highlights an answer that appears verbatim as one region', () => {
    const regions = locateAnswer(firewallLayer(), PAGE_TEXT, { splitter });

    expect(regions).toEqual([
      {
        rect: { x0: 50, y0: 100, x1: 355, y1: 112 },
        strategy: 'exact',
        tone: 'primary',
        color: '#ffff00',
        matchedText: PAGE_TEXT,
      },
    ]);
  });

  it('never searches for the not-found sentinel', () => {
    const layer: PageTextLayer = { text: PAGE_TEXT, search: jest.fn(() => []) };

    expect(locateAnswer(layer, ANSWER_NOT_FOUND)).toEqual([]);
    expect(locateAnswer(layer, '   ')).toEqual([]);
    expect(layer.search).not.toHaveBeenCalled();
  });

  it('falls back to the sentences found on the page', () => {
    const regions = locateAnswer(
      firewallLayer(),
      'A firewall is a network security device.  It watches the traffic.',
      { splitter }
    );

    expect(regions).toEqual([
      {
        rect: { x0: 50, y0: 100, x1: 250, y1: 112 },
        strategy: 'sentence',
        tone: 'primary',
        color: '#ffff00',
        matchedText: 'A firewall is a network security device.',
      },
    ]);
  });

  it('falls back to word runs marked with the secondary tone', () => {
    const regions = locateAnswer(firewallLayer(), 'Firewalls are a network security device for homes', { splitter });

    expect(regions.map(region => region.matchedText)).toEqual([
      'a network security',
      'a network security device',
      'network security device',
    ]);
    expect(regions.every(region => region.tone === 'secondary' && region.color === '#ffcc00')).toBe(true);
    expect(regions.every(region => region.strategy === 'ngram')).toBe(true);
  });

  it('falls back to single words for short answers', () => {
    const regions = locateAnswer(firewallLayer(), 'stateful firewall inspection', { splitter });

    expect(regions).toHaveLength(1);
    expect(regions[0]).toMatchObject({ matchedText: 'firewall', rect: { x0: 60, y0: 100, x1: 100, y1: 112 } });
  });

  it('highlights nothing for a paraphrase', () => {
    expect(locateAnswer(firewallLayer(), 'Packet filters guard the perimeter', { splitter })).toEqual([]);
  });

  it('works without a sentence splitter', () => {
    const regions = locateAnswer(firewallLayer(), 'A firewall is a network security device. It watches', {
      splitter: null,
    });

    expect(regions[0].strategy).toBe('ngram');
  });

  it('skips regions the sink cannot mark and keeps the rest', () => {
    const marked: string[] = [];
    const sink: HighlightSink = {
      mark(region: LocatedRegion) {
        if (region.matchedText === 'a network security') {
          throw new Error('cannot draw');
        }
        marked.push(region.matchedText);
      },
    };

    const regions = locateAnswer(firewallLayer(), 'Firewalls are a network security device for homes', {
      sink,
      splitter,
    });

    expect(regions.map(region => region.matchedText)).toEqual(['a network security device', 'network security device']);
    expect(marked).toEqual(['a network security device', 'network security device']);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('moves to the next step when the sink rejects every region of a step', () => {
    const sink: HighlightSink = {
      mark(region: LocatedRegion) {
        if (region.strategy === 'exact') {
          throw new Error('cannot draw');
        }
      },
    };

    const regions = locateAnswer(firewallLayer(), PAGE_TEXT, { sink, splitter });

    expect(regions.map(region => [region.strategy, region.matchedText])).toEqual([
      ['sentence', 'A firewall is a network security device.'],
      ['sentence', 'It monitors traffic.'],
    ]);
  });
});

describe('PageBoundsSink', () => {
  const region = (x0: number, y0: number, x1: number, y1: number): LocatedRegion => ({
    rect: { x0, y0, x1, y1 },
    strategy: 'exact',
    tone: 'primary',
    color: '#ffff00',
    matchedText: 'firewall',
  });

  it('keeps regions that fit on the page', () => {
    const sink = new PageBoundsSink(600, 800);

    sink.mark(region(50, 100, 250, 112));

    expect(sink.marked).toHaveLength(1);
  });

  it('rejects empty and off-page rectangles', () => {
    const sink = new PageBoundsSink(600, 800);

    expect(() => sink.mark(region(50, 100, 50, 112))).toThrow(RangeError);
    expect(() => sink.mark(region(550, 100, 650, 112))).toThrow(RangeError);
    expect(() => sink.mark(region(Number.NaN, 100, 250, 112))).toThrow(RangeError);
    expect(sink.marked).toEqual([]);
  });
});
