import { matchNoteChunks } from '../chunkMatcher';
import { connectivityError } from '../../utils/outcome';
import { FakeAi, InMemoryQuestionRepository, silenceConsole } from './fakes';

const byLine = (text: string) =>
  text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);

describe('matchNoteChunks', () => {
  let repository: InMemoryQuestionRepository;
  let ai: FakeAi;

  beforeEach(async () => {
    silenceConsole();
    repository = new InMemoryQuestionRepository();
    await repository.storeQuestions('Cyber Security', [
      { question: 'What is a firewall?', sub_topic: 'Firewall', marks: 2 },
      { question: 'Explain encryption.', sub_topic: 'Cryptography', marks: 5 },
    ]);
    ai = new FakeAi(['firewall', 'network', 'traffic', 'encryption']);
    ai.generate.mockImplementation(async (prompt: string) =>
      prompt.includes('Encryption') ? 'Cryptography' : 'Firewall'
    );
  });

  it('labels every chunk and matches it against the subject', async () => {
    const results = await matchNoteChunks({
      repository,
      ai,
      text: 'A firewall filters traffic.\nFirewall rules block ports.\nEncryption hides data.\n',
      subject: 'Cyber Security',
      k: 1,
      maxSentences: 2,
      splitter: byLine,
    });

    expect(results.map(result => [result.chunk, result.subtopic, result.matchCount])).toEqual([
      ['A firewall filters traffic. Firewall rules block ports.', 'Firewall', 1],
      ['Encryption hides data.', 'Cryptography', 1],
    ]);
    expect(results[0].matches[0].question).toBe('What is a firewall?');
    expect(results[0].matches[0].score).toBeCloseTo(2 / Math.sqrt(5));
    expect(results[1].matches[0]).toMatchObject({
      question: 'Explain encryption.',
      metadata: { sub_topic: 'Cryptography', marks: 5 },
    });
    expect(results[1].matches[0].score).toBeCloseTo(1);
  });

  it('skips blank chunks', async () => {
    const results = await matchNoteChunks({
      repository,
      ai,
      text: 'ignored',
      subject: 'Cyber Security',
      maxSentences: 1,
      splitter: () => ['A firewall filters traffic.', '   '],
    });

    expect(results).toHaveLength(1);
    expect(ai.generate).toHaveBeenCalledTimes(1);
  });

  it('falls back to fixed-size chunks without a sentence splitter', async () => {
    const results = await matchNoteChunks({
      repository,
      ai,
      text: 'firewall '.repeat(200),
      subject: 'Cyber Security',
      k: 1,
      splitter: null,
    });

    expect(results.map(result => result.chunk.length)).toEqual([1000, 800]);
    expect(results.every(result => result.matches[0].question === 'What is a firewall?')).toBe(true);
  });

  it('reports a failed search on each chunk and keeps going', async () => {
    repository.failReadsWith = connectivityError('database offline');

    const results = await matchNoteChunks({
      repository,
      ai,
      text: 'A firewall filters traffic.\nEncryption hides data.',
      subject: 'Cyber Security',
      maxSentences: 1,
      splitter: byLine,
    });

    expect(results).toEqual([
      {
        chunk: 'A firewall filters traffic.',
        subtopic: 'Firewall',
        matches: [],
        matchCount: 0,
        searchError: { status: 'connectivityError', error: 'database offline' },
      },
      {
        chunk: 'Encryption hides data.',
        subtopic: 'Cryptography',
        matches: [],
        matchCount: 0,
        searchError: { status: 'connectivityError', error: 'database offline' },
      },
    ]);
  });
});
