import { describe, it, expect } from 'vitest';
import { Retriever, formatContext, inferCategory } from '../../src/services/Retriever';
import { FakeVectorIndex, chunk, match } from '../helpers/fakes';

const roleAtCompany = chunk('career-1', 'Led the platform team at Company X.', 'resume.md', 'career', ['Experience', 'Company X']);
const sideProject = chunk('projects-1', 'Built a realtime chess engine.', 'projects.md', 'projects', ['Chess']);

describe('inferCategory', () => {
  it('recognises career and project questions', () => {
    expect(inferCategory('What was your role at Company X?')).toBe('career');
    expect(inferCategory('Tell me about a side project you built')).toBe('projects');
    expect(inferCategory('What is your favourite colour?')).toBeUndefined();
  });
});

describe('Retriever', () => {
  it('ranks by raw score across filtered and backfilled matches', async () => {
    const index = new FakeVectorIndex([match(roleAtCompany, 0.91), match(sideProject, 0.4)]);
    const retriever = new Retriever(index, { minScore: 0.3 });

    const result = await retriever.search('What was your role at Company X?', 3);

    expect(result.map((r) => r.score)).toEqual([0.91, 0.4]);
    expect(result.map((r) => r.chunk.id)).toEqual(['career-1', 'projects-1']);
    expect(index.queries).toEqual([
      { text: 'What was your role at Company X?', topK: 3, category: 'career' },
      { text: 'What was your role at Company X?', topK: 3 }
    ]);
  });

  it('never lets a category match displace a higher-scoring chunk', async () => {
    const index = new FakeVectorIndex([
      match(chunk('p-1', 'Open-source work', 'projects.md', 'projects'), 0.95),
      match(chunk('c-1', 'Company history', 'resume.md', 'career'), 0.6),
      match(chunk('c-2', 'Team size', 'resume.md', 'career'), 0.5)
    ]);

    const result = await new Retriever(index, { minScore: 0.3 }).search('Which company did you work for?', 5);

    expect(result.map((r) => r.chunk.id)).toEqual(['p-1', 'c-1', 'c-2']);
    for (let i = 1; i < result.length; i++) {
      expect(result[i - 1].score).toBeGreaterThanOrEqual(result[i].score);
    }
  });

  it('skips the unfiltered query when the filtered one fills top-k', async () => {
    const index = new FakeVectorIndex([
      match(chunk('c-1', 'a', 'resume.md', 'career'), 0.8),
      match(chunk('c-2', 'b', 'resume.md', 'career'), 0.7)
    ]);

    await new Retriever(index, { minScore: 0.3 }).search('Tell me about your experience', 2);

    expect(index.queries).toHaveLength(1);
  });

  it('backfills when the filtered matches all fall below the floor', async () => {
    const index = new FakeVectorIndex([
      match(chunk('p-1', 'Shipped a booking app', 'projects.md', 'projects'), 0.8),
      match(chunk('c-1', 'Standups', 'resume.md', 'career'), 0.2),
      match(chunk('c-2', 'Org chart', 'resume.md', 'career'), 0.1)
    ]);

    const result = await new Retriever(index, { minScore: 0.3 }).search('What did your team build?', 2);

    expect(index.queries).toHaveLength(2);
    expect(result.map((r) => r.chunk.id)).toEqual(['p-1']);
  });

  it('drops everything below the relevance floor', async () => {
    const index = new FakeVectorIndex([match(roleAtCompany, 0.29), match(sideProject, 0.1)]);

    expect(await new Retriever(index, { minScore: 0.3 }).search('Anything?', 5)).toEqual([]);
  });

  it('keeps fetch order for equal scores', async () => {
    const index = new FakeVectorIndex([
      match(chunk('a', 'first'), 0.5),
      match(chunk('b', 'second'), 0.5),
      match(chunk('c', 'third'), 0.7)
    ]);

    const result = await new Retriever(index, { minScore: 0.3 }).search('hobbies', 5);

    expect(result.map((r) => r.chunk.id)).toEqual(['c', 'a', 'b']);
  });

  it('propagates index failures', async () => {
    const index = new FakeVectorIndex();
    index.failWith = new Error('index unavailable');

    await expect(new Retriever(index, { minScore: 0.3 }).search('hobbies', 5)).rejects.toThrow('index unavailable');
  });
});

describe('formatContext', () => {
  it('numbers chunks and annotates their source', () => {
    expect(
      formatContext([
        { chunk: roleAtCompany, score: 0.91 },
        { chunk: chunk('x', 'Plain text.', 'notes.md'), score: 0.5 }
      ])
    ).toBe(
      '[1] From resume.md - Experience > Company X:\nLed the platform team at Company X.\n\n[2] From notes.md:\nPlain text.'
    );
  });
});
