import { describe, it, expect } from 'vitest';
import { loadData } from './data-loader.js';
import { buildPrompt, createPersonaCatalog } from './prompt-builder.js';
import { ConfigurationError } from './errors.js';
import { DATA_DIR } from '../testing/harness.js';
import { NO_SOURCE_DATA, PERSONA_IDS, type SourceSnippet } from '../types/index.js';

const catalog = createPersonaCatalog(loadData(DATA_DIR, {}).personas);

const snippet: SourceSnippet = {
  status: 'found',
  snippet: 'A market trend is a perceived tendency of financial markets to move in a particular direction.',
  sourceName: 'Wikipedia',
  sourceUrl: 'https://en.wikipedia.org/wiki/Market_trend',
  retrievedAt: '2026-01-01T00:00:00.000Z',
  term: 'market trends',
};

describe('buildPrompt', () => {
  it.each(PERSONA_IDS)('starts with the %s instruction prefix', (id) => {
    const persona = catalog.require(id);
    const prompt = buildPrompt(catalog, id, 'What changed this year?');

    expect(prompt.startsWith(persona.instruction.trim())).toBe(true);
    expect(prompt.endsWith('Question: What changed this year?')).toBe(true);
  });

  it('rejects an unknown persona', () => {
    expect(() => buildPrompt(catalog, 'Wizard', 'Hello?')).toThrow(ConfigurationError);
    expect(() => buildPrompt(catalog, 'executive', 'Hello?')).toThrow('Unknown persona: executive');
  });

  it('grounds the answer in the snippet when one is present', () => {
    const prompt = buildPrompt(catalog, 'Executive', 'Where is the market heading?', snippet);

    expect(prompt).toContain('--- Reference material (Wikipedia) ---\n' + snippet.snippet);
    expect(prompt).toContain('Answer using ONLY the reference material above');
    expect(prompt).not.toContain('No reference material was found');
  });

  it('falls back to general knowledge without a snippet', () => {
    const prompt = buildPrompt(catalog, 'Student', 'What is inflation?', NO_SOURCE_DATA);

    expect(prompt).toContain(
      'No reference material was found for this question. ' +
      'Answer from general knowledge, keeping the tone of the Student persona.'
    );
  });

  it('is deterministic', () => {
    expect(buildPrompt(catalog, 'Developer', 'Why?', snippet))
      .toBe(buildPrompt(catalog, 'Developer', 'Why?', snippet));
  });
});

describe('createPersonaCatalog', () => {
  it('lists the personas in their fixed order', () => {
    expect(catalog.list().map(p => p.id)).toEqual([...PERSONA_IDS]);
  });

  it('finds exact labels only', () => {
    expect(catalog.find('HR Specialist')?.id).toBe('HR Specialist');
    expect(catalog.find('hr specialist')).toBeNull();
  });
});
