import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { copyFileSync, mkdtempSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadData } from './data-loader.js';
import { ConfigurationError } from './errors.js';
import { DATA_DIR } from '../testing/harness.js';
import { PERSONA_IDS } from '../types/index.js';

describe('loadData', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'personachat-data-'));
    for (const file of ['config.yaml', 'personas.yaml', 'query-rules.yaml', 'users.json']) {
      copyFileSync(join(DATA_DIR, file), join(dir, file));
    }
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('loads the shipped data directory', () => {
    const data = loadData(DATA_DIR, {});

    expect(data.personas.map(p => p.id)).toEqual([...PERSONA_IDS]);
    expect(data.config.server.port).toBe(5000);
    expect(data.config.llm.providers.map(p => p.type)).toEqual(['ollama', 'openai']);
    expect(data.config.sources.map(s => s.name)[0]).toBe('Wikipedia');
    expect(data.policy.rules[0]?.id).toBe('business-trends');
    expect(data.users).toHaveLength(5);
  });

  it('lets the environment override port, host and API key', () => {
    const data = loadData(dir, { PORT: '8080', HOST: '127.0.0.1', OPENAI_API_KEY: 'test-secret' });

    expect(data.config.server).toEqual({ port: 8080, host: '127.0.0.1' });
    const openai = data.config.llm.providers.find(p => p.type === 'openai');
    expect(openai?.type === 'openai' ? openai.apiKey : undefined).toBe('test-secret');
  });

  it('ignores a PORT that is not a number', () => {
    expect(loadData(dir, { PORT: 'abc' }).config.server.port).toBe(5000);
  });

  it('fills defaults for an empty config', () => {
    writeFileSync(join(dir, 'config.yaml'), '');
    const { config } = loadData(dir, {});

    expect(config.server).toEqual({ port: 5000, host: '0.0.0.0' });
    expect(config.llm.providers).toEqual([{ type: 'ollama' }]);
    expect(config.llm.historyTurns).toBe(6);
    expect(config.session).toEqual({ cookieName: 'personachat_session', ttlMinutes: 480 });
    expect(config.historyFile).toBe('chat-history.json');
  });

  it('rejects a personas file with a label missing', () => {
    writeFileSync(join(dir, 'personas.yaml'), [
      'Executive:',
      '  description: Leader',
      '  instruction: Be brief.',
      '  suggestedQuestions: [Why?]',
    ].join('\n'));

    expect(() => loadData(dir, {})).toThrow(ConfigurationError);
    expect(() => loadData(dir, {})).toThrow(/Missing persona: General/);
  });

  it('rejects unknown persona labels', () => {
    writeFileSync(join(dir, 'users.json'), JSON.stringify([
      { id: '9', email: 'x@example.com', passwordHash: 'scrypt:00:00', persona: 'Wizard' },
    ]));

    expect(() => loadData(dir, {})).toThrow(/users\.json: 0\.persona/);
  });

  it('names the file with a YAML syntax error', () => {
    writeFileSync(join(dir, 'query-rules.yaml'), 'rules: [unclosed\n');
    expect(() => loadData(dir, {})).toThrow(/^Invalid .*query-rules\.yaml: /);
  });

  it('fails when config.yaml is missing', () => {
    unlinkSync(join(dir, 'config.yaml'));
    expect(() => loadData(dir, {})).toThrow(/Config not found/);
  });

  it('runs without rules or users', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    unlinkSync(join(dir, 'query-rules.yaml'));
    unlinkSync(join(dir, 'users.json'));

    const data = loadData(dir, {});
    expect(data.policy).toEqual({ rules: [], stopWords: [] });
    expect(data.users).toEqual([]);
    expect(console.warn).toHaveBeenCalledOnce();
  });
});
