import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadModelsConfig, parseModelsConfig } from './config';

describe('loadModelsConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'streamnorm-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, contents: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, contents, 'utf8');
    return filePath;
  }

  it('reads YAML and substitutes environment variables', () => {
    const filePath = writeConfig(
      'models.yaml',
      [
        'defaultModel: fast',
        'models:',
        '  - callName: main',
        '    name: glm-4.6',
        '    apiBase: "${LLM_BASE}/v1"',
        '    apiKey: "${LLM_KEY}"',
        '    adapter: glm',
        '    maxTokens: 2048',
        '  - callName: fast',
        '    name: qwen2.5-7b',
        '    apiBase: http://localhost:8001/v1',
        '    headers:',
        '      X-Team: research',
        '',
      ].join('\n'),
    );

    const config = loadModelsConfig(filePath, {
      LLM_BASE: 'http://localhost:8000',
      LLM_KEY: 'test-secret',
    });

    expect(config).toEqual({
      defaultModel: 'fast',
      models: [
        {
          callName: 'main',
          name: 'glm-4.6',
          apiBase: 'http://localhost:8000/v1',
          apiKey: 'test-secret',
          adapter: 'glm',
          maxTokens: 2048,
        },
        {
          callName: 'fast',
          name: 'qwen2.5-7b',
          apiBase: 'http://localhost:8001/v1',
          headers: { 'X-Team': 'research' },
        },
      ],
    });
  });

  it('reads JSON files', () => {
    const filePath = writeConfig(
      'models.json',
      JSON.stringify({ models: [{ callName: 'main', name: 'gpt-4o-mini', apiBase: 'http://localhost:9000/v1' }] }),
    );

    expect(loadModelsConfig(filePath, {}).models.map((model) => model.callName)).toEqual(['main']);
  });

  it('reports a missing file', () => {
    const filePath = path.join(tempDir, 'absent.yaml');
    expect(() => loadModelsConfig(filePath, {})).toThrow(
      `Configuration file not found at ${filePath}`,
    );
  });

  it('reports a file that cannot be parsed', () => {
    const filePath = writeConfig('broken.json', '{ "models": [');
    expect(() => loadModelsConfig(filePath, {})).toThrow(
      `Configuration file at ${filePath} could not be parsed`,
    );
  });
});

describe('parseModelsConfig', () => {
  const model = { callName: 'main', name: 'glm-4.6', apiBase: 'http://localhost:8000/v1' };

  it('rejects a default model that is not configured', () => {
    expect(() => parseModelsConfig({ defaultModel: 'other', models: [model] }, {})).toThrow(
      'Invalid configuration: defaultModel: defaultModel "other" does not name a configured model',
    );
  });

  it('rejects duplicate call names', () => {
    expect(() => parseModelsConfig({ models: [model, { ...model, name: 'glm-4.5' }] }, {})).toThrow(
      'Invalid configuration: models: Duplicate model callName "main"',
    );
  });

  it('rejects unknown adapters and empty model lists', () => {
    expect(() => parseModelsConfig({ models: [{ ...model, adapter: 'llama' }] }, {})).toThrow(
      /^Invalid configuration: models\.0\.adapter: /,
    );
    expect(() => parseModelsConfig({ models: [] }, {})).toThrow(/^Invalid configuration: models: /);
  });

  it('treats an unset variable as empty', () => {
    expect(() =>
      parseModelsConfig({ models: [{ ...model, apiBase: '${MISSING_BASE}' }] }, {}),
    ).toThrow(/^Invalid configuration: models\.0\.apiBase: /);
  });

  it('attaches the zod issues to the error', () => {
    try {
      parseModelsConfig({ models: [{ callName: 'main' }] }, {});
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({ code: 'config_error', details: expect.any(Array) });
    }
  });
});
