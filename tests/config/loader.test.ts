/**
 * Configuration Loader Tests
 */

import fs from 'fs';
import path from 'path';

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';

import { ConfigLoader } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/utils/types.js';
import { createTempDir, removeTempDir } from '../helpers/fixtures.js';

const ENV_KEYS = [
  'PORT',
  'HOST',
  'CATALOG_PATH',
  'PIPELINE_MAX_ATTEMPTS',
  'PIPELINE_PII_ENABLED',
  'PIPELINE_MASKED_COLUMNS',
  'CONVERSATION_STORE',
  'LOG_LEVEL',
  'LLM_TEMPERATURE',
];

describe('ConfigLoader', () => {
  let dir: string;
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    dir = createTempDir();
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    removeTempDir(dir);
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  function writeConfig(name: string, content: string): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it('uses defaults when the file is missing', async () => {
    const config = await new ConfigLoader(path.join(dir, 'missing.yaml')).load();

    expect(config.server).toEqual({ port: 8000, host: '0.0.0.0', nodeEnv: 'test' });
    expect(config.catalog.path).toBe('./data/schema/catalog.json');
    expect(config.catalog.fullDumpTokenThreshold).toBe(30000);
    expect(config.pipeline.maxAttempts).toBe(3);
    expect(config.pipeline.summaryRowCap).toBe(20);
    expect(config.pipeline.maskedColumns).toEqual([]);
    expect(config.conversation).toEqual({ store: 'memory', windowTurns: 5, retentionTurns: 200 });
    expect(config.databases.attachments).toEqual([]);
  });

  it('treats an empty file as defaults', async () => {
    const config = await new ConfigLoader(writeConfig('empty.yaml', '')).load();

    expect(config.server.port).toBe(8000);
  });

  it('reads values from a YAML file', async () => {
    const filePath = writeConfig(
      'querywise.yaml',
      [
        'server:',
        '  port: 9100',
        'databases:',
        '  directory: ./dbs',
        '  attachments:',
        '    - alias: crew_management',
        '      file: crew.db',
        'pipeline:',
        '  maxAttempts: 2',
        '',
      ].join('\n')
    );

    const loader = new ConfigLoader(filePath);
    const config = await loader.load();

    expect(config.server.port).toBe(9100);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.databases.directory).toBe('./dbs');
    expect(config.databases.attachments).toEqual([{ alias: 'crew_management', file: 'crew.db' }]);
    expect(config.pipeline.maxAttempts).toBe(2);
    expect(config.pipeline.rowCap).toBe(500);
    expect(config.configFilePath).toBe(filePath);
    expect(loader.getConfig()).toBe(config);
  });

  it('reads a JSON file', async () => {
    const config = await new ConfigLoader(
      writeConfig('querywise.json', JSON.stringify({ catalog: { topK: 8 } }))
    ).load();

    expect(config.catalog.topK).toBe(8);
  });

  it('lets environment variables override the file', async () => {
    const filePath = writeConfig('querywise.yaml', 'server:\n  port: 9100\npipeline:\n  piiEnabled: true\n');
    process.env['PORT'] = '9200';
    process.env['PIPELINE_PII_ENABLED'] = 'false';
    process.env['CONVERSATION_STORE'] = 'POSTGRES';
    process.env['LLM_TEMPERATURE'] = '0.4';

    const config = await new ConfigLoader(filePath).load();

    expect(config.server.port).toBe(9200);
    expect(config.pipeline.piiEnabled).toBe(false);
    expect(config.conversation.store).toBe('postgres');
    expect(config.llm.temperature).toBe(0.4);
  });

  it('reads masked columns from the file and from a comma-separated variable', async () => {
    const filePath = writeConfig(
      'querywise.yaml',
      'pipeline:\n  maskedColumns:\n    - hr_payroll.employees.ssn\n'
    );

    expect((await new ConfigLoader(filePath).load()).pipeline.maskedColumns).toEqual(['hr_payroll.employees.ssn']);

    process.env['PIPELINE_MASKED_COLUMNS'] = 'ssn, salary,';
    expect((await new ConfigLoader(filePath).load()).pipeline.maskedColumns).toEqual(['ssn', 'salary']);
  });

  it('ignores invalid environment values', async () => {
    process.env['PIPELINE_MAX_ATTEMPTS'] = 'three';
    process.env['LOG_LEVEL'] = 'verbose';

    const config = await new ConfigLoader(path.join(dir, 'missing.yaml')).load();

    expect(config.pipeline.maxAttempts).toBe(3);
    expect(config.logging.level).toBe('info');
  });

  it('rejects values outside their range', async () => {
    const filePath = writeConfig('bad.yaml', 'pipeline:\n  maxAttempts: 0\n');

    await expect(new ConfigLoader(filePath).load()).rejects.toThrow(
      `Invalid configuration in ${filePath}: pipeline.maxAttempts: Number must be greater than or equal to 1`
    );
  });

  it('rejects duplicate database aliases', async () => {
    const filePath = writeConfig(
      'dupes.yaml',
      [
        'databases:',
        '  attachments:',
        '    - alias: crew',
        '      file: a.db',
        '    - alias: CREW',
        '      file: b.db',
        '',
      ].join('\n')
    );

    await expect(new ConfigLoader(filePath).load()).rejects.toThrow(
      'databases.attachments: database aliases must be unique'
    );
  });

  it('wraps parse failures in a ConfigurationError', async () => {
    const filePath = writeConfig('broken.json', '{"server":');

    await expect(new ConfigLoader(filePath).load()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects unsupported file formats', async () => {
    const filePath = writeConfig('querywise.toml', 'port = 1');

    await expect(new ConfigLoader(filePath).load()).rejects.toThrow(
      `Failed to parse ${filePath}: Unsupported config file format: .toml`
    );
  });

  it('refuses access before load', () => {
    expect(() => new ConfigLoader(path.join(dir, 'missing.yaml')).getConfig()).toThrow(
      'Configuration not loaded. Call load() first.'
    );
  });
});
