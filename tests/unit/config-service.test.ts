jest.mock('../../src/observability/logger', () => {
  const log = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn(), child: jest.fn() };
  log.child.mockReturnValue(log);
  return { logger: log, childLogger: () => log };
});

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigService } from '../../src/config/config-service';
import { ConfigError } from '../../src/assignment/errors';
import { CONFIG_DIR } from '../helpers/builders';

describe('ConfigService', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'allocator-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(taxonomy: string, rules: string): void {
    fs.writeFileSync(path.join(tmpDir, 'skill-taxonomy.yaml'), taxonomy);
    fs.writeFileSync(path.join(tmpDir, 'priority-rules.yaml'), rules);
  }

  const validRules = [
    'version: 1',
    'defaultScore: 6',
    'tiers:',
    '  - name: critical',
    '    score: 10',
    '    cues: [outage]',
  ].join('\n');

  it('should load the bundled configuration', () => {
    const config = new ConfigService(CONFIG_DIR);
    expect(Object.keys(config.getTaxonomy())).toHaveLength(41);
    expect(config.getTaxonomy().Networking).toContain('router');
    expect(config.getPriorityRules().defaultScore).toBe(6);
    expect(config.getPriorityRules().tiers.map((t) => [t.name, t.score])).toEqual([
      ['critical', 10],
      ['high', 8],
      ['medium', 5],
      ['low', 2],
    ]);
  });

  it('should keep numeric terms as strings', () => {
    const config = new ConfigService(CONFIG_DIR);
    expect(config.getTaxonomy().Web_Server_Apache_Nginx).toEqual(['website', 'web server', '502', '500', '404']);
  });

  it('should fail on a missing directory', () => {
    expect(() => new ConfigService(path.join(tmpDir, 'missing'))).toThrow(ConfigError);
  });

  it('should fail on a taxonomy without categories', () => {
    writeConfig('version: 1\ncategories: {}\n', validRules);
    expect(() => new ConfigService(tmpDir)).toThrow(/Invalid configuration/);
  });

  it('should fail on an unknown tier name', () => {
    writeConfig('version: 1\ncategories:\n  printing: [printer]\n', validRules.replace('critical', 'blocker'));
    expect(() => new ConfigService(tmpDir)).toThrow(ConfigError);
  });

  it('should fail on malformed YAML', () => {
    writeConfig('categories: [unclosed', validRules);
    expect(() => new ConfigService(tmpDir)).toThrow(ConfigError);
  });

  it('should pick up changes on reload', () => {
    writeConfig('version: 1\ncategories:\n  printing: [printer]\n', validRules);
    const config = new ConfigService(tmpDir);
    expect(Object.keys(config.getTaxonomy())).toEqual(['printing']);

    writeConfig('version: 1\ncategories:\n  printing: [printer]\n  voip: [phone]\n', validRules);
    config.loadAll();
    expect(Object.keys(config.getTaxonomy())).toEqual(['printing', 'voip']);
  });
});
