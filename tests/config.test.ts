import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { ConfigError, DEFAULT_CONFIG, findEnvFile, loadConfig, parseEnvFile } from '../src/config';

describe('parseEnvFile', () => {
  it('should read KEY=value lines', () => {
    expect(parseEnvFile('WECHAT_APPID=wx-test\nWECHAT_APP_SECRET=test-secret\n')).toEqual({
      WECHAT_APPID: 'wx-test',
      WECHAT_APP_SECRET: 'test-secret',
    });
  });

  it('should skip blank lines, comments and lines without a key', () => {
    expect(parseEnvFile('\n# comment\n  \n=orphan\nNOEQUALS\nA=1\r\n')).toEqual({ A: '1' });
  });

  it('should handle export prefixes, quotes and trailing comments', () => {
    const content = [
      'export A=plain',
      'B="quoted # not a comment"',
      "C='single'",
      'D=value # trailing',
      'E=a=b',
      'F=',
    ].join('\n');

    expect(parseEnvFile(content)).toEqual({
      A: 'plain',
      B: 'quoted # not a comment',
      C: 'single',
      D: 'value',
      E: 'a=b',
      F: '',
    });
  });
});

describe('config files', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'wechat-config-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function writeEnv(dir: string, content: string): string {
    const file = path.join(dir, '.env');
    fs.writeFileSync(file, content);
    return file;
  }

  describe('findEnvFile', () => {
    it('should find the nearest .env above the start directory', () => {
      const deep = path.join(root, 'a', 'b', 'c');
      fs.mkdirSync(deep, { recursive: true });
      const file = writeEnv(root, 'A=1');
      writeEnv(path.join(root, 'a', 'b'), 'A=2');

      expect(findEnvFile(deep)).toBe(path.join(root, 'a', 'b', '.env'));
      fs.rmSync(path.join(root, 'a', 'b', '.env'));
      expect(findEnvFile(deep)).toBe(file);
    });

    it('should stop after the given number of parents', () => {
      const deep = path.join(root, 'a', 'b', 'c');
      fs.mkdirSync(deep, { recursive: true });
      writeEnv(root, 'A=1');

      expect(findEnvFile(deep, 1)).toBeUndefined();
    });
  });

  describe('loadConfig', () => {
    it('should read credentials from a .env file and apply defaults', () => {
      const envFile = writeEnv(root, 'WECHAT_APPID=wx-test\nWECHAT_APP_SECRET=test-secret\n');

      expect(loadConfig({ env: {}, envFile })).toEqual({
        appId: 'wx-test',
        appSecret: 'test-secret',
        theme: DEFAULT_CONFIG.theme,
        mode: 'news',
      });
    });

    it('should search for .env from cwd', () => {
      const cwd = path.join(root, 'project');
      fs.mkdirSync(cwd);
      writeEnv(cwd, 'WECHAT_APPID=wx-test\nWECHAT_APP_SECRET=test-secret\nWECHAT_THEME=tech\n');

      expect(loadConfig({ env: {}, cwd })).toMatchObject({ appId: 'wx-test', theme: 'tech' });
    });

    it('should let the environment override the file', () => {
      const envFile = writeEnv(root, 'WECHAT_APPID=wx-file\nWECHAT_APP_SECRET=test-secret\nWECHAT_MODE=news\n');

      const config = loadConfig({
        env: { WECHAT_APPID: ' wx-env ', WECHAT_MODE: 'newspic', WECHAT_AUTHOR: 'Ann' },
        envFile,
      });

      expect(config).toEqual({
        appId: 'wx-env',
        appSecret: 'test-secret',
        theme: 'academic_gray',
        mode: 'newspic',
        author: 'Ann',
      });
    });

    it('should report every missing credential', () => {
      const envFile = writeEnv(root, '');
      expect(() => loadConfig({ env: {}, envFile })).toThrow(
        new ConfigError('Missing WECHAT_APPID and WECHAT_APP_SECRET (environment or .env file)'),
      );
      expect(() => loadConfig({ env: { WECHAT_APP_SECRET: 'test-secret', WECHAT_APPID: '  ' }, envFile })).toThrow(
        'Missing WECHAT_APPID (environment or .env file)',
      );
    });

    it('should reject unknown themes and modes', () => {
      const envFile = writeEnv(root, 'WECHAT_APPID=wx-test\nWECHAT_APP_SECRET=test-secret\n');

      expect(() => loadConfig({ env: { WECHAT_THEME: 'neon' }, envFile })).toThrow(
        'Unknown theme "neon" in WECHAT_THEME. Available themes: academic_gray, festival, tech, announcement',
      );
      expect(() => loadConfig({ env: { WECHAT_MODE: 'video' }, envFile })).toThrow(
        'Unknown article mode "video" in WECHAT_MODE. Expected "news" or "newspic"',
      );
    });

    it('should throw ConfigError instances', () => {
      const envFile = writeEnv(root, '');
      expect(() => loadConfig({ env: {}, envFile })).toThrow(ConfigError);
    });
  });
});
