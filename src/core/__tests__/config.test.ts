import fs from 'fs';
import os from 'os';
import path from 'path';
import { getModuleFlags } from '../../config/modules';
import { loadRouterConfig, parseRouterConfig } from '../config';
import { ConfigError } from '../errors';

describe('router config', () => {
  it('fills defaults', () => {
    const c = parseRouterConfig({});
    expect(c.lang).toBe('en-us');
    expect(c.fallback_mode).toBe('accept_all');
    expect(c.discovery_timeout).toBe(500);
    expect(c.discovery_poll_interval).toBe(20);
    expect(c.per_handler_timeout).toBe(3000);
    expect(c.legacy_timeout).toBe(10_000);
  });

  it('rejects out-of-range override priorities with a ConfigError', () => {
    expect(() => parseRouterConfig({ fallback_priorities: { x: 150 } })).toThrow(ConfigError);
    expect(() => parseRouterConfig({ fallback_priorities: { x: 0 } })).toThrow(ConfigError);
  });

  it('names every invalid field', () => {
    try {
      parseRouterConfig({ fallback_mode: 'sometimes', discovery_timeout: -1 });
      throw new Error('expected a ConfigError');
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) {
        expect(e.issues.map((i) => i.split(':')[0])).toEqual(['fallback_mode', 'discovery_timeout']);
      }
    }
  });

  it('overlays env overrides on the file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'router-config-'));
    const file = path.join(dir, 'router.json');
    fs.writeFileSync(file, JSON.stringify({ lang: 'en-us', fallback_priorities: { wiki: 50 }, legacy_timeout: 2000 }));

    const c = loadRouterConfig(file, {
      SECONDARY_LANGS: 'pt-pt, de-de',
      FALLBACK_MODE: 'WHITELIST',
      FALLBACK_PRIORITIES: 'weather:3,chat:95',
    });

    expect(c.secondary_langs).toEqual(['pt-pt', 'de-de']);
    expect(c.fallback_mode).toBe('whitelist');
    expect(c.fallback_priorities).toEqual({ weather: 3, chat: 95 });
    expect(c.legacy_timeout).toBe(2000);
  });

  it('reports an unreadable file', () => {
    expect(() => loadRouterConfig('/nonexistent/router.json', {})).toThrow(ConfigError);
  });
});

describe('stage flags', () => {
  it('are all on by default and follow MOD_* env switches', () => {
    const flags = getModuleFlags({}, { MOD_COMMON_QA: '0', MOD_FALLBACK: 'true' });
    expect(flags).toEqual({ converse: true, keyword: true, statistical: true, common_qa: false, fallback: true });
  });
});
