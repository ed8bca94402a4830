// src/__tests__/ext/configs.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import {
  MemoryConfigStore,
  createConfigsManager,
  fromConfigItem,
  parseConfigPath,
  toConfigItem,
} from '../../ext/configs.js';
import { Manager } from '../../core/manager.js';
import { CommandError } from '../../utils/errors.js';
import { createMemoryIO } from '../mocks/memory-io.js';

describe('config paths and items', () => {
  it('should split namespaced and bare paths', () => {
    expect(parseConfigPath('db.host')).toEqual({ namespace: 'db', key: 'host' });
    expect(parseConfigPath('motd')).toEqual({ namespace: 'all', key: 'motd' });
  });

  it('should reject deeper paths', () => {
    expect(() => parseConfigPath('a.b.c')).toThrow(CommandError);
  });

  it('should store one attribute per line', () => {
    expect(toConfigItem('one\ntwo')).toEqual({ '000': 'one', '001': 'two' });
  });

  it('should join lines in attribute order', () => {
    const item = { '001': 'two', '000': 'one' };

    expect(fromConfigItem(item)).toBe('one\ntwo');
    expect(fromConfigItem(item, true)).toBe('one');
  });
});

describe('createConfigsManager', () => {
  let store: MemoryConfigStore;
  let configs: Manager;

  async function run(...argv: string[]) {
    const io = createMemoryIO();
    const status = await configs.main(argv, io);
    return { status, stdout: io.stdout.text, stderr: io.stderr.text };
  }

  beforeEach(() => {
    store = new MemoryConfigStore();
    configs = createConfigsManager(store, { name: 'configs' });
  });

  it('should register the config commands', () => {
    expect(Array.from(configs.commands.keys()).sort()).toEqual(['delete', 'get', 'list', 'reset', 'set']);
    expect(configs.get('list')?.description).toBe('Lists all config paths.');
  });

  it('should set and get a value', async () => {
    await expect(run('set', 'db.host', 'localhost')).resolves.toEqual({ status: 0, stdout: 'OK\n', stderr: '' });

    expect(await store.getItem('db', 'host')).toEqual({ '000': 'localhost' });
    await expect(run('get', 'db.host')).resolves.toMatchObject({ status: 0, stdout: 'localhost\n' });
  });

  it('should replace a value with fewer lines', async () => {
    await run('set', 'motd', 'line one\nline two');
    await run('set', 'motd', 'short');

    expect(await store.getItem('all', 'motd')).toEqual({ '000': 'short' });
  });

  it('should report unknown keys and invalid paths', async () => {
    await expect(run('get', 'db.none')).resolves.toEqual({ status: 1, stdout: '', stderr: 'Invalid key db.none\n' });
    await expect(run('get', 'a.b.c')).resolves.toMatchObject({ status: 1, stderr: 'Invalid key path: a.b.c\n' });
  });

  it('should delete a value', async () => {
    await run('set', 'db.host', 'localhost');

    await expect(run('delete', 'db.host')).resolves.toMatchObject({ status: 0, stdout: 'OK\n' });
    expect(await store.getItem('db', 'host')).toBeUndefined();
    await expect(run('delete', 'db.host')).resolves.toMatchObject({ status: 1 });
  });

  describe('list', () => {
    beforeEach(async () => {
      await run('set', 'db.host', 'localhost');
      await run('set', 'motd', 'line one\nline two');
      await run('set', 'cache.ttl', '60');
    });

    it('should list every path by its first line', async () => {
      const { stdout } = await run('list');

      expect(stdout).toBe('motd: line one\ncache.ttl: 60\ndb.host: localhost\n');
    });

    it('should list one namespace together with the default one', async () => {
      const { stdout } = await run('list', '--namespace', 'db');

      expect(stdout).toBe('motd: line one\nhost: localhost\n');
    });

    it('should show whole values with --expand', async () => {
      const { stdout } = await run('list', '--namespace', 'cache', '--expand');

      expect(stdout).toBe('motd: line one\nline two\nttl: 60\n');
    });
  });

  it('should reset every namespace', async () => {
    await run('set', 'db.host', 'localhost');

    await expect(run('reset')).resolves.toEqual({ status: 0, stdout: '', stderr: '' });
    expect(await store.namespaces()).toEqual([]);
  });

  it('should work merged into another manager', async () => {
    const app = new Manager({ name: 'tool' });
    app.merge(configs, 'configs');
    const io = createMemoryIO();

    await app.main(['configs.set', 'region', 'eu'], io);

    expect(io.stdout.text).toBe('OK\n');
    expect(await store.getItem('all', 'region')).toEqual({ '000': 'eu' });
  });
});
