import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Command } from 'commander';
import { createCLI, getGlobalOptions } from '../cli.js';

function configCommandOf(program: Command): Command {
  const config = program.commands.find((c) => c.name() === 'config');
  if (!config) {
    throw new Error('config command missing');
  }
  return config;
}

describe('createCLI', () => {
  it('should register the commands', () => {
    const program = createCLI();
    expect(program.name()).toBe('idlestop');
    expect(program.commands.map((c) => c.name())).toEqual(['ping', 'status', 'config']);
  });

  it('should default the ping source to cli', () => {
    const ping = createCLI().commands.find((c) => c.name() === 'ping');
    expect(ping?.opts()).toEqual({ source: 'cli' });
  });
});

describe('getGlobalOptions', () => {
  it('should read options from the root command', () => {
    const program = createCLI();
    program.parseOptions(['--json', '--config', '/tmp/idlestop.json']);

    expect(getGlobalOptions(configCommandOf(program))).toEqual({
      json: true,
      config: '/tmp/idlestop.json',
      quiet: undefined,
    });
  });

  describe('outputFormat from the config file', () => {
    let dir: string;
    let configPath: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'idlestop-cli-'));
      configPath = join(dir, 'config.json');
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should switch to JSON output when outputFormat is json', () => {
      writeFileSync(configPath, JSON.stringify({ outputFormat: 'json' }));
      const program = createCLI();
      program.parseOptions(['--config', configPath]);

      expect(getGlobalOptions(configCommandOf(program)).json).toBe(true);
    });

    it('should keep table output when outputFormat is table', () => {
      writeFileSync(configPath, JSON.stringify({ outputFormat: 'table' }));
      const program = createCLI();
      program.parseOptions(['--config', configPath]);

      expect(getGlobalOptions(configCommandOf(program)).json).toBe(false);
    });
  });
});
