/**
 * Tests for path resolution.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import {
  getDaylistHome,
  getDataDir,
  getConfigPath,
  getGlobalConfigPath,
  resolveDataPath,
} from '../paths.js';

describe('paths', () => {
  const origHome = process.env['DAYLIST_HOME'];
  const origDir = process.env['DAYLIST_DIR'];

  afterEach(() => {
    if (origHome !== undefined) process.env['DAYLIST_HOME'] = origHome;
    else delete process.env['DAYLIST_HOME'];
    if (origDir !== undefined) process.env['DAYLIST_DIR'] = origDir;
    else delete process.env['DAYLIST_DIR'];
  });

  it('defaults home to ~/.daylist', () => {
    delete process.env['DAYLIST_HOME'];
    expect(getDaylistHome()).toBe(join(homedir(), '.daylist'));
    expect(getGlobalConfigPath()).toBe(join(homedir(), '.daylist', 'config.json'));
  });

  it('respects DAYLIST_HOME', () => {
    process.env['DAYLIST_HOME'] = '/custom/daylist';
    expect(getDaylistHome()).toBe('/custom/daylist');
  });

  it('resolves the data directory against cwd', () => {
    delete process.env['DAYLIST_DIR'];
    expect(getDataDir('/work/project')).toBe(resolve('/work/project', '.daylist'));
    expect(getConfigPath('/work/project')).toBe(join(resolve('/work/project', '.daylist'), 'config.json'));
  });

  it('uses an absolute DAYLIST_DIR as-is and a relative one against cwd', () => {
    process.env['DAYLIST_DIR'] = '/data/tasks';
    expect(getDataDir('/work/project')).toBe('/data/tasks');
    process.env['DAYLIST_DIR'] = 'state';
    expect(getDataDir('/work/project')).toBe(resolve('/work/project', 'state'));
  });

  it('resolves configured paths under the data directory', () => {
    process.env['DAYLIST_DIR'] = '/data/tasks';
    expect(resolveDataPath('tasks.enc')).toBe(join('/data/tasks', 'tasks.enc'));
    expect(resolveDataPath('/abs/tasks.enc')).toBe('/abs/tasks.enc');
  });
});
