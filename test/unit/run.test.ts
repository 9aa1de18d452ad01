import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { runCli, type CliStreams } from '../../src/run.js';
import { createTempWorkspace, failingFileSystem, listTree, removeTempWorkspace } from '../helpers/workspace.js';

describe('runCli', () => {
  let cwd: string;
  let out: string[];
  let err: string[];
  let streams: CliStreams;

  beforeEach(() => {
    cwd = createTempWorkspace();
    out = [];
    err = [];
    streams = {
      out: (line) => out.push(line),
      err: (line) => err.push(line)
    };
  });

  afterEach(() => {
    removeTempWorkspace(cwd);
    vi.restoreAllMocks();
  });

  it('exits 0 and lists the created entries', async () => {
    const code = await runCli(['nav_stack'], { cwd, env: {}, streams });

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toEqual([
      'Package nav_stack created successfully',
      ' + nav_stack/',
      ' + nav_stack/src/',
      ' + nav_stack/include/',
      ' + nav_stack/config/',
      ' + nav_stack/launch/',
      ' + nav_stack/logs/',
      ' + nav_stack/Makefile',
      ' + nav_stack/README.md'
    ]);
  });

  it.each([[[]], [['a', 'b']]])('prints usage for %j', async (args) => {
    const code = await runCli(args, { cwd, env: {}, streams });

    expect(code).toBe(1);
    expect(err[1]).toBe('Usage: pkg-create <package_name>');
    expect(out).toEqual([]);
    expect(listTree(cwd)).toEqual([]);
  });

  it('reports a missing parameter', async () => {
    await runCli([], { cwd, env: {}, streams });

    expect(err).toEqual(['ERR: Missing parameters', 'Usage: pkg-create <package_name>']);
  });

  it('exits 1 when the package already exists', async () => {
    mkdirSync(join(cwd, 'nav_stack'));

    const code = await runCli(['nav_stack'], { cwd, env: {}, streams });

    expect(code).toBe(1);
    expect(err).toEqual(['ERR: Package nav_stack already exists']);
    expect(listTree(cwd)).toEqual(['nav_stack/']);
  });

  it('exits 1 on a bad configuration without touching the filesystem', async () => {
    const code = await runCli(['nav_stack'], {
      cwd,
      env: { PKG_CREATE_NAME_POLICY: 'kebab' },
      streams
    });

    expect(code).toBe(1);
    expect(err).toEqual(['ERR: INVALID CONFIG: PKG_CREATE_NAME_POLICY=kebab\nExpected one of: any, snake_case']);
    expect(listTree(cwd)).toEqual([]);
  });

  it('exits 1 and rolls back when creation fails', async () => {
    const code = await runCli(['nav_stack'], {
      cwd,
      env: {},
      streams,
      fileSystem: failingFileSystem('nav_stack/config')
    });

    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^ERR: Failed to create directory nav_stack\/config: EACCES/);
    expect(existsSync(join(cwd, 'nav_stack'))).toBe(false);
  });

  it('honours the build file setting', async () => {
    const code = await runCli(['nav_stack'], {
      cwd,
      env: { PKG_CREATE_BUILD_FILE: 'CMakeLists.txt' },
      streams
    });

    expect(code).toBe(0);
    expect(out).toContain(' + nav_stack/CMakeLists.txt');
    expect(existsSync(join(cwd, 'nav_stack', 'Makefile'))).toBe(false);
  });

  it('turns on logging when a level is set', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await runCli(['nav_stack'], { cwd, env: { PKG_CREATE_LOG_LEVEL: 'info' }, streams });

    expect(log).toHaveBeenCalledWith(expect.stringContaining('[INFO] Package created {"package":"nav_stack","entries":8}'));

    log.mockClear();
    await runCli(['other_stack'], { cwd, env: {}, streams });
    expect(log).not.toHaveBeenCalled();
  });
});
