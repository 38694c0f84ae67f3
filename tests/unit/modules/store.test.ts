import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { load } from 'js-yaml';
import { ModuleStore, ORIGIN_FILE, readManifest } from '../../../src/modules/store.js';
import { ValidationError } from '../../../src/errors.js';
import { writeModuleTree } from '../../mocks/modules.js';

describe('module store', () => {
  let root: string;
  let sources: string;
  let store: ModuleStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'skillport-store-test-'));
    sources = join(root, 'sources');
    store = new ModuleStore(join(root, 'modules'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('returns undefined for unknown and invalid names', async () => {
    expect(await store.get('missing')).toBeUndefined();
    expect(await store.get('../escape')).toBeUndefined();
    expect(await store.has('missing')).toBe(false);
  });

  it('stores a module with its origin sidecar', async () => {
    const dir = await writeModuleTree(sources, {
      name: 'git-tools',
      version: '1.2.0',
      skills: [{ name: 'commit-helper', description: 'Writes commit messages' }],
    });

    const module = await store.put(dir, { kind: 'folder', locator: dir });

    expect(module).toEqual({
      name: 'git-tools',
      version: '1.2.0',
      description: undefined,
      skills: ['commit-helper'],
      commands: [],
      origin: { kind: 'folder', locator: dir },
      directory: join(root, 'modules', 'git-tools'),
    });
    expect(await store.get('git-tools')).toEqual(module);
    expect(load(await readFile(join(module.directory, ORIGIN_FILE), 'utf-8'))).toEqual({ kind: 'folder', locator: dir });
  });

  it('does not copy .git directories', async () => {
    const dir = await writeModuleTree(sources, { name: 'm', skills: [{ name: 's', description: 'd' }] });
    await mkdir(join(dir, '.git'));
    await writeFile(join(dir, '.git', 'HEAD'), 'ref');

    const module = await store.put(dir, { kind: 'folder', locator: dir });

    expect(existsSync(join(module.directory, '.git'))).toBe(false);
  });

  it('fully replaces a module on re-put', async () => {
    const v1 = await writeModuleTree(join(sources, 'v1'), {
      name: 'm',
      version: '1.0.0',
      skills: [{ name: 'a', description: 'd' }, { name: 'b', description: 'd' }],
    });
    const v2 = await writeModuleTree(join(sources, 'v2'), {
      name: 'm',
      version: '2.0.0',
      skills: [{ name: 'a', description: 'd' }],
    });

    await store.put(v1, { kind: 'folder', locator: v1 });
    const updated = await store.put(v2, { kind: 'folder', locator: v2 });

    expect(updated.version).toBe('2.0.0');
    expect(existsSync(join(updated.directory, 'b'))).toBe(false);
    expect(await readdir(join(root, 'modules'))).toEqual(['m']);
  });

  it('keeps the previous content when the new tree is invalid', async () => {
    const good = await writeModuleTree(join(sources, 'good'), { name: 'm', version: '1.0.0', skills: [{ name: 's', description: 'd' }] });
    const bad = await writeModuleTree(join(sources, 'bad'), { name: 'm', version: '2.0.0', skills: [{ name: 's' }] });

    await store.put(good, { kind: 'folder', locator: good });
    await expect(store.put(bad, { kind: 'folder', locator: bad })).rejects.toThrow(ValidationError);

    expect((await store.get('m'))?.version).toBe('1.0.0');
    expect(await readdir(join(root, 'modules'))).toEqual(['m']);
  });

  it('rejects a manifest whose name differs from the expected one', async () => {
    const dir = await writeModuleTree(sources, { name: 'actual', skills: [{ name: 's', description: 'd' }] });
    await expect(store.put(dir, { kind: 'folder', locator: dir }, 'wanted'))
      .rejects.toThrow('Fetched module is named "actual", expected "wanted"');
  });

  it('rejects a tree without module.yml', async () => {
    await mkdir(join(sources, 'empty'), { recursive: true });
    await expect(store.put(join(sources, 'empty'), { kind: 'folder', locator: sources }))
      .rejects.toThrow('No module.yml found');
  });

  it('reads a block-style YAML manifest', async () => {
    const dir = join(sources, 'yaml');
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'module.yml'), [
      'name: release',
      'version: 0.3.0',
      'description: Release helpers',
      'commands:',
      '  - tag',
      '',
    ].join('\n'));

    expect(await readManifest(dir)).toEqual({
      name: 'release',
      version: '0.3.0',
      description: 'Release helpers',
      skills: [],
      commands: ['tag'],
    });
  });

  it('rejects a manifest with neither skills nor commands', async () => {
    const dir = join(sources, 'hollow');
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'module.yml'), 'name: hollow\nversion: 1.0.0\n');

    await expect(readManifest(dir)).rejects.toThrow('skills: At least one skill or command is required');
  });

  it('stores commands and loads them in manifest order', async () => {
    const dir = await writeModuleTree(sources, {
      name: 'release',
      skills: [],
      commands: [
        { name: 'tag', description: 'Tag a release', body: 'Tag $ARGUMENTS\n' },
        { name: 'changelog', body: 'Write the changelog.\n' },
      ],
    });

    const module = await store.put(dir, { kind: 'folder', locator: dir });
    const commands = await store.loadCommands(module);

    expect(module.commands).toEqual(['tag', 'changelog']);
    expect(commands.map((command) => [command.name, command.description, command.body])).toEqual([
      ['tag', 'Tag a release', 'Tag $ARGUMENTS\n'],
      ['changelog', '', 'Write the changelog.\n'],
    ]);
  });

  it('rejects a module whose declared command file is missing', async () => {
    const dir = await writeModuleTree(sources, { name: 'm', skills: [{ name: 's', description: 'd' }] });
    await writeFile(join(dir, 'module.yml'), 'name: m\nskills: [s]\ncommands: [ghost]\n');

    await expect(store.put(dir, { kind: 'folder', locator: dir })).rejects.toThrow('Command "ghost" has no file at');
    expect(await store.get('m')).toBeUndefined();
  });

  it('lists modules sorted by name and skips invalid ones', async () => {
    for (const name of ['zeta', 'alpha']) {
      const dir = await writeModuleTree(sources, { name, skills: [{ name: 's', description: 'd' }] });
      await store.put(dir, { kind: 'folder', locator: dir });
    }
    await mkdir(join(root, 'modules', 'broken'));
    await writeFile(join(root, 'modules', 'broken', 'module.yml'), 'name: [unclosed');

    expect((await store.list()).map((module) => module.name)).toEqual(['alpha', 'zeta']);
  });

  it('loads skills in manifest order', async () => {
    const dir = await writeModuleTree(sources, {
      name: 'm',
      skills: [{ name: 'second', description: 'two' }, { name: 'first', description: 'one' }],
    });
    const module = await store.put(dir, { kind: 'folder', locator: dir });

    const skills = await store.loadSkills(module);

    expect(skills.map((skill) => skill.name)).toEqual(['second', 'first']);
  });

  it('removes a module and reports whether it existed', async () => {
    const dir = await writeModuleTree(sources, { name: 'm', skills: [{ name: 's', description: 'd' }] });
    await store.put(dir, { kind: 'folder', locator: dir });

    expect(await store.remove('m')).toBe(true);
    expect(await store.remove('m')).toBe(false);
    expect(await store.get('m')).toBeUndefined();
  });

  it('defaults the origin of a hand-placed module to its own folder', async () => {
    await writeModuleTree(join(root, 'modules'), { name: 'manual', skills: [{ name: 's', description: 'd' }] });
    const module = await store.get('manual');
    expect(module?.origin).toEqual({ kind: 'folder', locator: join(root, 'modules', 'manual') });
  });
});
