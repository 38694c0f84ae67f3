import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ModuleResolver, type CandidateSelector } from '../../../src/resolver/resolver.js';
import { ModuleStore } from '../../../src/modules/store.js';
import { createSourceFetcher } from '../../../src/fetch/fetcher.js';
import { AmbiguousModuleError, ModuleNotFoundError, ValidationError } from '../../../src/errors.js';
import { writeModuleTree } from '../../mocks/modules.js';
import { createMockCatalog, folderCandidate } from '../../mocks/catalog.js';

describe('module resolver', () => {
  let root: string;
  let fetchTmp: string;
  let store: ModuleStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'skillport-resolver-test-'));
    fetchTmp = join(root, 'tmp');
    await mkdir(fetchTmp);
    store = new ModuleStore(join(root, 'modules'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function source(marketplace: string, version: string): Promise<string> {
    return writeModuleTree(join(root, 'sources', marketplace), {
      name: 'git-tools',
      version,
      skills: [{ name: 'commit-helper', description: 'Writes commit messages' }],
    });
  }

  function resolverWith(catalog = createMockCatalog()): ModuleResolver {
    return new ModuleResolver({ store, catalog, fetcher: createSourceFetcher({ timeoutMs: 1000 }), tmpRoot: fetchTmp });
  }

  it('returns a stored module without consulting catalogs', async () => {
    const dir = await source('local', '1.0.0');
    await store.put(dir, { kind: 'folder', locator: dir });
    const catalog = createMockCatalog();

    const module = await resolverWith(catalog).resolve('git-tools');

    expect(module.version).toBe('1.0.0');
    expect(catalog.lookups).toEqual([]);
  });

  it('raises ModuleNotFoundError when no catalog has it', async () => {
    await expect(resolverWith().resolve('git-tools')).rejects.toThrow(ModuleNotFoundError);
  });

  it('materializes a single catalog candidate into the store', async () => {
    const dir = await source('alpha', '2.0.0');
    const catalog = createMockCatalog([folderCandidate('git-tools', dir, 'alpha', '2.0.0')]);

    const module = await resolverWith(catalog).resolve('git-tools');

    expect(module.version).toBe('2.0.0');
    expect(module.origin).toEqual({ kind: 'folder', locator: dir, marketplace: 'alpha' });
    expect(await store.has('git-tools')).toBe(true);
    expect(await readdir(fetchTmp)).toEqual([]);
  });

  it('surfaces ambiguity instead of picking silently', async () => {
    const a = await source('alpha', '1.0.0');
    const b = await source('beta', '2.0.0');
    const catalog = createMockCatalog([
      folderCandidate('git-tools', a, 'alpha', '1.0.0'),
      folderCandidate('git-tools', b, 'beta', '2.0.0'),
    ]);

    const failure = await resolverWith(catalog).resolve('git-tools').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(AmbiguousModuleError);
    expect(failure).toMatchObject({ candidates: [{ marketplace: 'alpha' }, { marketplace: 'beta' }] });
    expect(await store.has('git-tools')).toBe(false);
  });

  it('uses the selector when several marketplaces match', async () => {
    const a = await source('alpha', '1.0.0');
    const b = await source('beta', '2.0.0');
    const catalog = createMockCatalog([
      folderCandidate('git-tools', a, 'alpha', '1.0.0'),
      folderCandidate('git-tools', b, 'beta', '2.0.0'),
    ]);
    const select = vi.fn<CandidateSelector>(async (candidates) => candidates[1]);

    const module = await resolverWith(catalog).resolve('git-tools', { select });

    expect(select).toHaveBeenCalledTimes(1);
    expect(module.version).toBe('2.0.0');
  });

  it('restricts candidates to the requested marketplace', async () => {
    const a = await source('alpha', '1.0.0');
    const b = await source('beta', '2.0.0');
    const catalog = createMockCatalog([
      folderCandidate('git-tools', a, 'alpha', '1.0.0'),
      folderCandidate('git-tools', b, 'beta', '2.0.0'),
    ]);

    const module = await resolverWith(catalog).resolve('git-tools', { marketplace: 'alpha' });

    expect(module.origin.marketplace).toBe('alpha');
    await expect(resolverWith(catalog).resolve('other-name', { marketplace: 'alpha' })).rejects.toThrow(ModuleNotFoundError);
  });

  it('rejects a marketplace that does not offer the module', async () => {
    const a = await source('alpha', '1.0.0');
    const catalog = createMockCatalog([folderCandidate('git-tools', a, 'alpha')]);

    await expect(resolverWith(catalog).resolve('git-tools', { marketplace: 'beta' }))
      .rejects.toThrow(new ValidationError('Module "git-tools" is not offered by marketplace "beta"'));
  });

  it('adds a module from a source string', async () => {
    const dir = await source('local', '1.0.0');

    const module = await resolverWith().addFromSource(dir);

    expect(module.name).toBe('git-tools');
    expect(module.origin).toEqual({ kind: 'folder', locator: dir });
  });

  it('refreshes a stored module from its origin', async () => {
    const dir = await source('local', '1.0.0');
    const resolver = resolverWith();
    await resolver.addFromSource(dir);
    await writeModuleTree(join(root, 'sources', 'local'), {
      name: 'git-tools',
      version: '1.1.0',
      skills: [{ name: 'commit-helper', description: 'Writes better commit messages' }],
    });

    const refreshed = await resolver.refresh('git-tools');

    expect(refreshed.version).toBe('1.1.0');
    await expect(resolver.refresh('absent')).rejects.toThrow(ModuleNotFoundError);
  });

  it('cleans up the fetch directory when the fetched tree is invalid', async () => {
    const dir = await writeModuleTree(join(root, 'sources', 'bad'), { name: 'broken', skills: [{ name: 's' }] });
    const catalog = createMockCatalog([folderCandidate('broken', dir, 'alpha')]);

    await expect(resolverWith(catalog).resolve('broken')).rejects.toThrow(ValidationError);
    expect(await readdir(fetchTmp)).toEqual([]);
  });
});
