import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadCatalogFile, parseCatalog } from '../../src/infra/catalog-file.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

const EXAMPLE_CATALOG = fileURLToPath(new URL('../../catalog.example.json', import.meta.url));

describe('parseCatalog', () => {
  it('fills in defaults', () => {
    const catalog = expectOk(
      parseCatalog('inline', {
        studies: [{ id: 1, title: 'Memory', components: [{ id: 10, title: 'Intro' }] }],
        batches: [{ id: 1, studyId: 1, title: 'Default', allowedWorkerKinds: ['GeneralSingle'] }],
        workers: [{ id: 3, kind: 'PersonalSingle' }],
      }),
      'parsing'
    );

    expect(catalog.studies[0]?.components[0]).toEqual({
      id: 10,
      studyId: 1,
      title: 'Intro',
      active: true,
      reloadable: false,
    });
    expect(catalog.batches[0]).toMatchObject({ active: true, maxTotalWorkers: null });
    expect(catalog.workers[0]).toEqual({ kind: 'PersonalSingle', id: 3, comment: null });
  });

  it('treats missing sections as empty', () => {
    expect(expectOk(parseCatalog('inline', {}), 'parsing')).toEqual({ studies: [], batches: [], workers: [] });
  });

  it('rejects unknown worker kinds', () => {
    const error = expectErr(parseCatalog('inline', { workers: [{ id: 1, kind: 'Robot' }] }), 'parsing');
    expect(error.source).toBe('inline');
    expect(error.issues[0]?.path).toBe('workers.0.kind');
  });

  it('rejects batches of unknown studies and duplicate ids', () => {
    const error = expectErr(
      parseCatalog('inline', {
        studies: [
          {
            id: 1,
            title: 'A',
            components: [
              { id: 10, title: 'x' },
              { id: 10, title: 'y' },
            ],
          },
        ],
        batches: [{ id: 1, studyId: 2, title: 'B', allowedWorkerKinds: [] }],
        workers: [
          { id: 4, kind: 'GeneralMultiple' },
          { id: 4, kind: 'GeneralSingle' },
        ],
      }),
      'parsing'
    );

    expect(error.issues).toEqual([
      { path: 'batches.0.studyId', message: 'Unknown study 2' },
      { path: 'workers.1.id', message: 'Duplicate id 4' },
      { path: 'studies.0.components.1.id', message: 'Duplicate id 10' },
    ]);
  });
});

describe('loadCatalogFile', () => {
  it('loads the example catalog', async () => {
    const catalog = expectOk(await loadCatalogFile(EXAMPLE_CATALOG), 'loading');
    expect(catalog.studies.map((s) => s.components.length)).toEqual([4]);
    expect(catalog.batches.map((b) => b.maxTotalWorkers)).toEqual([null, 50]);
    expect(catalog.workers.map((w) => w.kind)).toEqual([
      'Author',
      'GeneralMultiple',
      'GeneralSingle',
      'PersonalSingle',
      'MTurkSandbox',
    ]);
  });

  it('reports a missing file as a startup failure', async () => {
    const error = expectErr(await loadCatalogFile('/nonexistent/catalog.json'), 'loading');
    expect(error).toMatchObject({
      _tag: 'StartupFailed',
      phase: 'catalog',
      message: "Couldn't read catalog file /nonexistent/catalog.json",
    });
  });
});
