import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createPresenceInputRepo } from '@/modules/presence-run/index.js';

const makeTempDir = async (): Promise<string> => {
  return mkdtemp(path.join(tmpdir(), 'presence-input-'));
};

const configYaml = `levels: [0, 1]
countries: ["XYZ"]
location:
  fuzzy:
    metric: edit-distance
    maxDistance: 1
sectors:
  - { code: "HEA", name: "Health", aliases: ["Health cluster"] }
organizations:
  aliases:
    - { id: "care-relief", name: "Care Relief International", acronym: "CRI" }
`;

const rowsJson = JSON.stringify([
  {
    countryCode: 'XYZ',
    locations: ['North'],
    orgName: 'OrgX',
    sector: 'Health',
    provenance: { sourceFile: 'xyz.xlsx', rowNumber: 3 },
  },
]);

const setup = async (config: string, rows: string) => {
  const dir = await makeTempDir();
  const configPath = path.join(dir, 'run.yaml');
  const rowsPath = path.join(dir, 'rows.json');
  await writeFile(configPath, config, 'utf8');
  await writeFile(rowsPath, rows, 'utf8');
  return createPresenceInputRepo({ configPath, rowsPath });
};

describe('fs presence input repo', () => {
  it('loads the run configuration', async () => {
    const repo = await setup(configYaml, rowsJson);

    const config = (await repo.loadConfig())._unsafeUnwrap();

    expect(config.levels).toEqual([0, 1]);
    expect(config.countries).toEqual(['XYZ']);
    expect(config.location?.fuzzy).toEqual({ metric: 'edit-distance', maxDistance: 1 });
    expect(config.sectors[0]?.aliases).toEqual(['Health cluster']);
    expect(config.organizations?.aliases?.[0]?.acronym).toBe('CRI');
  });

  it('accepts an organizations block without aliases', async () => {
    const repo = await setup(
      'sectors:\n  - { code: "HEA", name: "Health" }\norganizations:\n  legalSuffixes: [Ltd]\n',
      rowsJson
    );

    const config = (await repo.loadConfig())._unsafeUnwrap();

    expect(config.organizations).toEqual({ legalSuffixes: ['Ltd'] });
  });

  it('loads the source rows', async () => {
    const repo = await setup(configYaml, rowsJson);

    const rows = (await repo.loadRows())._unsafeUnwrap();

    expect(rows).toHaveLength(1);
    expect(rows[0]?.provenance).toEqual({ sourceFile: 'xyz.xlsx', rowNumber: 3 });
  });

  it('rejects an unknown fuzzy metric', async () => {
    const repo = await setup(
      configYaml.replace('metric: edit-distance', 'metric: soundex'),
      rowsJson
    );

    expect((await repo.loadConfig())._unsafeUnwrapErr().type).toBe('SchemaValidationError');
  });

  it('rejects rows without a sector', async () => {
    const repo = await setup(
      configYaml,
      JSON.stringify([{ countryCode: 'XYZ', locations: [], orgName: 'OrgX' }])
    );

    const error = (await repo.loadRows())._unsafeUnwrapErr();

    expect(error.type).toBe('SchemaValidationError');
    expect(error.path.endsWith('rows.json')).toBe(true);
  });

  it('returns NotFound for a missing configuration', async () => {
    const repo = createPresenceInputRepo({
      configPath: path.join(await makeTempDir(), 'missing.yaml'),
      rowsPath: 'unused.json',
    });

    expect((await repo.loadConfig())._unsafeUnwrapErr().type).toBe('NotFound');
  });
});
