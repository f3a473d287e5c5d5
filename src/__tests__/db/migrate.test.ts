import fs from 'fs';
import os from 'os';
import path from 'path';
import { listMigrationFiles } from '../../db/migrate';

describe('listMigrationFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'migrations-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists numbered SQL files in filename order', () => {
    const names = ['010_add_index.sql', '002_views.sql', '001_tables.sql', 'README.md', 'notes.sql'];
    for (const name of names) {
      fs.writeFileSync(path.join(dir, name), '');
    }

    expect(listMigrationFiles(dir)).toEqual([
      '001_tables.sql',
      '002_views.sql',
      '010_add_index.sql',
    ]);
  });

  it('throws when the directory is missing', () => {
    expect(() => listMigrationFiles(path.join(dir, 'absent'))).toThrow(
      'Migrations directory not found'
    );
  });

  it('finds the bundled schema migration', () => {
    expect(listMigrationFiles()).toContain('001_create_draft_tables.sql');
  });
});
