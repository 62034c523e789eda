import { describe, it, expect } from 'vitest';
import { parseMigrationFilenames } from '../migrate.js';

describe('parseMigrationFilenames', () => {
  it('keeps .sql files ordered by version', () => {
    expect(parseMigrationFilenames(['010_add_index.sql', 'README.md', '002_b.sql', '001_a.sql'])).toEqual([
      { filename: '001_a.sql', version: 1 },
      { filename: '002_b.sql', version: 2 },
      { filename: '010_add_index.sql', version: 10 },
    ]);
  });

  it('rejects a file without a version prefix', () => {
    expect(() => parseMigrationFilenames(['create_users.sql'])).toThrow(
      'Invalid migration filename: create_users.sql'
    );
  });
});
