import * as fs from 'fs';
import * as path from 'path';

/**
 * Domain Purity Test
 *
 * src/domain/ holds only pure computation and types. Files there must not
 * import I/O, framework or wiring code (logger, container, services,
 * modules, pg, redis, express).
 */

const DOMAIN_DIR = path.resolve(__dirname, '..');
const FORBIDDEN_MODULES = [
  /['"].*logger/,
  /['"].*container/,
  /['"].*services/,
  /['"].*modules\//,
  /['"].*\/db\//,
  /['"].*config\//,
  /['"]pg['"]/,
  /['"]ioredis['"]/,
  /['"]express['"]/,
];

function getAllTsFiles(dir: string): string[] {
  const files: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === '__tests__' || entry.name === 'node_modules') continue;
      files.push(...getAllTsFiles(fullPath));
    } else if (entry.name.endsWith('.ts') && !entry.name.endsWith('.test.ts')) {
      files.push(fullPath);
    }
  }

  return files;
}

function isImportLine(line: string): boolean {
  return /^\s*(import|export)\b.*['"]/.test(line) || /^\s*}\s*from\s+['"]/.test(line);
}

describe('Domain purity', () => {
  it('finds domain source files to check', () => {
    expect(getAllTsFiles(DOMAIN_DIR).length).toBeGreaterThan(0);
  });

  it('should not contain impure imports in src/domain/', () => {
    const violations: string[] = [];

    for (const filePath of getAllTsFiles(DOMAIN_DIR)) {
      const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
      const relativePath = path.relative(DOMAIN_DIR, filePath);

      lines.forEach((line, i) => {
        if (!isImportLine(line)) return;
        if (FORBIDDEN_MODULES.some((pattern) => pattern.test(line))) {
          violations.push(`${relativePath}:${i + 1}: ${line.trim()}`);
        }
      });
    }

    expect(violations).toEqual([]);
  });
});
