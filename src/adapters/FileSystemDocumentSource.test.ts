import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileSystemDocumentSource, sanitizeText } from './FileSystemDocumentSource';
import { IngestionError } from '../errors';

describe('sanitizeText', () => {
  it('normalizes line endings and strips control characters', () => {
    expect(sanitizeText('\uFEFFLine one\r\nLine\u0000 two\rLine\tthree\uFFFD')).toBe('Line one\nLine two\nLine\tthree');
  });
});

describe('FileSystemDocumentSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'policy-docs-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads text and markdown files named by their relative path', async () => {
    await fs.mkdir(path.join(dir, 'it'));
    await fs.writeFile(path.join(dir, 'vacation.txt'), 'Employees receive 25 vacation days per year.\r\n');
    await fs.writeFile(path.join(dir, 'it', 'security.MD'), '# Security\n\nUse MFA.');
    await fs.writeFile(path.join(dir, 'scan.pdf'), '%PDF-1.4');
    await fs.writeFile(path.join(dir, 'blank.txt'), '  \n');

    const documents = await new FileSystemDocumentSource(dir).load();

    expect(documents).toEqual([
      { id: 'it/security.MD', text: '# Security\n\nUse MFA.' },
      { id: 'vacation.txt', text: 'Employees receive 25 vacation days per year.\n' },
    ]);
  });

  it('returns no documents when the directory does not exist', async () => {
    expect(await new FileSystemDocumentSource(path.join(dir, 'missing')).load()).toEqual([]);
  });

  it('refuses a path that is not a directory', async () => {
    const file = path.join(dir, 'policy.txt');
    await fs.writeFile(file, 'text');

    await expect(new FileSystemDocumentSource(file).load()).rejects.toBeInstanceOf(IngestionError);
  });
});
