import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { Document, DocumentSource } from '../ports/DocumentSource';
import { IngestionError, getErrorMessage } from '../errors';
import { Logger, silentLogger } from '../utils/logger';

const ALLOWED_EXT = new Set(['.txt', '.md']);

export function sanitizeText(text: string): string {
  return text
    .replace(/^\uFEFF/, '') // Remove byte order mark
    .replace(/\r\n?/g, '\n')
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control characters except tab and newline
    .replace(/\uFFFD/g, ''); // Remove replacement characters
}

/** Every .txt and .md file under a directory is one document, named by its relative path. */
export class FileSystemDocumentSource implements DocumentSource {
  constructor(private readonly rootDir: string, private readonly logger: Logger = silentLogger) {}

  private async listFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.listFiles(fullPath)));
      } else if (entry.isFile() && ALLOWED_EXT.has(path.extname(entry.name).toLowerCase())) {
        files.push(fullPath);
      }
    }
    return files;
  }

  async load(): Promise<Document[]> {
    const rootDir = path.normalize(this.rootDir.trim());

    let stats;
    try {
      stats = await fs.stat(rootDir);
    } catch {
      this.logger.warn(`⚠️  Documents directory ${rootDir} does not exist; starting with an empty knowledge base`);
      return [];
    }
    if (!stats.isDirectory()) {
      throw new IngestionError(`Documents path is not a directory: ${rootDir}`);
    }

    let files: string[];
    try {
      files = await this.listFiles(rootDir);
    } catch (error) {
      throw new IngestionError(`Cannot list documents in ${rootDir}: ${getErrorMessage(error)}`, error);
    }

    const documents: Document[] = [];
    for (const filePath of files) {
      const id = path.relative(rootDir, filePath).split(path.sep).join('/');
      let raw: string;
      try {
        raw = await fs.readFile(filePath, 'utf8');
      } catch (error) {
        throw new IngestionError(`Cannot read document ${id}: ${getErrorMessage(error)}`, error);
      }
      const text = sanitizeText(raw);
      if (!text.trim()) {
        this.logger.warn(`⚠️  Skipping empty document: ${id}`);
        continue;
      }
      this.logger.debug(`📝 Read ${text.length} characters from ${id}`);
      documents.push({ id, text });
    }

    return documents.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }
}
