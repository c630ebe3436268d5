import { open, readdir, stat } from 'fs/promises';
import { extname, join } from 'path';
import { Injectable } from '@nestjs/common';
import AdmZip from 'adm-zip';
import { describeError } from '../../../common/errors';

export type LogFileKind = 'log' | 'zip';

export interface LogFileInfo {
  path: string;
  name: string;
  kind: LogFileKind;
  modifiedAt: Date;
}

/**
 * Decoded lines of one plain log or one .log member of an archive,
 * or the reason it could not be read. Plain logs are streamed, so a
 * read failure can also surface while iterating `lines`.
 */
export type LogDocument =
  | { source: string; lines: AsyncIterable<string> | Iterable<string> }
  | { source: string; error: string };

const REPLACEMENT_CHARACTER = /\uFFFD/g;

const KIND_BY_EXTENSION: Record<string, LogFileKind> = {
  '.log': 'log',
  '.zip': 'zip',
};

/**
 * UTF-8 decode; undecodable byte sequences are dropped
 */
export function decodeLogBuffer(buffer: Buffer): string {
  return buffer.toString('utf8').replace(REPLACEMENT_CHARACTER, '');
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Line by line over a file on disk, split on LF or CRLF and decoded the
 * same way as decodeLogBuffer
 */
export async function* streamLogLines(path: string): AsyncGenerator<string> {
  const handle = await open(path);
  try {
    for await (const line of handle.readLines()) {
      yield line.replace(REPLACEMENT_CHARACTER, '');
    }
  } finally {
    await handle.close();
  }
}

@Injectable()
export class LogFileSource {
  /**
   * .log and .zip files directly under `directory`, newest modification first
   */
  async discover(directory: string): Promise<LogFileInfo[]> {
    const entries = await readdir(directory, { withFileTypes: true });
    const files: LogFileInfo[] = [];

    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const kind = KIND_BY_EXTENSION[extname(entry.name).toLowerCase()];
      if (!kind) {
        continue;
      }
      const path = join(directory, entry.name);
      const stats = await stat(path);
      files.push({ path, name: entry.name, kind, modifiedAt: stats.mtime });
    }

    return files.sort(
      (a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime() || a.name.localeCompare(b.name),
    );
  }

  async read(file: LogFileInfo): Promise<LogDocument[]> {
    if (file.kind === 'log') {
      return [{ source: file.name, lines: streamLogLines(file.path) }];
    }
    return this.readArchive(file);
  }

  private readArchive(file: LogFileInfo): LogDocument[] {
    let archive: AdmZip;
    try {
      archive = new AdmZip(file.path);
    } catch (error) {
      return [{ source: file.name, error: `unreadable archive: ${describeError(error)}` }];
    }

    const documents: LogDocument[] = [];
    for (const entry of archive.getEntries()) {
      if (entry.isDirectory || !entry.entryName.toLowerCase().endsWith('.log')) {
        continue;
      }
      const source = `${file.name}:${entry.entryName}`;
      try {
        documents.push({ source, lines: splitLines(decodeLogBuffer(entry.getData())) });
      } catch (error) {
        documents.push({ source, error: describeError(error) });
      }
    }
    return documents;
  }
}
