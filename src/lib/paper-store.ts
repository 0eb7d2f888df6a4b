/**
 * Per-topic JSON cache of paper records.
 *
 * Layout: `<root>/<normalized topic>/papers_info.json`, one document per topic,
 * mapping paper id to record. Writes rewrite the whole document; there is no
 * locking, so concurrent writers to one topic lose updates.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { fail, succeed, toError, type Outcome } from './errors.js';
import type { FoundPaper, PaperCollection, PaperRecord } from '../types/paper.js';

const logger = createLogger('paperStore');

export const PAPERS_FILE = 'papers_info.json';

const paperRecordSchema = z.object({
  title: z.string(),
  authors: z.array(z.string()),
  summary: z.string(),
  pdf_url: z.string(),
  published: z.string(),
});

const paperCollectionSchema = z.record(paperRecordSchema);

/**
 * Lower-cases the topic and turns spaces into underscores. Lossy: neither case
 * nor the original spacing can be recovered from the directory name.
 */
export function normalizeTopic(topic: string): string {
  return topic.toLowerCase().replaceAll(' ', '_');
}

export function displayTopic(directoryName: string): string {
  return directoryName.replaceAll('_', ' ');
}

export class PaperStore {
  constructor(readonly rootDir: string) {}

  topicDir(topic: string): string {
    return path.join(this.rootDir, normalizeTopic(topic));
  }

  documentPath(topic: string): string {
    return path.join(this.topicDir(topic), PAPERS_FILE);
  }

  async exists(): Promise<boolean> {
    return isDirectory(this.rootDir);
  }

  async hasDocument(topic: string): Promise<boolean> {
    return isFile(this.documentPath(topic));
  }

  async readTopic(topic: string): Promise<Outcome<PaperCollection>> {
    return this.readDocument(this.documentPath(topic));
  }

  /**
   * Merges papers into the topic's document (existing ids are overwritten)
   * and rewrites it. Returns the document path.
   */
  async upsertPapers(topic: string, papers: FoundPaper[]): Promise<string> {
    const dir = this.topicDir(topic);
    await fs.mkdir(dir, { recursive: true });

    const filePath = path.join(dir, PAPERS_FILE);
    const existing = await this.readDocument(filePath);
    const collection: PaperCollection = existing.ok ? existing.value : {};

    for (const { id, record } of papers) {
      collection[id] = record;
    }

    await fs.writeFile(filePath, JSON.stringify(collection, null, 2), 'utf8');
    logger.debug('Topic document written', { filePath, added: papers.length, total: Object.keys(collection).length });
    return filePath;
  }

  /**
   * Topic directory names, sorted. `undefined` when the root does not exist.
   */
  async listTopicDirs(): Promise<string[] | undefined> {
    let names: string[];
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      names = entries.filter(entry => entry.isDirectory()).map(entry => entry.name);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
    return names.sort();
  }

  /**
   * Topic directories that actually hold a document.
   */
  async listTopicDirsWithDocuments(): Promise<string[]> {
    const dirs = (await this.listTopicDirs()) ?? [];
    const withDocuments: string[] = [];
    for (const dir of dirs) {
      if (await isFile(path.join(this.rootDir, dir, PAPERS_FILE))) {
        withDocuments.push(dir);
      }
    }
    return withDocuments;
  }

  /**
   * First topic document (in directory-name order) containing the id wins.
   */
  async findPaper(paperId: string): Promise<{ topicDir: string; record: PaperRecord } | undefined> {
    for (const dir of (await this.listTopicDirs()) ?? []) {
      const filePath = path.join(this.rootDir, dir, PAPERS_FILE);
      if (!(await isFile(filePath))) continue;

      const document = await this.readDocument(filePath);
      if (!document.ok) {
        logger.warn(`Error reading ${filePath}`, document.error);
        continue;
      }
      if (Object.hasOwn(document.value, paperId)) {
        return { topicDir: dir, record: document.value[paperId] };
      }
    }
    return undefined;
  }

  async countTopic(topic: string): Promise<number> {
    const document = await this.readTopic(topic);
    return document.ok ? Object.keys(document.value).length : 0;
  }

  /**
   * Paper counts for every topic directory, keyed by display name.
   */
  async countAll(): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const dir of (await this.listTopicDirs()) ?? []) {
      const document = await this.readDocument(path.join(this.rootDir, dir, PAPERS_FILE));
      counts[displayTopic(dir)] = document.ok ? Object.keys(document.value).length : 0;
    }
    return counts;
  }

  private async readDocument(filePath: string): Promise<Outcome<PaperCollection>> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      return fail(toError(error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return fail(toError(error));
    }

    const parsed = paperCollectionSchema.safeParse(raw);
    if (!parsed.success) {
      return fail(new Error(`Malformed papers document ${filePath}: ${parsed.error.message}`));
    }
    return succeed(parsed.data);
  }
}

function isNotFound(error: unknown): boolean {
  // fs errors may come from another realm, so match on shape
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}
