/**
 * arXiv search over the public Atom API.
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ArxivError } from './errors.js';
import type { FoundPaper, PaperSearch, PaperSearchQuery } from '../types/paper.js';

const logger = createLogger('arxivClient');

export const DEFAULT_ARXIV_API_BASE = 'https://export.arxiv.org/api';

const ARRAY_TAGS = new Set(['entry', 'author', 'link']);

const linkSchema = z.object({
  '@_href': z.string(),
  '@_title': z.string().optional(),
  '@_rel': z.string().optional(),
});

const entrySchema = z.object({
  id: z.string(),
  title: z.string(),
  summary: z.string().default(''),
  published: z.string(),
  author: z.array(z.object({ name: z.string() })).default([]),
  link: z.array(linkSchema).default([]),
});

const feedSchema = z.object({
  feed: z.object({
    entry: z.array(entrySchema).default([]),
  }),
});

type ArxivEntry = z.infer<typeof entrySchema>;

export interface ArxivClientOptions {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

export function buildSearchUrl(baseUrl: string, { query, maxResults }: PaperSearchQuery): string {
  const params = new URLSearchParams({
    search_query: query,
    start: '0',
    max_results: String(maxResults),
    sortBy: 'relevance',
    sortOrder: 'descending',
  });
  return `${baseUrl.replace(/\/+$/, '')}/query?${params.toString()}`;
}

/**
 * `http://arxiv.org/abs/2101.00001v2` -> `2101.00001v2`
 */
export function shortId(entryId: string): string {
  const marker = 'arxiv.org/abs/';
  const index = entryId.lastIndexOf(marker);
  return index === -1 ? entryId : entryId.slice(index + marker.length);
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function toFoundPaper(entry: ArxivEntry): FoundPaper {
  const pdfLink = entry.link.find(link => link['@_title'] === 'pdf');
  return {
    id: shortId(entry.id),
    record: {
      title: collapseWhitespace(entry.title),
      authors: entry.author.map(author => collapseWhitespace(author.name)),
      summary: collapseWhitespace(entry.summary),
      pdf_url: pdfLink ? pdfLink['@_href'] : entry.id.replace('/abs/', '/pdf/'),
      published: entry.published.slice(0, 10),
    },
  };
}

export function parseFeed(xml: string): FoundPaper[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    isArray: (tagName) => ARRAY_TAGS.has(tagName),
  });
  const parsed = feedSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw new ArxivError(`Unexpected arXiv response: ${parsed.error.message}`);
  }
  return parsed.data.feed.entry.map(toFoundPaper);
}

/**
 * Creates a searcher that returns papers ordered by relevance.
 */
export function createArxivSearch(options: ArxivClientOptions = {}): PaperSearch {
  const baseUrl = options.baseUrl ?? process.env.ARXIV_API_BASE ?? DEFAULT_ARXIV_API_BASE;
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (query) => {
    const url = buildSearchUrl(baseUrl, query);
    logger.debug('Querying arXiv', { url });

    const response = await fetchImpl(url, { headers: { Accept: 'application/atom+xml' } });
    if (!response.ok) {
      throw new ArxivError(`arXiv request failed with status ${response.status}`, response.status);
    }
    const papers = parseFeed(await response.text());
    logger.info(`arXiv returned ${papers.length} papers`, { query: query.query });
    return papers;
  };
}
