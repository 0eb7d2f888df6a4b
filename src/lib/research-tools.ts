/**
 * Operations behind the research MCP server: arXiv search with a per-topic
 * JSON cache, lookups over that cache, and the Markdown views served as
 * resources.
 */

import { createLogger } from '../utils/logger.js';
import { displayTopic, PaperStore } from './paper-store.js';
import type { PaperSearch } from '../types/paper.js';

const logger = createLogger('researchTools');

export const DEFAULT_MAX_RESULTS = 5;
export const SUMMARY_PREVIEW_LENGTH = 500;

export type PaperCounts = Record<string, number> | { error: string };

function titleCase(text: string): string {
  return text.replace(/\S+/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export class ResearchTools {
  constructor(
    private readonly store: PaperStore,
    private readonly search: PaperSearch,
    private readonly paperDirLabel = 'papers'
  ) {}

  /**
   * Returns the ids found by this search only, not the topic's accumulated set.
   */
  async searchPapers(topic: string, maxResults = DEFAULT_MAX_RESULTS): Promise<string[]> {
    logger.info(`Searching for papers on topic: ${topic}`, { maxResults });
    const papers = await this.search({ query: topic, maxResults });

    if (papers.length === 0) {
      logger.warn(`No papers found for topic: ${topic}`);
      return [];
    }

    const filePath = await this.store.upsertPapers(topic, papers);
    logger.info(`Found ${papers.length} papers for topic '${topic}'. Results saved in: ${filePath}`);
    return papers.map(paper => paper.id);
  }

  async extractInfo(paperId: string): Promise<string> {
    if (!(await this.store.exists())) {
      return `Papers directory '${this.paperDirLabel}' does not exist.`;
    }

    const found = await this.store.findPaper(paperId);
    if (!found) {
      logger.warn(`Paper ${paperId} not found in any topic directory`);
      return `There's no saved information related to paper ${paperId}.`;
    }

    logger.info(`Found paper ${paperId} in topic directory: ${found.topicDir}`);
    return JSON.stringify(found.record, null, 2);
  }

  async listTopics(): Promise<string[]> {
    const dirs = (await this.store.listTopicDirs()) ?? [];
    return dirs.map(displayTopic);
  }

  async getPaperCount(topic?: string): Promise<PaperCounts> {
    if (!(await this.store.exists())) {
      return { error: 'Papers directory does not exist' };
    }
    if (topic) {
      return { [topic]: await this.store.countTopic(topic) };
    }
    return this.store.countAll();
  }

  async renderFolderIndex(): Promise<string> {
    const folders = await this.store.listTopicDirsWithDocuments();

    let content = '# Available Topics\n\n';
    if (folders.length === 0) {
      return content + 'No topics found.\n';
    }
    for (const folder of folders) {
      content += `- ${folder}\n`;
    }
    content += `\nUse @${folders[folders.length - 1]} to access papers in that topic.\n`;
    return content;
  }

  async renderTopicPapers(topic: string): Promise<string> {
    const document = await this.store.readTopic(topic);
    if (!document.ok) {
      if (!(await this.store.hasDocument(topic))) {
        return `# No papers found for topic: ${topic}\n\nTry searching for papers on this topic first.`;
      }
      logger.warn(`Unreadable papers document for topic ${topic}`, document.error);
      return `# Error reading papers data for ${topic}\n\nThe papers data file is corrupted.`;
    }

    const papers = Object.entries(document.value);
    let content = `# Papers on ${titleCase(displayTopic(topic))}\n\n`;
    content += `Total papers: ${papers.length}\n\n`;

    for (const [paperId, paper] of papers) {
      content += `## ${paper.title}\n`;
      content += `- **Paper ID**: ${paperId}\n`;
      content += `- **Authors**: ${paper.authors.join(', ')}\n`;
      content += `- **Published**: ${paper.published}\n`;
      content += `- **PDF URL**: [${paper.pdf_url}](${paper.pdf_url})\n\n`;
      content += `### Summary\n${paper.summary.slice(0, SUMMARY_PREVIEW_LENGTH)}...\n\n`;
      content += '---\n\n';
    }
    return content;
  }
}

export function buildSearchPrompt(topic: string, numPapers = DEFAULT_MAX_RESULTS): string {
  return `Search for ${numPapers} academic papers about '${topic}' using the search_papers tool.

Follow these instructions:
1. First, search for papers using search_papers(topic='${topic}', max_results=${numPapers})
2. For each paper found, extract and organize the following information:
   - Paper title
   - Authors
   - Publication date
   - Brief summary of the key findings
   - Main contributions or innovations
   - Methodologies used
   - Relevance to the topic '${topic}'

3. Provide a comprehensive summary that includes:
   - Overview of the current state of research in '${topic}'
   - Common themes and trends across the papers
   - Key research gaps or areas for future investigation
   - Most impactful or influential papers in this area

4. Organize your findings in a clear, structured format with headings and bullet points for easy readability.

Please present both detailed information about each paper and a high-level synthesis of the research landscape in ${topic}.`;
}
