import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { PAPERS_FILE, PaperStore } from '../lib/paper-store';
import { buildSearchPrompt, ResearchTools } from '../lib/research-tools';
import type { FoundPaper, PaperRecord, PaperSearch } from '../types/paper';

function record(title: string, summary = `About ${title}`): PaperRecord {
  return {
    title,
    authors: ['Ada Example'],
    summary,
    pdf_url: `http://arxiv.org/pdf/${title}`,
    published: '2023-06-01',
  };
}

describe('ResearchTools', () => {
  let root: string;
  let papersDir: string;
  let results: FoundPaper[];
  let search: jest.MockedFunction<PaperSearch>;
  let tools: ResearchTools;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'research-tools-'));
    papersDir = path.join(root, 'papers');
    results = [];
    search = jest.fn<ReturnType<PaperSearch>, Parameters<PaperSearch>>(async () => results);
    tools = new ResearchTools(new PaperStore(papersDir), search);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('searchPapers', () => {
    it('stores results under the normalized topic and returns their ids', async () => {
      results = [
        { id: '1', record: record('one') },
        { id: '2', record: record('two') },
      ];

      const ids = await tools.searchPapers('Quantum Computing', 2);

      expect(ids).toEqual(['1', '2']);
      expect(search).toHaveBeenCalledWith({ query: 'Quantum Computing', maxResults: 2 });
      expect(await tools.listTopics()).toEqual(['quantum computing']);
    });

    it('returns only the ids from the current call while the document accumulates', async () => {
      results = [{ id: '1', record: record('one') }, { id: '2', record: record('two-old') }];
      await tools.searchPapers('ml');
      results = [{ id: '2', record: record('two-new') }, { id: '3', record: record('three') }];

      const ids = await tools.searchPapers('ml');

      expect(ids).toEqual(['2', '3']);
      const document = JSON.parse(await fs.readFile(path.join(papersDir, 'ml', PAPERS_FILE), 'utf8'));
      expect(Object.keys(document).sort()).toEqual(['1', '2', '3']);
      expect(document['2'].title).toBe('two-new');
    });

    it('creates nothing when the search finds no papers', async () => {
      expect(await tools.searchPapers('nothing here')).toEqual([]);
      await expect(fs.stat(papersDir)).rejects.toThrow();
    });

    it('uses five results by default', async () => {
      await tools.searchPapers('ml');
      expect(search).toHaveBeenCalledWith({ query: 'ml', maxResults: 5 });
    });
  });

  describe('extractInfo', () => {
    it('reports a missing papers directory', async () => {
      expect(await tools.extractInfo('1')).toBe("Papers directory 'papers' does not exist.");
    });

    it('returns the stored record as indented JSON', async () => {
      results = [{ id: '2101.00001v2', record: record('one') }];
      await tools.searchPapers('ml');

      expect(await tools.extractInfo('2101.00001v2')).toBe(JSON.stringify(record('one'), null, 2));
    });

    it('returns the not-found message for unknown ids', async () => {
      results = [{ id: '1', record: record('one') }];
      await tools.searchPapers('ml');

      expect(await tools.extractInfo('9999.99999')).toBe("There's no saved information related to paper 9999.99999.");
    });
  });

  describe('getPaperCount', () => {
    it('reports a missing papers directory', async () => {
      expect(await tools.getPaperCount()).toEqual({ error: 'Papers directory does not exist' });
    });

    it('counts one topic keyed as given and all topics keyed by display name', async () => {
      results = [{ id: '1', record: record('one') }, { id: '2', record: record('two') }];
      await tools.searchPapers('machine learning');
      results = [{ id: '3', record: record('three') }];
      await tools.searchPapers('physics');

      expect(await tools.getPaperCount('Machine Learning')).toEqual({ 'Machine Learning': 2 });
      expect(await tools.getPaperCount('unknown')).toEqual({ unknown: 0 });
      expect(await tools.getPaperCount()).toEqual({ 'machine learning': 2, physics: 1 });
    });
  });

  describe('resources', () => {
    it('renders the folder index', async () => {
      expect(await tools.renderFolderIndex()).toBe('# Available Topics\n\nNo topics found.\n');

      results = [{ id: '1', record: record('one') }];
      await tools.searchPapers('beta');
      await tools.searchPapers('alpha');

      expect(await tools.renderFolderIndex()).toBe(
        '# Available Topics\n\n- alpha\n- beta\n\nUse @beta to access papers in that topic.\n'
      );
    });

    it('renders a topic with truncated summaries', async () => {
      results = [{ id: '2101.00001v2', record: record('A Paper', 'x'.repeat(600)) }];
      await tools.searchPapers('machine learning');

      const markdown = await tools.renderTopicPapers('machine_learning');

      expect(markdown).toBe(
        '# Papers on Machine Learning\n\n' +
          'Total papers: 1\n\n' +
          '## A Paper\n' +
          '- **Paper ID**: 2101.00001v2\n' +
          '- **Authors**: Ada Example\n' +
          '- **Published**: 2023-06-01\n' +
          '- **PDF URL**: [http://arxiv.org/pdf/A Paper](http://arxiv.org/pdf/A Paper)\n\n' +
          `### Summary\n${'x'.repeat(500)}...\n\n` +
          '---\n\n'
      );
    });

    it('explains a missing or corrupt topic', async () => {
      expect(await tools.renderTopicPapers('nothing')).toBe(
        '# No papers found for topic: nothing\n\nTry searching for papers on this topic first.'
      );

      await fs.mkdir(path.join(papersDir, 'broken'), { recursive: true });
      await fs.writeFile(path.join(papersDir, 'broken', PAPERS_FILE), '[', 'utf8');

      expect(await tools.renderTopicPapers('broken')).toBe(
        '# Error reading papers data for broken\n\nThe papers data file is corrupted.'
      );
    });
  });
});

describe('buildSearchPrompt', () => {
  it('names the topic and the number of papers', () => {
    const prompt = buildSearchPrompt('graph theory', 3);
    expect(prompt.startsWith("Search for 3 academic papers about 'graph theory' using the search_papers tool.")).toBe(true);
    expect(prompt).toContain("search_papers(topic='graph theory', max_results=3)");
  });
});
