import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { displayTopic, normalizeTopic, PAPERS_FILE, PaperStore } from '../lib/paper-store';
import type { FoundPaper, PaperRecord } from '../types/paper';

function record(title: string): PaperRecord {
  return {
    title,
    authors: ['Ada Example', 'Ben Sample'],
    summary: `Summary of ${title}`,
    pdf_url: `http://arxiv.org/pdf/${title}`,
    published: '2024-01-15',
  };
}

describe('topic names', () => {
  it('lower-cases and replaces spaces with underscores', () => {
    expect(normalizeTopic('Quantum Computing')).toBe('quantum_computing');
    expect(normalizeTopic('quantum computing')).toBe('quantum_computing');
  });

  it('turns underscores back into spaces for display', () => {
    expect(displayTopic('quantum_computing')).toBe('quantum computing');
  });
});

describe('PaperStore', () => {
  let root: string;
  let store: PaperStore;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'paper-store-'));
    store = new PaperStore(path.join(root, 'papers'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('reports a missing root', async () => {
    expect(await store.exists()).toBe(false);
    expect(await store.listTopicDirs()).toBeUndefined();
    expect(await store.countAll()).toEqual({});
  });

  it('writes a 2-space indented document and reads the same records back', async () => {
    const papers: FoundPaper[] = [
      { id: '2401.00001v1', record: record('first') },
      { id: '2401.00002v1', record: record('second') },
    ];

    const filePath = await store.upsertPapers('Quantum Computing', papers);

    expect(filePath).toBe(path.join(root, 'papers', 'quantum_computing', PAPERS_FILE));
    const text = await fs.readFile(filePath, 'utf8');
    expect(text).toBe(JSON.stringify({ '2401.00001v1': record('first'), '2401.00002v1': record('second') }, null, 2));

    const document = await store.readTopic('quantum computing');
    expect(document).toEqual({
      ok: true,
      value: { '2401.00001v1': record('first'), '2401.00002v1': record('second') },
    });
  });

  it('merges later writes into the existing document', async () => {
    await store.upsertPapers('ml', [
      { id: 'a', record: record('a-old') },
      { id: 'b', record: record('b') },
    ]);
    await store.upsertPapers('ml', [
      { id: 'a', record: record('a-new') },
      { id: 'c', record: record('c') },
    ]);

    const document = await store.readTopic('ml');
    expect(document.ok && Object.keys(document.value).sort()).toEqual(['a', 'b', 'c']);
    expect(document.ok && document.value.a.title).toBe('a-new');
    expect(await store.countTopic('ml')).toBe(3);
  });

  it('finds a paper in the first topic directory that holds it', async () => {
    await store.upsertPapers('zeta', [{ id: 'shared', record: record('from zeta') }]);
    await store.upsertPapers('alpha', [{ id: 'shared', record: record('from alpha') }]);

    const found = await store.findPaper('shared');

    expect(found).toEqual({ topicDir: 'alpha', record: record('from alpha') });
    expect(await store.findPaper('missing')).toBeUndefined();
  });

  it('skips corrupt documents when searching and counts them as empty', async () => {
    await store.upsertPapers('good', [{ id: 'x', record: record('x') }]);
    await fs.mkdir(path.join(root, 'papers', 'bad'), { recursive: true });
    await fs.writeFile(path.join(root, 'papers', 'bad', PAPERS_FILE), '{not json', 'utf8');
    await fs.mkdir(path.join(root, 'papers', 'empty_dir'));

    expect(await store.findPaper('x')).toEqual({ topicDir: 'good', record: record('x') });
    expect(await store.countAll()).toEqual({ bad: 0, 'empty dir': 0, good: 1 });
    expect(await store.listTopicDirsWithDocuments()).toEqual(['bad', 'good']);
  });

  it('rejects documents that are not a mapping of paper records', async () => {
    await fs.mkdir(path.join(root, 'papers', 'odd'), { recursive: true });
    await fs.writeFile(path.join(root, 'papers', 'odd', PAPERS_FILE), JSON.stringify({ x: { title: 1 } }), 'utf8');

    const document = await store.readTopic('odd');

    expect(document.ok).toBe(false);
    expect(await store.hasDocument('odd')).toBe(true);
  });
});
