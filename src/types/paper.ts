export interface PaperRecord {
  title: string;
  authors: string[];
  summary: string;
  pdf_url: string;
  published: string;
}

// Contents of one topic's papers_info.json, keyed by paper id
export type PaperCollection = Record<string, PaperRecord>;

export interface FoundPaper {
  id: string;
  record: PaperRecord;
}

export interface PaperSearchQuery {
  query: string;
  maxResults: number;
}

export type PaperSearch = (query: PaperSearchQuery) => Promise<FoundPaper[]>;
