export type MetadataValue = string | number | boolean | null;

export interface ChunkMetadata {
  // Well-known keys
  document_name: string;
  page_number: number | null;
  source: string;
  chunk_index: number;

  // Free-form extras (e.g. char offsets, pdf title)
  [key: string]: MetadataValue;
}

export interface PageText {
  pageNumber: number | null;
  text: string;
}

export interface Chunk {
  id: string; // e.g. "report.pdf::p12::chunk::0"
  documentName: string;
  pageNumber: number | null;
  text: string;
  ordinal: number; // position in the corpus generation, used as the final tie-break
  charStart: number;
  charEnd: number;
  metadata: ChunkMetadata;
}

export interface ScoredChunkId {
  chunkId: string;
  score: number;
}

export interface RetrievalResult {
  chunk: Chunk;
  fusedScore: number;
  lexicalScore: number; // normalized, 0 when the lexical index did not return the chunk
  semanticScore: number; // normalized, 0 when the semantic index did not return the chunk
  lexicalRank: number | null;
  semanticRank: number | null;
  rawLexicalScore: number | null;
  rawSemanticScore: number | null;
}

export type DocumentStatus = 'pending' | 'processing' | 'indexed' | 'skipped';

export type CorpusState = 'empty' | 'loading' | 'ready' | 'reloading' | 'failed';

export interface DocumentReport {
  documentName: string;
  status: DocumentStatus;
  chunkCount: number;
  pageCount: number;
  fileHash?: string;
  reason?: string;
}

export interface RetrievedChunk {
  content: string;
  document_name: string;
  page_number: number | null;
  metadata: ChunkMetadata;
  score: number;
}

export interface RetrievalResponse {
  query: string;
  chunks: RetrievedChunk[];
  total_chunks: number;
}

export interface Source {
  document_name: string;
  page_number: number | null;
  chunk_text: string;
}

export interface AnswerResponse {
  answer: string;
  sources: Source[];
  confidence_score: number;
  note?: 'generation_failed' | 'generation_unavailable';
}
