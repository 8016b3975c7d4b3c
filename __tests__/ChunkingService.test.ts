import { ChunkingService } from '../services/ChunkingService';
import { makeChunk } from './helpers';

describe('ChunkingService', () => {
  let chunkingService: ChunkingService;

  beforeEach(() => {
    chunkingService = new ChunkingService();
  });

  describe('chunkPages', () => {
    it('should keep short text in one chunk with a deterministic id', () => {
      const shortText = 'This is a short text.';
      const chunks = chunkingService.chunkPages([{ pageNumber: 1, text: shortText }], 'notes.pdf');

      expect(chunks.length).toBe(1);
      expect(chunks[0].text).toBe(shortText);
      expect(chunks[0].id).toBe('notes.pdf::p1::chunk::0');
      expect(chunks[0].metadata).toMatchObject({
        document_name: 'notes.pdf',
        page_number: 1,
        source: 'notes.pdf',
        chunk_index: 0
      });
    });

    it('should prefer sentence and word boundaries', () => {
      const small = new ChunkingService({ chunkSize: 20, chunkOverlap: 5 });
      const text = 'The cat sat. The dog ran far away.';
      const chunks = small.chunkPages([{ pageNumber: 3, text }], 'pets.pdf');

      expect(chunks.map(c => c.text)).toEqual(['The cat sat. ', 'sat. The dog ran ', ' ran far away.']);
      expect(chunks.map(c => [c.charStart, c.charEnd])).toEqual([[0, 13], [8, 25], [20, 34]]);
    });

    it('should hard-cut text without any break', () => {
      const small = new ChunkingService({ chunkSize: 20, chunkOverlap: 5 });
      const chunks = small.chunkPages([{ pageNumber: 1, text: 'x'.repeat(50) }], 'x.pdf');

      expect(chunks.map(c => [c.charStart, c.charEnd])).toEqual([[0, 20], [15, 35], [30, 50]]);
    });

    it('should produce chunks <= chunkSize that reproduce the page text', () => {
      const small = new ChunkingService({ chunkSize: 120, chunkOverlap: 30 });
      const text = Array.from({ length: 40 }, (_, i) => `Sentence number ${i} talks about topic ${i % 7}.`).join(' ');
      const chunks = small.chunkPages([{ pageNumber: 1, text }], 'long.pdf');

      expect(chunks.length).toBeGreaterThan(1);
      let rebuilt = chunks[0].text;
      for (let i = 0; i < chunks.length; i++) {
        const chunk = chunks[i];
        expect(chunk.text.length).toBeLessThanOrEqual(120);
        expect(chunk.text.trim().length).toBeGreaterThan(0);
        expect(text.slice(chunk.charStart, chunk.charEnd)).toBe(chunk.text);
        if (i > 0) {
          const previous = chunks[i - 1];
          expect(chunk.charStart).toBeGreaterThan(previous.charStart);
          expect(chunk.charStart).toBeLessThanOrEqual(previous.charEnd);
          rebuilt += chunk.text.slice(previous.charEnd - chunk.charStart);
        }
      }
      expect(rebuilt).toBe(text);
    });

    it('should number chunks per document across pages', () => {
      const chunks = chunkingService.chunkPages(
        [
          { pageNumber: 1, text: 'Page one text.' },
          { pageNumber: 2, text: '   ' },
          { pageNumber: 4, text: 'Page four text.' }
        ],
        'report.pdf'
      );

      expect(chunks.map(c => c.id)).toEqual(['report.pdf::p1::chunk::0', 'report.pdf::p4::chunk::1']);
      expect(chunks.map(c => c.pageNumber)).toEqual([1, 4]);
    });

    it('should use p0 in ids when the page is unknown', () => {
      const chunks = chunkingService.chunkPages([{ pageNumber: null, text: 'Unpaged text.' }], 'scan.pdf');
      expect(chunks[0].id).toBe('scan.pdf::p0::chunk::0');
      expect(chunks[0].pageNumber).toBeNull();
    });

    it('should handle empty text', () => {
      expect(chunkingService.chunkPages([{ pageNumber: 1, text: '' }], 'empty.pdf')).toEqual([]);
    });

    it('should reject an overlap that does not leave room to advance', () => {
      expect(() => new ChunkingService({ chunkSize: 100, chunkOverlap: 100 })).toThrow('chunkOverlap must be in [0, 100)');
    });
  });

  describe('deduplicateChunks', () => {
    it('should remove chunks with identical normalized text, keeping the first', () => {
      const chunks = [
        makeChunk('a.pdf', 1, 0, 'This is a test chunk.'),
        makeChunk('b.pdf', 2, 0, 'this is   a TEST chunk.'),
        makeChunk('b.pdf', 2, 1, 'This is another chunk.')
      ];

      const unique = chunkingService.deduplicateChunks(chunks);
      expect(unique.map(c => c.id)).toEqual(['a.pdf::p1::chunk::0', 'b.pdf::p2::chunk::1']);
    });
  });
});
