export class TextCleaningService {
  cleanText(text: string): string {
    let cleaned = text;

    cleaned = cleaned.replace(/\r\n/g, '\n');
    cleaned = cleaned.replace(/\r/g, '\n');
    cleaned = cleaned.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '');
    cleaned = cleaned.replace(/\u00A0/g, ' ');

    // Re-join words hyphenated across line breaks
    cleaned = cleaned.replace(/(\w)-\n(\w)/g, '$1$2');

    cleaned = cleaned.replace(/[ \t]+/g, ' ');
    cleaned = cleaned.replace(/^ +| +$/gm, '');

    // Running headers/footers that only carry a page number
    cleaned = cleaned.replace(/^Page\s+\d+(\s+of\s+\d+)?$/gim, '');
    cleaned = cleaned.replace(/^\d+\s*\/\s*\d+$/gm, '');
    cleaned = cleaned.replace(/^-\s*\d+\s*-$/gm, '');

    cleaned = cleaned.replace(/\n{3,}/g, '\n\n');
    cleaned = cleaned.trim();

    return cleaned;
  }
}
