import { existsSync } from 'fs';
import { join } from 'path';
import { describe, it, expect } from 'vitest';
import { displayTitle, exportToPptx, parseMarkdownSlides } from '../../src/exporter/pptx.js';
import { tempDir } from '../helpers/config.js';

const MARKDOWN = `# Slide 1: Test Paper
Jane Doe, Rick Roe

---

## Slide 2: Method
- Sparse attention over chunks
**Key idea**
Plain text line
`;

describe('displayTitle', () => {
  it('should drop a slide number prefix', () => {
    expect(displayTitle('Slide 2: Method')).toBe('Method');
    expect(displayTitle('Slide 3：结论')).toBe('结论');
    expect(displayTitle('Overview')).toBe('Overview');
  });
});

describe('parseMarkdownSlides', () => {
  it('should split headings into slides with typed content', () => {
    expect(parseMarkdownSlides(MARKDOWN)).toEqual([
      {
        title: 'Slide 1: Test Paper',
        displayTitle: 'Test Paper',
        content: [{ type: 'text', text: 'Jane Doe, Rick Roe' }],
      },
      {
        title: 'Slide 2: Method',
        displayTitle: 'Method',
        content: [
          { type: 'bullet', text: 'Sparse attention over chunks' },
          { type: 'bold', text: 'Key idea' },
          { type: 'text', text: 'Plain text line' },
        ],
      },
    ]);
  });

  it('should keep text that comes before the first heading', () => {
    expect(parseMarkdownSlides('Preface\n# First')).toEqual([
      { title: '', displayTitle: '', content: [{ type: 'text', text: 'Preface' }] },
      { title: 'First', displayTitle: 'First', content: [] },
    ]);
  });

  it('should return no slides for empty input', () => {
    expect(parseMarkdownSlides('\n\n')).toEqual([]);
  });
});

describe('exportToPptx', () => {
  it('should write the deck named after the paper', async () => {
    const dir = join(tempDir(), 'slides');

    const path = await exportToPptx(MARKDOWN, { paperId: '2301.12345', title: 'Test Paper', authors: 'Jane Doe' }, dir);

    expect(path).toBe(join(dir, '2301.12345_slide.pptx'));
    expect(existsSync(path)).toBe(true);
  });
});
