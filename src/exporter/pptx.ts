import { mkdirSync } from 'fs';
import { join } from 'path';
import PptxGenJS from 'pptxgenjs';
import { createLogger } from '../lib/logger.js';

const log = createLogger('pptx');

export type SlideItem =
  | { type: 'bullet'; text: string }
  | { type: 'bold'; text: string }
  | { type: 'text'; text: string };

export interface SlideData {
  title: string;
  /** Title without a leading `Slide N:` */
  displayTitle: string;
  content: SlideItem[];
}

export function displayTitle(title: string): string {
  const match = /^Slide\s+\d+\s*[:：]\s*(.*)$/.exec(title);
  return match ? match[1].trim() : title;
}

/**
 * Split a markdown summary into slides: every `#` heading starts one,
 * `- ` lines are bullets, `**...**` lines are bold, anything else is text.
 */
export function parseMarkdownSlides(markdown: string): SlideData[] {
  const slides: SlideData[] = [];
  let current: SlideData = { title: '', displayTitle: '', content: [] };

  const flush = () => {
    if (current.title || current.content.length > 0) {
      slides.push(current);
    }
  };

  for (const raw of markdown.trim().split('\n')) {
    const line = raw.trim();
    // blank lines and horizontal rules
    if (!line || /^-{3,}$/.test(line)) continue;

    if (line.startsWith('#')) {
      flush();
      const title = line.replace(/^#+/, '').trim();
      current = { title, displayTitle: displayTitle(title), content: [] };
    } else if (line.startsWith('-')) {
      current.content.push({ type: 'bullet', text: line.replace(/^-+/, '').trim() });
    } else if (line.length > 4 && line.startsWith('**') && line.endsWith('**')) {
      current.content.push({ type: 'bold', text: line.slice(2, -2).trim() });
    } else {
      current.content.push({ type: 'text', text: line });
    }
  }
  flush();

  return slides;
}

export interface DeckMeta {
  paperId: string;
  title: string;
  authors: string;
}

// LAYOUT_WIDE is 13.33 x 7.5 in
const WIDTH = 13.33;
const GRAY = '808080';

function addTitleSlide(pptx: PptxGenJS, slide: SlideData | undefined, meta: DeckMeta): void {
  const page = pptx.addSlide();
  page.addText(slide?.displayTitle || meta.title, {
    x: 1, y: 2.5, w: WIDTH - 2, h: 1.5,
    fontSize: 44, bold: true, align: 'center',
  });

  const lines = (slide?.content ?? []).filter((item) => item.type !== 'bullet');
  const subtitle = lines.length > 0
    ? lines.map((item) => ({ text: item.text, options: { bold: item.type === 'bold', breakLine: true } }))
    : [{ text: meta.authors, options: { breakLine: true } }];

  page.addText(subtitle, {
    x: 1, y: 4.5, w: WIDTH - 2, h: 2,
    fontSize: 24, align: 'center', valign: 'top',
  });
}

function addContentSlide(pptx: PptxGenJS, slide: SlideData, index: number): void {
  const page = pptx.addSlide();
  page.addText(`Slide ${index}: ${slide.displayTitle}`, {
    x: 0.5, y: 0.3, w: WIDTH - 1, h: 0.8,
    fontSize: 24, bold: true,
  });

  const body = slide.content.map((item) => {
    switch (item.type) {
      case 'bullet':
        return { text: item.text, options: { bullet: true, fontSize: 18, paraSpaceBefore: 12, breakLine: true } };
      case 'bold':
        return { text: item.text, options: { bold: true, fontSize: 20, paraSpaceBefore: 18, breakLine: true } };
      default:
        return { text: item.text, options: { fontSize: 16, breakLine: true } };
    }
  });
  if (body.length > 0) {
    page.addText(body, { x: 0.5, y: 1.3, w: 6, h: 5.5, valign: 'top' });
  }

  page.addText(
    [
      { text: 'Chart Placeholder', options: { italic: true, fontSize: 16, align: 'center', breakLine: true } },
      { text: 'Insert the key figure of the paper here.', options: { fontSize: 14, breakLine: true } },
    ],
    { x: 7, y: 1.3, w: 5.8, h: 5.5, color: GRAY, valign: 'middle' }
  );
}

/** Write `{outputDir}/{paperId}_slide.pptx` and return its path. */
export async function exportToPptx(markdown: string, meta: DeckMeta, outputDir: string): Promise<string> {
  mkdirSync(outputDir, { recursive: true });
  const slides = parseMarkdownSlides(markdown);

  const pptx = new PptxGenJS();
  pptx.layout = 'LAYOUT_WIDE';
  pptx.title = meta.title;
  pptx.author = meta.authors;
  pptx.subject = `arXiv:${meta.paperId}`;

  const [first, ...rest] = slides;
  addTitleSlide(pptx, first, meta);
  rest.forEach((slide, i) => addContentSlide(pptx, slide, i + 1));

  const fileName = join(outputDir, `${meta.paperId}_slide.pptx`);
  await pptx.writeFile({ fileName });
  log.info(`Wrote ${slides.length} slides`, { path: fileName });
  return fileName;
}
