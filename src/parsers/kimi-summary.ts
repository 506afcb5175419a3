/**
 * Parsing of the papers.cool "Kimi" FAQ digest.
 *
 * The digest answers six fixed questions (problem, related work, method,
 * experiments, future work, conclusion). The API returns them as
 * `p.faq-q` / `div.faq-a` pairs; a rendered page only gives us its text.
 */

import { JSDOM } from 'jsdom';
import type { ExternalSummary } from '../types/paper.js';

interface FaqSection {
  label: string;
  /** Label alternatives used when the `Qn:` prefix is absent. */
  aliases: string[];
}

export const FAQ_SECTIONS: FaqSection[] = [
  { label: 'Problem', aliases: ['问题', 'Problem'] },
  { label: 'Related work', aliases: ['相关工作', 'Related work'] },
  { label: 'Method', aliases: ['方法', 'Method'] },
  { label: 'Experiments', aliases: ['实验结果', '实验', 'Experiments'] },
  { label: 'Future work', aliases: ['未来工作', 'Future work'] },
  { label: 'Conclusion', aliases: ['总结', 'Conclusion'] },
];

const STOP_WORDS = ['关键词', 'Keywords'];
const CONTRIBUTION_LABELS = ['创新点', '主要贡献', 'Contributions', 'Innovations'];

export const MAX_KEY_POINTS = 10;
const MIN_KEY_POINT_LENGTH = 10;
const MAX_KEY_POINT_LENGTH = 200;
const FALLBACK_SUMMARY_CHARS = 5000;
const DETAIL_CHARS = 500;

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function alternation(words: string[]): string {
  return words.map(escapeRegex).join('|');
}

export function isKeyPoint(text: string): boolean {
  return text.length > MIN_KEY_POINT_LENGTH && text.length < MAX_KEY_POINT_LENGTH;
}

function sectionPatterns(index: number): RegExp[] {
  const n = index + 1;
  const next = FAQ_SECTIONS[index + 1];
  const numberedStop = next ? `Q${n + 1}` : alternation(STOP_WORDS);
  const labelStop = next ? alternation(next.aliases) : alternation(STOP_WORDS);
  const labels = alternation(FAQ_SECTIONS[index].aliases);

  return [
    new RegExp(`Q${n}[:：]\\s*([\\s\\S]+?)(?=${numberedStop}|$)`),
    new RegExp(`(?:${labels})[:：]\\s*([\\s\\S]+?)(?=(?:${labelStop})[:：]|$)`),
  ];
}

function matchSection(text: string, index: number): string {
  for (const pattern of sectionPatterns(index)) {
    const match = pattern.exec(text);
    if (match && match[1].trim()) {
      return match[1].trim();
    }
  }
  return '';
}

/** Bullet lines first, numbered lines otherwise. */
export function extractKeyPoints(text: string): string[] {
  const patterns = [/^\s*[•\-*]\s+(.+)$/gm, /^\s*\d+[.:)）]\s*(.+)$/gm];

  for (const pattern of patterns) {
    const matches = Array.from(text.matchAll(pattern), (m) => m[1].trim());
    if (matches.length > 0) {
      return matches.filter(isKeyPoint).slice(0, MAX_KEY_POINTS);
    }
  }
  return [];
}

export interface TextParseOptions {
  /** Use the head of the page text when no FAQ section matches. */
  fallbackToText?: boolean;
}

/** Parse the digest from the rendered text of a page. */
export function parseKimiText(paperId: string, fullText: string, options: TextParseOptions = {}): ExternalSummary {
  const sections = FAQ_SECTIONS.map((_, i) => matchSection(fullText, i));
  const found = sections.filter((s) => s.length > 0);

  let summary = found.join('\n\n');
  if (!summary && (options.fallbackToText ?? true)) {
    summary = fullText.trim().slice(0, FALLBACK_SUMMARY_CHARS);
  }

  const methods = sections[2] ? sections[2].slice(0, DETAIL_CHARS) : undefined;

  let contributions: string | undefined;
  const contributionMatch = new RegExp(
    `(?:${alternation(CONTRIBUTION_LABELS)})[:：]\\s*([\\s\\S]+?)(?=Q\\d|$)`
  ).exec(fullText);
  if (contributionMatch) {
    contributions = contributionMatch[1].trim().slice(0, DETAIL_CHARS);
  }

  return {
    paperId,
    summary,
    keyPoints: extractKeyPoints(summary),
    methods,
    contributions,
    rawHtml: '',
  };
}

function textLines(node: Node): string[] {
  if (node.nodeType === node.TEXT_NODE) {
    const text = node.textContent?.trim() ?? '';
    return text ? [text] : [];
  }
  return Array.from(node.childNodes).flatMap(textLines);
}

function answerFor(question: Element): Element | null {
  let sibling = question.nextElementSibling;
  while (sibling) {
    if (sibling.matches('div.faq-a')) return sibling;
    if (sibling.matches('p.faq-q')) return null;
    sibling = sibling.nextElementSibling;
  }
  return null;
}

function faqPairs(document: Document): { question: string; answer: Element }[] {
  const pairs: { question: string; answer: Element }[] = [];
  for (const q of Array.from(document.querySelectorAll('p.faq-q'))) {
    const answer = answerFor(q);
    if (answer) {
      pairs.push({ question: collapse(q.textContent ?? ''), answer });
    }
  }
  return pairs;
}

function questionContent(pairs: { question: string; answer: Element }[], label: string): string {
  const pair = pairs.find((p) => p.question.includes(`${label}:`) || p.question.includes(label));
  return pair ? collapse(pair.answer.textContent ?? '') : '';
}

/**
 * Parse the API's HTML. Structured FAQ markup wins; otherwise the page
 * text goes through {@link parseKimiText} without the raw-text fallback.
 */
export function parseKimiHtml(paperId: string, html: string): ExternalSummary {
  const { document } = new JSDOM(html).window;
  const pairs = faqPairs(document);

  if (pairs.length === 0) {
    const parsed = parseKimiText(paperId, document.body?.textContent ?? '', { fallbackToText: false });
    return { ...parsed, rawHtml: html };
  }

  const answers = FAQ_SECTIONS.map((_, i) => questionContent(pairs, `Q${i + 1}`));
  const summary = answers
    .map((answer, i) => (answer ? `${FAQ_SECTIONS[i].label}: ${answer}` : ''))
    .filter((part) => part.length > 0)
    .join('\n\n');

  const keyPoints = Array.from(document.querySelectorAll('li'))
    .map((li) => collapse(li.textContent ?? ''))
    .filter(isKeyPoint)
    .slice(0, MAX_KEY_POINTS);

  return {
    paperId,
    summary,
    keyPoints,
    methods: answers[2] || undefined,
    rawHtml: html,
  };
}

/**
 * Question/answer text for prompts: FAQ pairs from the raw markup, or the
 * parsed summary when there is no markup.
 */
export function summaryText(summary: ExternalSummary): string {
  if (summary.rawHtml) {
    const { document } = new JSDOM(summary.rawHtml).window;
    const parts = faqPairs(document).map(
      ({ question, answer }) => `${question}\n${textLines(answer).join('\n')}\n`
    );
    if (parts.length > 0) {
      return parts.join('\n\n');
    }
  }
  return summary.summary;
}
