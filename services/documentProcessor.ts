/**
 * Course document ingestion: header parsing, lesson splitting and
 * sentence-aware chunking with overlap.
 *
 * Expected document layout:
 *
 *   Course Title: Introduction to MCP
 *   Course Link: https://example.com/mcp
 *   Course Instructor: Jane Doe
 *
 *   Lesson 0: Welcome
 *   Lesson Link: https://example.com/mcp/0
 *   ...transcript...
 */

import { readFile } from 'fs/promises';
import path from 'path';
import * as mammoth from 'mammoth';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import type { Course, CourseChunk, Lesson } from '../types';

export interface TextChunk {
  text: string;
  /** Offsets into the whitespace-normalized input. */
  start: number;
  end: number;
}

export interface ParsedDocument {
  course: Course;
  chunks: CourseChunk[];
}

interface Segment {
  start: number;
  end: number;
}

interface LessonBlock {
  lesson?: Lesson;
  lines: string[];
}

const HEADER_FIELDS = /^course\s+(title|link|instructor)\s*:\s*(.*)$/i;
const LESSON_MARKER = /^lesson\s+(\d+)\s*:\s*(.*)$/i;
const LESSON_LINK = /^lesson\s+link\s*:\s*(.*)$/i;
// Whitespace after terminal punctuation, followed by something that can open a sentence.
const SENTENCE_BREAK = /(?<=[.!?])\s+(?=[A-Z0-9"'(\[])/g;

export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

export const titleFromFileName = (fileName: string): string => {
  const base = path.basename(fileName, path.extname(fileName));
  return normalizeWhitespace(base.replace(/[_-]+/g, ' ')) || 'Untitled Course';
};

async function extractText(ext: string, buffer: Buffer): Promise<string> {
  switch (ext) {
    case '.pdf':
      return (await pdfParse(buffer)).text;
    case '.docx':
      return (await mammoth.extractRawText({ buffer })).value;
    default:
      return buffer.toString('utf8');
  }
}

export class DocumentProcessor {
  constructor(
    private readonly chunkSize = 800,
    private readonly chunkOverlap = 100
  ) {
    if (chunkSize <= 0) throw new RangeError('chunkSize must be positive');
    if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new RangeError('chunkOverlap must be between 0 and chunkSize');
    }
  }

  /** Extract the text of a course file: PDFs through pdf-parse, Word files through mammoth. */
  async readFile(filePath: string): Promise<string> {
    const name = path.basename(filePath);
    const ext = path.extname(filePath).toLowerCase();
    const buffer = await readFile(filePath);

    let text: string;
    try {
      text = await extractText(ext, buffer);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to read ${name}: ${message}`, { cause: error });
    }

    if (ext !== '.txt' && !text.trim()) {
      throw new Error(`No text could be extracted from ${name}`);
    }
    return text;
  }

  async processCourseDocument(filePath: string): Promise<ParsedDocument> {
    const raw = await this.readFile(filePath);
    return this.parseCourseDocument(raw, path.basename(filePath));
  }

  /** Split a course document into its course record and indexed chunks. */
  parseCourseDocument(raw: string, fileName: string): ParsedDocument {
    const lines = raw.replace(/\r\n?/g, '\n').split('\n');
    const header: Record<string, string> = {};

    let bodyStart = 0;
    for (; bodyStart < lines.length; bodyStart++) {
      const line = lines[bodyStart].trim();
      if (!line) continue;
      const match = line.match(HEADER_FIELDS);
      if (!match) break;
      header[match[1].toLowerCase()] = match[2].trim();
    }

    const title = header.title || titleFromFileName(fileName);
    if (!header.title) {
      console.warn(`[Ingest] No course title in ${fileName}, using "${title}"`);
    }

    const course: Course = {
      title,
      link: header.link || undefined,
      instructor: header.instructor || undefined,
      lessons: [],
    };

    const blocks = this.splitLessons(lines.slice(bodyStart));
    const chunks: CourseChunk[] = [];
    let chunkIndex = 0;

    for (const block of blocks) {
      if (block.lesson) course.lessons.push(block.lesson);
      const lessonNumber = block.lesson?.number;
      const prefix = lessonNumber === undefined
        ? `Course ${title} content: `
        : `Course ${title} Lesson ${lessonNumber} content: `;

      for (const piece of this.chunkText(block.lines.join('\n'))) {
        chunks.push({
          content: prefix + piece.text,
          courseTitle: title,
          lessonNumber,
          chunkIndex: chunkIndex++,
        });
      }
    }

    return { course, chunks };
  }

  /**
   * Sentence-aware chunking. Chunks never exceed `chunkSize`; consecutive
   * chunks share up to `chunkOverlap` characters of whole sentences.
   */
  chunkText(text: string): TextChunk[] {
    const normalized = normalizeWhitespace(text);
    if (!normalized) return [];

    const segments = this.segment(normalized);
    const spanLength = (from: number, to: number) =>
      normalized.slice(segments[from].start, segments[to].end).trim().length;

    const chunks: TextChunk[] = [];
    let i = 0;
    while (i < segments.length) {
      let j = i;
      while (j + 1 < segments.length && spanLength(i, j + 1) <= this.chunkSize) j++;

      const start = segments[i].start;
      const end = segments[j].end;
      chunks.push({ text: normalized.slice(start, end).trim(), start, end });

      if (j + 1 >= segments.length) break;

      // Carry whole trailing sentences forward, but only if the next chunk still advances.
      let next = j + 1;
      for (let k = i + 1; k <= j; k++) {
        if (spanLength(k, j) <= this.chunkOverlap && spanLength(k, j + 1) <= this.chunkSize) {
          next = k;
          break;
        }
      }
      i = next;
    }

    return chunks;
  }

  private splitLessons(lines: string[]): LessonBlock[] {
    const blocks: LessonBlock[] = [];
    let current: LessonBlock | null = null;
    const preamble: string[] = [];

    for (let n = 0; n < lines.length; n++) {
      const line = lines[n];
      const marker = line.trim().match(LESSON_MARKER);
      if (marker) {
        const number = Number(marker[1]);
        const lesson: Lesson = { number, title: marker[2].trim() || `Lesson ${number}` };

        let next = n + 1;
        while (next < lines.length && !lines[next].trim()) next++;
        const link = next < lines.length ? lines[next].trim().match(LESSON_LINK) : null;
        if (link) {
          lesson.link = link[1].trim() || undefined;
          n = next;
        }

        current = { lesson, lines: [] };
        blocks.push(current);
        continue;
      }
      (current ? current.lines : preamble).push(line);
    }

    if (blocks.length === 0) {
      return [{ lines: preamble }];
    }
    return blocks;
  }

  /** Sentence spans, with over-long sentences broken at word boundaries. */
  private segment(text: string): Segment[] {
    const sentences: Segment[] = [];
    let start = 0;
    for (const match of text.matchAll(SENTENCE_BREAK)) {
      const index = match.index ?? 0;
      const end = index + match[0].length;
      sentences.push({ start, end });
      start = end;
    }
    sentences.push({ start, end: text.length });

    const segments: Segment[] = [];
    for (const sentence of sentences) {
      if (text.slice(sentence.start, sentence.end).trim().length <= this.chunkSize) {
        segments.push(sentence);
      } else {
        segments.push(...this.splitLongSentence(text, sentence));
      }
    }
    return segments;
  }

  private splitLongSentence(text: string, sentence: Segment): Segment[] {
    const pieces: Segment[] = [];
    const words: Segment[] = [];
    const wordPattern = /\S+\s*/g;
    const body = text.slice(sentence.start, sentence.end);

    for (const match of body.matchAll(wordPattern)) {
      const wordStart = sentence.start + (match.index ?? 0);
      const wordEnd = wordStart + match[0].length;
      if (match[0].trim().length <= this.chunkSize) {
        words.push({ start: wordStart, end: wordEnd });
        continue;
      }
      // A single token longer than a chunk is cut hard.
      for (let s = wordStart; s < wordEnd; s += this.chunkSize) {
        words.push({ start: s, end: Math.min(s + this.chunkSize, wordEnd) });
      }
    }

    let pieceStart = words[0].start;
    let pieceEnd = words[0].end;
    for (const word of words.slice(1)) {
      if (text.slice(pieceStart, word.end).trim().length <= this.chunkSize) {
        pieceEnd = word.end;
      } else {
        pieces.push({ start: pieceStart, end: pieceEnd });
        pieceStart = word.start;
        pieceEnd = word.end;
      }
    }
    pieces.push({ start: pieceStart, end: pieceEnd });
    return pieces;
  }
}
