import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DocumentProcessor, normalizeWhitespace, titleFromFileName } from './documentProcessor';

const mocks = vi.hoisted(() => ({
  pdfParse: vi.fn(),
  extractRawText: vi.fn(),
}));

vi.mock('pdf-parse/lib/pdf-parse.js', () => ({ default: mocks.pdfParse }));
vi.mock('mammoth', () => ({ extractRawText: mocks.extractRawText }));

const COURSE_DOC = [
  'Course Title: Introduction to MCP',
  'Course Link: https://example.com/mcp',
  'Course Instructor: Test Instructor',
  '',
  'Lesson 1: Servers',
  'Lesson Link: https://example.com/mcp/1',
  'An MCP server exposes tools.',
  '',
  'Lesson 2: Clients',
  'An MCP client calls tools.',
].join('\n');

describe('helpers', () => {
  it('collapses whitespace', () => {
    expect(normalizeWhitespace('  a \n\t b  ')).toBe('a b');
  });

  it('derives a title from a file name', () => {
    expect(titleFromFileName('/docs/my_course-notes.txt')).toBe('my course notes');
    expect(titleFromFileName('___.txt')).toBe('Untitled Course');
  });
});

describe('DocumentProcessor.parseCourseDocument', () => {
  const processor = new DocumentProcessor();

  it('reads the header and every lesson', () => {
    const { course } = processor.parseCourseDocument(COURSE_DOC, 'mcp.txt');

    expect(course).toEqual({
      title: 'Introduction to MCP',
      link: 'https://example.com/mcp',
      instructor: 'Test Instructor',
      lessons: [
        { number: 1, title: 'Servers', link: 'https://example.com/mcp/1' },
        { number: 2, title: 'Clients' },
      ],
    });
  });

  it('prefixes chunks with their course and lesson and numbers them across lessons', () => {
    const { chunks } = processor.parseCourseDocument(COURSE_DOC, 'mcp.txt');

    expect(chunks).toEqual([
      {
        content: 'Course Introduction to MCP Lesson 1 content: An MCP server exposes tools.',
        courseTitle: 'Introduction to MCP',
        lessonNumber: 1,
        chunkIndex: 0,
      },
      {
        content: 'Course Introduction to MCP Lesson 2 content: An MCP client calls tools.',
        courseTitle: 'Introduction to MCP',
        lessonNumber: 2,
        chunkIndex: 1,
      },
    ]);
  });

  it('accepts Windows line endings', () => {
    const { course, chunks } = processor.parseCourseDocument(COURSE_DOC.replace(/\n/g, '\r\n'), 'mcp.txt');

    expect(course.lessons.map(l => l.title)).toEqual(['Servers', 'Clients']);
    expect(chunks).toHaveLength(2);
  });

  it('falls back to the file name when the title is missing', () => {
    const { course, chunks } = processor.parseCourseDocument('Just some text. More text here.', 'my_course-notes.txt');

    expect(course.title).toBe('my course notes');
    expect(course.lessons).toEqual([]);
    expect(chunks).toEqual([
      {
        content: 'Course my course notes content: Just some text. More text here.',
        courseTitle: 'my course notes',
        lessonNumber: undefined,
        chunkIndex: 0,
      },
    ]);
  });

  it('names untitled lessons after their number and ignores text before the first lesson', () => {
    const raw = ['Course Title: Short', 'Intro text nobody indexes.', 'Lesson 3:', 'Body.'].join('\n');

    const { course, chunks } = processor.parseCourseDocument(raw, 'short.txt');

    expect(course.lessons).toEqual([{ number: 3, title: 'Lesson 3' }]);
    expect(chunks.map(c => c.content)).toEqual(['Course Short Lesson 3 content: Body.']);
  });

  it('treats an empty header value as absent', () => {
    const { course } = processor.parseCourseDocument('Course Title: T\nCourse Link:\nLesson 0: Start\nText.', 't.txt');

    expect(course.link).toBeUndefined();
    expect(course.instructor).toBeUndefined();
  });

  it('keeps a lesson without a body in the outline but produces no chunk for it', () => {
    const { course, chunks } = processor.parseCourseDocument('Course Title: T\nLesson 1: Empty\nLesson 2: Full\nText.', 't.txt');

    expect(course.lessons.map(l => l.number)).toEqual([1, 2]);
    expect(chunks).toHaveLength(1);
    expect(chunks[0].lessonNumber).toBe(2);
  });
});

describe('DocumentProcessor.chunkText', () => {
  it('returns nothing for blank text', () => {
    expect(new DocumentProcessor().chunkText(' \n\t ')).toEqual([]);
  });

  it('keeps a short text in one chunk', () => {
    const chunks = new DocumentProcessor().chunkText('  One   sentence.\nAnother one.  ');

    expect(chunks).toEqual([{ text: 'One sentence. Another one.', start: 0, end: 26 }]);
  });

  it('carries whole trailing sentences into the next chunk', () => {
    const text = 'First sentence here. Second sentence here. Third sentence here. Fourth one.';

    const chunks = new DocumentProcessor(50, 25).chunkText(text);

    expect(chunks.map(c => c.text)).toEqual([
      'First sentence here. Second sentence here.',
      'Second sentence here. Third sentence here.',
      'Third sentence here. Fourth one.',
    ]);
  });

  it('does not overlap when the trailing sentence is longer than the overlap', () => {
    const text = 'First sentence here. Second sentence here. Third sentence here. Fourth one.';

    const chunks = new DocumentProcessor(50, 10).chunkText(text);

    expect(chunks.map(c => c.text)).toEqual([
      'First sentence here. Second sentence here.',
      'Third sentence here. Fourth one.',
    ]);
  });

  it('cuts a token longer than a chunk', () => {
    const chunks = new DocumentProcessor(10, 0).chunkText('abcdefghijklmnopqrstuvwxy');

    expect(chunks.map(c => c.text)).toEqual(['abcdefghij', 'klmnopqrst', 'uvwxy']);
  });

  it('stays within the chunk size and covers the whole text', () => {
    const text = Array.from({ length: 30 }, (_, i) => `Sentence number ${i} talks about topic ${i % 4}.`).join(' ');
    const normalized = normalizeWhitespace(text);

    const chunks = new DocumentProcessor(120, 40).chunkText(text);

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks[0].start).toBe(0);
    expect(chunks[chunks.length - 1].end).toBe(normalized.length);
    for (const chunk of chunks) {
      expect(chunk.text.length).toBeLessThanOrEqual(120);
    }
    for (let i = 1; i < chunks.length; i++) {
      expect(chunks[i].start).toBeGreaterThan(chunks[i - 1].start);
      expect(chunks[i].start).toBeLessThanOrEqual(chunks[i - 1].end);
    }

    const spine = chunks
      .map((c, i) => normalized.slice(i === 0 ? c.start : Math.max(c.start, chunks[i - 1].end), c.end))
      .join('');
    expect(spine).toBe(normalized);
  });

  it('rejects an overlap that is not below the chunk size', () => {
    expect(() => new DocumentProcessor(100, 100)).toThrow(RangeError);
    expect(() => new DocumentProcessor(0, 0)).toThrow(RangeError);
  });
});

describe('DocumentProcessor.processCourseDocument', () => {
  // Flate-compressed bytes as they appear in a real PDF.
  const PDF_BYTES = Buffer.concat([
    Buffer.from('%PDF-1.4\n%\xe2\xe3\xcf\xd3\n1 0 obj << /Length 62 /Filter /FlateDecode >> stream\n', 'latin1'),
    Buffer.from([0x78, 0x9c, 0x73, 0x0a, 0x51, 0xe1, 0x77, 0x33, 0x54, 0x30, 0x34, 0x52, 0x00, 0xff]),
  ]);

  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'course-doc-'));
    mocks.pdfParse.mockReset();
    mocks.extractRawText.mockReset();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a course file from disk', async () => {
    const file = path.join(dir, 'mcp.txt');
    await writeFile(file, COURSE_DOC, 'utf8');

    const { course, chunks } = await new DocumentProcessor().processCourseDocument(file);

    expect(course.title).toBe('Introduction to MCP');
    expect(chunks).toHaveLength(2);
    expect(mocks.pdfParse).not.toHaveBeenCalled();
  });

  it('indexes the extracted text of a PDF, not its bytes', async () => {
    const file = path.join(dir, 'mcp_course.pdf');
    await writeFile(file, PDF_BYTES);
    mocks.pdfParse.mockResolvedValue({ text: `\n\n${COURSE_DOC}` });

    const { course, chunks } = await new DocumentProcessor().processCourseDocument(file);

    expect(mocks.pdfParse).toHaveBeenCalledWith(PDF_BYTES);
    expect(course.title).toBe('Introduction to MCP');
    expect(chunks.map(c => c.content)).toEqual([
      'Course Introduction to MCP Lesson 1 content: An MCP server exposes tools.',
      'Course Introduction to MCP Lesson 2 content: An MCP client calls tools.',
    ]);
  });

  it('extracts Word documents with mammoth', async () => {
    const file = path.join(dir, 'mcp.docx');
    await writeFile(file, Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00]));
    mocks.extractRawText.mockResolvedValue({ value: COURSE_DOC, messages: [] });

    const { course } = await new DocumentProcessor().processCourseDocument(file);

    expect(mocks.extractRawText).toHaveBeenCalledWith({ buffer: expect.any(Buffer) });
    expect(course.lessons).toHaveLength(2);
  });

  it('fails on a PDF the parser cannot read', async () => {
    const file = path.join(dir, 'broken.pdf');
    await writeFile(file, PDF_BYTES);
    mocks.pdfParse.mockRejectedValue(new Error('Invalid PDF structure'));

    await expect(new DocumentProcessor().processCourseDocument(file))
      .rejects.toThrow('Failed to read broken.pdf: Invalid PDF structure');
  });

  it('fails on a PDF without a text layer', async () => {
    const file = path.join(dir, 'scan.pdf');
    await writeFile(file, PDF_BYTES);
    mocks.pdfParse.mockResolvedValue({ text: '\n\n  \n' });

    await expect(new DocumentProcessor().processCourseDocument(file))
      .rejects.toThrow('No text could be extracted from scan.pdf');
  });
});
