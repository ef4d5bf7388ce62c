/**
 * ============================================================
 *  Course Tools — what the model may ask us to run
 * ============================================================
 *
 * Each tool declares a Gemini function schema and returns plain
 * prose for the model to read, together with the citations the
 * result came from. Citations travel back as return values; the
 * registry's lastSources is only a per-registry convenience.
 * ============================================================
 */

import { type FunctionDeclaration, SchemaType } from "@google/generative-ai";
import { z } from "zod";
import type { Source } from "../types";
import type { SearchHit, VectorStore } from "./vectorStore";

export interface ToolResult {
  output: string;
  sources: Source[];
}

export interface Tool {
  readonly definition: FunctionDeclaration;
  execute(args: Record<string, unknown>): Promise<ToolResult>;
}

export type CourseStore = Pick<
  VectorStore,
  "search" | "resolveCourseName" | "getCourseOutline" | "getCourseLink" | "getLessonLink"
>;

const sourceKey = (source: Source) => source.label;

/** Append sources not already present, keeping first-seen order */
export function mergeSources(target: Source[], incoming: Source[]): Source[] {
  const seen = new Set(target.map(sourceKey));
  for (const source of incoming) {
    if (seen.has(sourceKey(source))) continue;
    seen.add(sourceKey(source));
    target.push(source);
  }
  return target;
}

const describeIssues = (error: z.ZodError): string =>
  error.issues.map(issue => `${issue.path.join(".") || "args"}: ${issue.message}`).join("; ");

// ─── Course Content Search ─────────────────────────────────

const searchArgsSchema = z.object({
  query: z.string().min(1),
  course_name: z.string().nullish(),
  lesson_number: z.coerce.number().int().nullish(),
});

export class CourseSearchTool implements Tool {
  readonly definition: FunctionDeclaration = {
    name: "search_course_content",
    description: "Search course materials with smart course name matching and lesson filtering",
    parameters: {
      type: SchemaType.OBJECT,
      properties: {
        query: {
          type: SchemaType.STRING,
          description: "What to search for in the course content",
        },
        course_name: {
          type: SchemaType.STRING,
          description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
        },
        lesson_number: {
          type: SchemaType.INTEGER,
          description: "Specific lesson number to search within (e.g. 1, 2, 3)",
        },
      },
      required: ["query"],
    },
  };

  private sources: Source[] = [];

  constructor(private readonly store: CourseStore) {}

  /** Citations from the most recent execution */
  get lastSources(): Source[] {
    return [...this.sources];
  }

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = searchArgsSchema.safeParse(args);
    if (!parsed.success) {
      this.sources = [];
      return { output: `Invalid arguments for search_course_content: ${describeIssues(parsed.error)}`, sources: [] };
    }

    const query = parsed.data.query;
    const courseName = parsed.data.course_name ?? undefined;
    const lessonNumber = parsed.data.lesson_number ?? undefined;
    console.log(`[Tools] search_course_content query="${query}" course=${courseName ?? "-"} lesson=${lessonNumber ?? "-"}`);

    const outcome = await this.store.search(query, courseName, lessonNumber);
    let result: ToolResult;
    switch (outcome.kind) {
      case "results":
        result = this.formatResults(outcome.hits);
        break;
      case "empty": {
        let filterInfo = "";
        if (courseName) filterInfo += ` in course '${courseName}'`;
        if (lessonNumber !== undefined) filterInfo += ` in lesson ${lessonNumber}`;
        result = { output: `No relevant content found${filterInfo}.`, sources: [] };
        break;
      }
      case "unresolved":
      default:
        result = { output: outcome.message, sources: [] };
        break;
    }

    this.sources = result.sources;
    return result;
  }

  private formatResults(hits: SearchHit[]): ToolResult {
    const blocks: string[] = [];
    const sources: Source[] = [];

    for (const hit of hits) {
      const { courseTitle, lessonNumber } = hit.metadata;
      const label = lessonNumber !== undefined ? `${courseTitle} - Lesson ${lessonNumber}` : courseTitle;
      blocks.push(`[${label}]\n${hit.content}`);

      const link = (lessonNumber !== undefined ? this.store.getLessonLink(courseTitle, lessonNumber) : undefined)
        ?? this.store.getCourseLink(courseTitle);
      mergeSources(sources, [link ? { label, link } : { label }]);
    }

    return { output: blocks.join("\n\n"), sources };
  }
}

// ─── Course Outline ────────────────────────────────────────

const outlineArgsSchema = z.object({
  course_name: z.string().min(1),
});

export class CourseOutlineTool implements Tool {
  readonly definition: FunctionDeclaration = {
    name: "get_course_outline",
    description: "Get a course's title, link, instructor and complete lesson list",
    parameters: {
      type: SchemaType.OBJECT,
      properties: {
        course_name: {
          type: SchemaType.STRING,
          description: "Course title (partial matches work)",
        },
      },
      required: ["course_name"],
    },
  };

  constructor(private readonly store: CourseStore) {}

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    const parsed = outlineArgsSchema.safeParse(args);
    if (!parsed.success) {
      return { output: `Invalid arguments for get_course_outline: ${describeIssues(parsed.error)}`, sources: [] };
    }

    const courseName = parsed.data.course_name;
    const title = await this.store.resolveCourseName(courseName);
    const course = title ? this.store.getCourseOutline(title) : undefined;
    if (!course) {
      return { output: `No course found matching '${courseName}'`, sources: [] };
    }

    const lines = [`Course: ${course.title}`];
    if (course.link) lines.push(`Link: ${course.link}`);
    if (course.instructor) lines.push(`Instructor: ${course.instructor}`);
    lines.push(`Lessons (${course.lessons.length}):`);
    for (const lesson of course.lessons) {
      lines.push(`Lesson ${lesson.number}: ${lesson.title}`);
    }

    return {
      output: lines.join("\n"),
      sources: [course.link ? { label: course.title, link: course.link } : { label: course.title }],
    };
  }
}

// ─── Registry ──────────────────────────────────────────────

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();
  private lastSources: Source[] = [];

  register(tool: Tool): void {
    this.tools.set(tool.definition.name, tool);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  getToolDefinitions(): FunctionDeclaration[] {
    return Array.from(this.tools.values()).map(tool => tool.definition);
  }

  async execute(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      console.warn(`[Tools] Model requested unknown tool "${name}"`);
      return { output: `Tool '${name}' not found`, sources: [] };
    }
    const result = await tool.execute(args);
    mergeSources(this.lastSources, result.sources);
    return result;
  }

  /** Sources of every execution since the last reset */
  getLastSources(): Source[] {
    return [...this.lastSources];
  }

  resetSources(): void {
    this.lastSources = [];
  }
}

export function createCourseToolRegistry(store: CourseStore): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(new CourseSearchTool(store));
  registry.register(new CourseOutlineTool(store));
  return registry;
}
