export enum QueryState {
  AWAITING_DECISION = 'AWAITING_DECISION',
  DIRECT_ANSWER = 'DIRECT_ANSWER',
  TOOL_EXECUTING = 'TOOL_EXECUTING',
  DONE = 'DONE'
}

export interface Lesson {
  number: number;
  title: string;
  link?: string;
}

export interface Course {
  title: string;
  link?: string;
  instructor?: string;
  lessons: Lesson[];
}

export interface CourseChunk {
  content: string;
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
}

/** A citation shown next to an answer. */
export interface Source {
  label: string;
  link?: string;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface QueryResult {
  answer: string;
  sources: Source[];
  sessionId: string;
  trace: QueryState[];
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}
