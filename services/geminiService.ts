
import {
  type Content,
  type FunctionDeclaration,
  type GenerateContentResult,
  GoogleGenerativeAI,
} from "@google/generative-ai";
import { SYSTEM_PROMPT } from "../constants";
import { ConfigError } from "./config";

// --- Conversation shapes shared with the orchestrator ---

export interface ToolInvocation {
  name: string;
  args: Record<string, unknown>;
}

export interface ToolOutput {
  name: string;
  output: string;
}

export type TranscriptEntry =
  | { role: "user"; text: string }
  /** `content` is the model turn as returned, replayed verbatim when present. */
  | { role: "tool_calls"; calls: ToolInvocation[]; content?: Content }
  | { role: "tool_results"; results: ToolOutput[] };

/** What the model chose to do on a decision call. */
export type ModelAction =
  | { kind: "answer"; text: string }
  | { kind: "tool_use"; calls: ToolInvocation[]; content?: Content };

export interface ModelRequest {
  history?: string;
  transcript: TranscriptEntry[];
}

export interface DecisionRequest extends ModelRequest {
  tools: FunctionDeclaration[];
}

export interface ModelClient {
  /** Tools offered: the model may answer or ask for tool calls. */
  decide(request: DecisionRequest): Promise<ModelAction>;
  /** No tools offered: always ends in text. */
  synthesize(request: ModelRequest): Promise<string>;
}

export interface GeminiModelOptions {
  apiKey: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export const buildSystemInstruction = (history?: string): string =>
  history ? `${SYSTEM_PROMPT}\n\nPrevious conversation:\n${history}` : SYSTEM_PROMPT;

export function toContents(transcript: TranscriptEntry[]): Content[] {
  return transcript.map((entry): Content => {
    switch (entry.role) {
      case "user":
        return { role: "user", parts: [{ text: entry.text }] };
      case "tool_calls":
        return entry.content ?? {
          role: "model",
          parts: entry.calls.map(call => ({ functionCall: { name: call.name, args: call.args } })),
        };
      case "tool_results":
        return {
          role: "user",
          parts: entry.results.map(result => ({
            functionResponse: { name: result.name, response: { result: result.output } },
          })),
        };
    }
  });
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class GeminiModelClient implements ModelClient {
  private readonly genAI: GoogleGenerativeAI;

  constructor(private readonly options: GeminiModelOptions) {
    if (!options.apiKey) {
      throw new ConfigError("No Gemini API key found. Set GEMINI_API_KEY in your .env file.");
    }
    this.genAI = new GoogleGenerativeAI(options.apiKey);
  }

  async decide(request: DecisionRequest): Promise<ModelAction> {
    const result = await this.generate("decision", request, request.tools);
    const calls = result.response.functionCalls();
    if (calls && calls.length > 0) {
      console.log(`[Gemini Service] Model requested ${calls.map(c => c.name).join(", ")}`);
      return {
        kind: "tool_use",
        calls: calls.map(call => ({ name: call.name, args: Object.fromEntries(Object.entries(call.args)) })),
        content: result.response.candidates?.[0]?.content,
      };
    }
    return { kind: "answer", text: result.response.text() };
  }

  async synthesize(request: ModelRequest): Promise<string> {
    const result = await this.generate("synthesis", request);
    return result.response.text();
  }

  private async generate(
    phase: "decision" | "synthesis",
    request: ModelRequest,
    tools?: FunctionDeclaration[]
  ): Promise<GenerateContentResult> {
    const model = this.genAI.getGenerativeModel(
      {
        model: this.options.model,
        systemInstruction: buildSystemInstruction(request.history),
        tools: tools && tools.length > 0 ? [{ functionDeclarations: tools }] : undefined,
        generationConfig: {
          temperature: this.options.temperature,
          maxOutputTokens: this.options.maxOutputTokens,
        },
      },
      { timeout: this.options.timeoutMs }
    );

    try {
      return await model.generateContent({ contents: toContents(request.transcript) });
    } catch (error) {
      console.error(`[Gemini Service] ${phase} call failed with model ${this.options.model}:`, errorMessage(error));
      throw new Error(`Gemini ${phase} call failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
