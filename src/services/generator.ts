import OpenAI from "openai";
import { GoogleGenAI } from "@google/genai";
import { GenerationError, errorMessage } from "./errors";
import { SYSTEM_PROMPT } from "./prompts";
import { CodeGenerator } from "./types";

export interface GeneratorSettings {
  provider: "openai" | "gemini";
  model: string;
  baseUrl: string;
  apiKey: string;
  geminiApiKey: string;
  temperature: number;
  maxTokens: number;
}

/** Any OpenAI-compatible chat endpoint, including a local Ollama. */
export class OpenAICodeGenerator implements CodeGenerator {
  private readonly client: OpenAI;

  constructor(private readonly settings: GeneratorSettings) {
    this.client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseUrl });
  }

  get model(): string {
    return this.settings.model;
  }

  async generate(prompt: string): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.settings.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
      });
      return completion.choices[0]?.message?.content ?? "";
    } catch (e) {
      throw new GenerationError(`Code generation failed (${this.settings.model}): ${errorMessage(e)}`);
    }
  }
}

export class GeminiCodeGenerator implements CodeGenerator {
  private readonly gemini: GoogleGenAI;

  constructor(private readonly settings: GeneratorSettings) {
    this.gemini = new GoogleGenAI({ apiKey: settings.geminiApiKey });
  }

  get model(): string {
    return this.settings.model;
  }

  async generate(prompt: string): Promise<string> {
    try {
      const response = await this.gemini.models.generateContent({
        model: this.settings.model,
        contents: prompt,
        config: {
          systemInstruction: SYSTEM_PROMPT,
          temperature: this.settings.temperature,
          maxOutputTokens: this.settings.maxTokens,
        },
      });
      return response.text ?? "";
    } catch (e) {
      throw new GenerationError(`Code generation failed (${this.settings.model}): ${errorMessage(e)}`);
    }
  }
}

export function createCodeGenerator(settings: GeneratorSettings): CodeGenerator {
  return settings.provider === "gemini" ? new GeminiCodeGenerator(settings) : new OpenAICodeGenerator(settings);
}

/** Strips markdown fences; models add them even when told not to. */
export function extractCode(response: string): string {
  let code = response.trim();

  const fenced = code.match(/```[\w-]*\r?\n([\s\S]*?)```/);
  if (fenced) {
    code = fenced[1];
  } else {
    code = code.replace(/^```[\w-]*\r?\n?/, "").replace(/```$/, "");
  }

  return code.trim();
}

export interface CodeAnalysis {
  ok: boolean;
  issues: string[];
  warnings: string[];
}

const RESOLVE_DEFINITION = /(?:async\s+)?function\s+resolveOracle\s*\(|(?:const|let|var)\s+resolveOracle\s*=/;
const FORBIDDEN_MODULES = ["child_process", "fs", "net", "worker_threads", "cluster"];

export function analyzeCode(code: string): CodeAnalysis {
  const issues: string[] = [];
  const warnings: string[] = [];

  if (!code.trim()) {
    return { ok: false, issues: ["empty code"], warnings };
  }
  if (!RESOLVE_DEFINITION.test(code)) {
    issues.push("missing resolveOracle definition");
  }
  if (!/JSON\.stringify/.test(code) && !/\breturn\b/.test(code)) {
    issues.push("neither prints nor returns a JSON result");
  }
  if (!/console\.log|process\.stdout\.write/.test(code)) {
    warnings.push("prints nothing; relying on the return value");
  }
  for (const mod of FORBIDDEN_MODULES) {
    const pattern = new RegExp(`require\\(\\s*["'](?:node:)?${mod}["']\\s*\\)|from\\s+["'](?:node:)?${mod}["']`);
    if (pattern.test(code)) issues.push(`uses forbidden module ${mod}`);
  }
  if (/__PLACEHOLDER_HEX_\d+__/.test(code)) {
    warnings.push("unrestored placeholder token");
  }
  if (!/createHash/.test(code)) {
    warnings.push("does not hash its sources");
  }

  return { ok: issues.length === 0, issues, warnings };
}
