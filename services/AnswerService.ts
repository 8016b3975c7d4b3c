import { GoogleGenerativeAI } from '@google/generative-ai';
import { RetrievalResult } from '../types';
import { GenerationFailureError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('AnswerService');

export const SYSTEM_PROMPT = `You are a helpful assistant that answers questions based on the provided document context.

Instructions:
- Answer the question using ONLY the information from the provided context
- If the context doesn't contain enough information, say so clearly
- Be concise and accurate
- Cite specific sources when possible
- Do not make up information not present in the context`;

export interface AnswerGenerator {
  readonly modelName: string;
  generate(question: string, context: readonly RetrievalResult[]): Promise<string>;
}

export function buildContext(context: readonly RetrievalResult[]): string {
  return context
    .map(({ chunk }, i) => {
      const page = chunk.pageNumber === null ? 'page unknown' : `page ${chunk.pageNumber}`;
      return `[Source ${i + 1}: ${chunk.documentName}, ${page}]\n${chunk.text}\n`;
    })
    .join('\n');
}

export function buildPrompt(question: string, context: readonly RetrievalResult[]): string {
  return `${SYSTEM_PROMPT}

Context from documents:
${buildContext(context)}

Question: ${question}

Answer:`;
}

export class GeminiAnswerGenerator implements AnswerGenerator {
  private genAI: GoogleGenerativeAI;
  readonly modelName: string;
  private temperature: number;

  constructor(apiKey: string, options: { model?: string; temperature?: number } = {}) {
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is required for answer generation');
    }
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.modelName = options.model ?? 'gemini-1.5-flash';
    this.temperature = options.temperature ?? 0.1;
  }

  async generate(question: string, context: readonly RetrievalResult[]): Promise<string> {
    const prompt = buildPrompt(question, context);
    try {
      const model = this.genAI.getGenerativeModel({
        model: this.modelName,
        generationConfig: {
          temperature: this.temperature
        }
      });
      const result = await model.generateContent(prompt);
      const text = result.response.text().trim();
      if (!text) {
        throw new Error('Model returned an empty answer');
      }
      return text;
    } catch (error) {
      log.error(`LLM call failed: ${errorMessage(error)}`);
      throw new GenerationFailureError(`Failed to generate answer: ${errorMessage(error)}`, error);
    }
  }
}
