import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";

export interface ClientOptions {
  apiKey?: string;
  baseURL?: string;
}

// Create OpenAI client
export const createOpenAIClient = (options: ClientOptions = {}) =>
  createOpenAI({
    baseURL: options.baseURL ?? process.env.OPENAI_BASE_URL,
    apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
  });

// Create Google AI client
export const createGeminiClient = (options: ClientOptions = {}) =>
  createGoogleGenerativeAI({
    apiKey: options.apiKey ?? process.env.GOOGLE_GENERATIVE_AI_API_KEY,
  });
