import { GoogleGenAI } from "@google/genai";

export const createGeminiClient = (apiKey: string): GoogleGenAI => {
  return new GoogleGenAI({ apiKey: apiKey.trim() });
};

// Sampling settings for short exam items; JSON mode keeps the reply machine-readable.
export const GEMINI_GENERATION_CONFIG = {
  temperature: 1.0,
  topP: 0.95,
  topK: 40,
  maxOutputTokens: 1024,
  responseMimeType: "application/json",
} as const;
