import { GoogleGenAI } from "@google/genai";
import type { AiModelPort } from "../../interfaces/ports";

export class GeminiModel implements AiModelPort {
  private client: GoogleGenAI | null;

  constructor(private readonly options: { apiKey: string | null; model: string }) {
    this.client = options.apiKey ? new GoogleGenAI({ apiKey: options.apiKey }) : null;
  }

  get available() {
    return this.client !== null;
  }

  async generate(prompt: string, options: { temperature: number; maxOutputTokens: number }) {
    if (!this.client) {
      throw new Error("Gemini API key is not configured.");
    }
    const response = await this.client.models.generateContent({
      model: this.options.model,
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      config: {
        temperature: options.temperature,
        maxOutputTokens: options.maxOutputTokens
      }
    });
    const text = response.text?.trim();
    if (!text) {
      throw new Error("Gemini returned an empty response.");
    }
    return text;
  }
}
