import { Content, GenerativeModel, VertexAI } from '@google-cloud/vertexai';
import { UpstreamError, errorMessage } from '../utils/errors';
import { ChatModel, ChatTurn } from './ChatModel';

export interface VertexChatModelConfig {
  projectId: string;
  region: string;
  model: string;
  systemPrompt?: string;
}

const GENERATION_CONFIG = {
  temperature: 0.7,
  maxOutputTokens: 1024,
  topP: 0.95,
  topK: 40,
};

export function toContents(history: ChatTurn[]): Content[] {
  return history.map((turn) => ({
    role: turn.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: turn.content }],
  }));
}

export class VertexChatModel implements ChatModel {
  readonly name: string;
  private model: GenerativeModel;

  constructor(config: VertexChatModelConfig) {
    this.name = config.model;
    const vertex = new VertexAI({ project: config.projectId, location: config.region });
    this.model = vertex.getGenerativeModel({
      model: config.model,
      generationConfig: GENERATION_CONFIG,
      systemInstruction: config.systemPrompt
        ? { role: 'system', parts: [{ text: config.systemPrompt }] }
        : undefined,
    });
  }

  async complete(history: ChatTurn[]): Promise<string> {
    let text = '';
    try {
      const result = await this.model.generateContent({ contents: toContents(history) });
      const parts = result.response.candidates?.[0]?.content?.parts ?? [];
      for (const part of parts) {
        if ('text' in part && typeof part.text === 'string') text += part.text;
      }
    } catch (err) {
      throw new UpstreamError(`Gemini request failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!text.trim()) throw new UpstreamError('Gemini returned an empty response');
    return text;
  }
}
