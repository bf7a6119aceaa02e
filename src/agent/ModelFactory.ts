import { AppConfig } from '../utils/config';
import { ChatModel, DisabledChatModel } from './ChatModel';
import { VertexChatModel } from './VertexChatModel';

export function createChatModel(
  config: Pick<AppConfig, 'projectId' | 'region' | 'geminiModel' | 'systemPrompt'>
): ChatModel {
  if (!config.projectId) {
    return new DisabledChatModel('PROJECT_ID is not set');
  }
  return new VertexChatModel({
    projectId: config.projectId,
    region: config.region,
    model: config.geminiModel,
    systemPrompt: config.systemPrompt,
  });
}
