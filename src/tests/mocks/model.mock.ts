import { ChatModel, ChatTurn } from '../../agent/ChatModel';

export class ScriptedChatModel implements ChatModel {
  readonly name = 'scripted';
  readonly seen: ChatTurn[][] = [];
  reply: (history: ChatTurn[]) => Promise<string> = async (history) =>
    `echo: ${history[history.length - 1].content}`;

  async complete(history: ChatTurn[]): Promise<string> {
    this.seen.push(history.map((t) => ({ ...t })));
    return this.reply(history);
  }
}
