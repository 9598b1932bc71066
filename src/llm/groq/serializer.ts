import type Groq from 'groq-sdk';
import {
  AssistantMessage,
  ContentPartTextParam,
  SystemMessage,
  type Message,
} from '../messages.js';

export type GroqMessage =
  Groq.Chat.Completions.ChatCompletionMessageParam;

type GroqUserContent = Exclude<
  Extract<GroqMessage, { role: 'user' }>['content'],
  string
>;

export class GroqMessageSerializer {
  serialize(messages: Message[]): GroqMessage[] {
    return messages.map((message) => this.serializeMessage(message));
  }

  private serializeMessage(message: Message): GroqMessage {
    if (message instanceof SystemMessage) {
      return { role: 'system', content: message.text };
    }

    if (message instanceof AssistantMessage) {
      return { role: 'assistant', content: message.text };
    }

    if (typeof message.content === 'string') {
      return { role: 'user', content: message.content };
    }

    const content: GroqUserContent = message.content.map((part) =>
      part instanceof ContentPartTextParam
        ? { type: 'text' as const, text: part.text }
        : {
            type: 'image_url' as const,
            image_url: {
              url: part.image_url.url,
              detail: part.image_url.detail,
            },
          }
    );
    return { role: 'user', content };
  }
}
