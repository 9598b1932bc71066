import type OpenAI from 'openai';
import {
  AssistantMessage,
  ContentPartTextParam,
  SystemMessage,
  type Message,
} from '../messages.js';

export type OpenAIMessage =
  OpenAI.Chat.Completions.ChatCompletionCreateParams['messages'][number];

type OpenAIUserContent = Exclude<
  Extract<OpenAIMessage, { role: 'user' }>['content'],
  string
>;

export class OpenAIMessageSerializer {
  serialize(messages: Message[]): OpenAIMessage[] {
    return messages.map((message) => this.serializeMessage(message));
  }

  private serializeMessage(message: Message): OpenAIMessage {
    if (message instanceof SystemMessage) {
      return {
        role: 'system',
        content: message.text,
        ...(message.name ? { name: message.name } : {}),
      };
    }

    if (message instanceof AssistantMessage) {
      return { role: 'assistant', content: message.text };
    }

    if (typeof message.content === 'string') {
      return {
        role: 'user',
        content: message.content,
        ...(message.name ? { name: message.name } : {}),
      };
    }

    const content: OpenAIUserContent = message.content.map((part) =>
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
    return {
      role: 'user',
      content,
      ...(message.name ? { name: message.name } : {}),
    };
  }
}
