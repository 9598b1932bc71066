import type Anthropic from '@anthropic-ai/sdk';
import {
  AssistantMessage,
  ContentPartTextParam,
  conversation,
  systemPrompt,
  type ContentPartImageParam,
  type Message,
} from '../messages.js';

type AnthropicBlock = Anthropic.TextBlockParam | Anthropic.ImageBlockParam;

export class AnthropicMessageSerializer {
  /**
   * Serialize a list of messages, extracting the system prompt
   *
   * @returns Tuple of [messages, system prompt]
   */
  serializeMessages(
    messages: Message[]
  ): [Anthropic.MessageParam[], string | undefined] {
    const serialized = conversation(messages).map(
      (message): Anthropic.MessageParam => {
        if (message instanceof AssistantMessage) {
          return { role: 'assistant', content: message.text };
        }
        if (typeof message.content === 'string') {
          return { role: 'user', content: message.content };
        }
        return {
          role: 'user',
          content: message.content.map((part) =>
            part instanceof ContentPartTextParam
              ? this.serializeText(part)
              : this.serializeImage(part)
          ),
        };
      }
    );
    return [serialized, systemPrompt(messages)];
  }

  private serializeText(part: ContentPartTextParam): Anthropic.TextBlockParam {
    return { type: 'text', text: part.text };
  }

  // Only inline images are sent as image blocks; remote ones are referenced by URL
  private serializeImage(part: ContentPartImageParam): AnthropicBlock {
    const inline = part.image_url.inline;
    if (!inline) {
      return { type: 'text', text: `Image: ${part.image_url.url}` };
    }
    return {
      type: 'image',
      source: {
        type: 'base64',
        media_type: inline.media_type,
        data: inline.data,
      },
    };
  }
}
