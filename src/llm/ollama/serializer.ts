import type { Message as OllamaMessage } from 'ollama';
import {
  ContentPartImageParam,
  UserMessage,
  type Message,
} from '../messages.js';

export class OllamaMessageSerializer {
  serialize(messages: Message[]): OllamaMessage[] {
    return messages.map((message) => this.serializeMessage(message));
  }

  private serializeMessage(message: Message): OllamaMessage {
    if (!(message instanceof UserMessage) || typeof message.content === 'string') {
      return { role: message.role, content: message.text };
    }

    // Ollama expects base64 strings without the data URL header
    const images = message.content
      .filter((part): part is ContentPartImageParam => part instanceof ContentPartImageParam)
      .flatMap((part) => {
        const inline = part.image_url.inline;
        return inline ? [inline.data] : [];
      });

    return {
      role: 'user',
      content: message.text,
      ...(images.length > 0 ? { images } : {}),
    };
  }
}
