import type { Content, Part } from '@google/genai';
import {
    AssistantMessage,
    ContentPartTextParam,
    conversation,
    type ContentPart,
    type Message,
} from '../messages.js';

export class GoogleMessageSerializer {
    // System instructions are passed separately
    serialize(messages: Message[]): Content[] {
        return conversation(messages).map((message) => {
            const content: string | ContentPart[] | null = message.content;
            return {
                role: message instanceof AssistantMessage ? 'model' : 'user',
                parts:
                    typeof content === 'string' || content === null
                        ? [{ text: message.text }]
                        : content.map((part) => this.serializePart(part)),
            };
        });
    }

    private serializePart(part: ContentPart): Part {
        if (part instanceof ContentPartTextParam) {
            return { text: part.text };
        }
        const inline = part.image_url.inline;
        if (inline) {
            return { inlineData: { mimeType: inline.media_type, data: inline.data } };
        }
        return { fileData: { fileUri: part.image_url.url, mimeType: part.image_url.media_type } };
    }
}
