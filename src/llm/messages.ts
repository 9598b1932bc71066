export type SupportedImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

const SUPPORTED_MEDIA_TYPES: readonly SupportedImageMediaType[] = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'];

const truncate = (text: string, maxLength = 50) => {
	if (text.length <= maxLength) {
		return text;
	}
	return `${text.slice(0, maxLength - 3)}...`;
};

export class ContentPartTextParam {
	type = 'text' as const;
	constructor(public text: string) {}

	toString() {
		return `Text: ${truncate(this.text)}`;
	}
}

export interface InlineImage {
	media_type: SupportedImageMediaType;
	data: string;
}

const isSupportedMediaType = (value: string): value is SupportedImageMediaType =>
	SUPPORTED_MEDIA_TYPES.some((mediaType) => mediaType === value);

export class ImageURL {
	constructor(
		public url: string,
		public detail: 'auto' | 'low' | 'high' = 'auto',
		public media_type: SupportedImageMediaType = 'image/png',
	) {}

	/**
	 * Splits a `data:<type>;base64,<data>` URL; null for remote URLs.
	 */
	get inline(): InlineImage | null {
		const match = /^data:([^;]+);base64,(.*)$/s.exec(this.url);
		if (!match) {
			return null;
		}
		const [, mediaType = '', data = ''] = match;
		return {
			media_type: isSupportedMediaType(mediaType) ? mediaType : this.media_type,
			data,
		};
	}

	toString() {
		const shown = this.url.startsWith('data:') ? `<base64 ${this.media_type}>` : truncate(this.url);
		return `🖼️  Image[${this.media_type}, detail=${this.detail}]: ${shown}`;
	}
}

export class ContentPartImageParam {
	type = 'image_url' as const;
	constructor(public image_url: ImageURL) {}

	toString() {
		return this.image_url.toString();
	}
}

export type ContentPart = ContentPartTextParam | ContentPartImageParam;

const joinText = (content: string | ContentPart[] | null) => {
	if (content === null) {
		return '';
	}
	if (typeof content === 'string') {
		return content;
	}
	return content
		.filter((part): part is ContentPartTextParam => part instanceof ContentPartTextParam)
		.map((part) => part.text)
		.join('\n');
};

export class UserMessage {
	readonly role = 'user' as const;

	constructor(
		public content: string | ContentPart[],
		public name: string | null = null,
	) {}

	get text() {
		return joinText(this.content);
	}

	toString() {
		return `UserMessage(content=${this.text})`;
	}
}

export class SystemMessage {
	readonly role = 'system' as const;

	constructor(
		public content: string | ContentPartTextParam[],
		public name: string | null = null,
	) {}

	get text() {
		return joinText(this.content);
	}

	toString() {
		return `SystemMessage(content=${this.text})`;
	}
}

export class AssistantMessage {
	readonly role = 'assistant' as const;

	constructor(public content: string | ContentPartTextParam[] | null = null) {}

	get text() {
		return joinText(this.content);
	}

	toString() {
		return `AssistantMessage(content=${this.text})`;
	}
}

export type Message = UserMessage | SystemMessage | AssistantMessage;

/**
 * Concatenated text of every system message, or undefined when there is none.
 */
export const systemPrompt = (messages: Message[]) => {
	const texts = messages
		.filter((message): message is SystemMessage => message instanceof SystemMessage)
		.map((message) => message.text);
	return texts.length > 0 ? texts.join('\n\n') : undefined;
};

export const conversation = (messages: Message[]) =>
	messages.filter(
		(message): message is UserMessage | AssistantMessage => !(message instanceof SystemMessage),
	);
