import { z } from 'zod';
import { log } from '../log';
import { linkSignal } from '../utils/abort';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequestOptions {
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

/** Text-generation backend: returns the complete reply, never a partial one. */
export interface ChatBackend {
  complete(messages: ChatMessage[], options?: ChatRequestOptions): Promise<string>;
}

export interface ChatClientConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
  streaming?: boolean;
}

const StreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).partial().nullish(),
      }),
    )
    .default([]),
});

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }),
      }),
    )
    .min(1),
});

export function buildCompletionsUrl(base: string): string {
  const trimmed = base.replace(/\/+$/, '');
  if (trimmed.endsWith('/chat/completions')) {
    return trimmed;
  }
  return `${trimmed}/chat/completions`;
}

async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

export function parseSseBlock(block: string): { event: string; data: string } | null {
  const lines = block.split('\n');
  let event = 'message';
  const dataLines: string[] = [];

  for (const line of lines) {
    if (!line || line.startsWith(':')) {
      continue;
    }
    if (line.startsWith('event:')) {
      event = line.slice('event:'.length).trim();
      continue;
    }
    if (line.startsWith('data:')) {
      dataLines.push(line.slice('data:'.length).trimStart());
    }
  }

  if (dataLines.length === 0) {
    return null;
  }

  return { event, data: dataLines.join('\n') };
}

/** Reads server-sent events until the body ends or onEvent returns false. */
export async function readSseStream(
  response: Response,
  onEvent: (event: { event: string; data: string }) => boolean | void,
): Promise<void> {
  if (!response.body) {
    throw new Error('chat stream missing body');
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let finished = false;

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        finished = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      buffer = buffer.replace(/\r\n/g, '\n');

      let boundaryIndex = buffer.indexOf('\n\n');
      while (boundaryIndex !== -1) {
        const block = buffer.slice(0, boundaryIndex);
        buffer = buffer.slice(boundaryIndex + 2);
        const parsed = parseSseBlock(block);
        if (parsed && onEvent(parsed) === false) {
          return;
        }
        boundaryIndex = buffer.indexOf('\n\n');
      }
    }

    buffer += decoder.decode();
    buffer = buffer.replace(/\r\n/g, '\n');

    const trailing = buffer.trim();
    if (trailing) {
      const parsed = parseSseBlock(trailing);
      if (parsed) {
        onEvent(parsed);
      }
    }
  } finally {
    if (finished) {
      reader.releaseLock();
    } else {
      // stopped at [DONE] or the read failed; drop the rest of the body
      await reader.cancel().catch((error: unknown) => {
        log.debug({ event: 'chat_stream_cancel_failed', err: error }, 'chat stream cancel failed');
      });
    }
  }
}

/** OpenAI-style chat completions client. */
export class ChatCompletionsClient implements ChatBackend {
  private readonly url: string;

  constructor(private readonly config: ChatClientConfig) {
    this.url = buildCompletionsUrl(config.baseUrl);
  }

  public async complete(messages: ChatMessage[], options: ChatRequestOptions = {}): Promise<string> {
    const logContext = options.logContext ?? {};
    const streaming = this.config.streaming !== false;
    const linked = linkSignal(options.signal, this.config.timeoutMs);
    const startedAt = Date.now();

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: streaming ? 'text/event-stream' : 'application/json',
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ model: this.config.model, messages, stream: streaming }),
        signal: linked.signal,
      });

      if (!response.ok) {
        const body = await readResponseText(response);
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        throw new Error(`chat completion failed ${response.status}: ${preview}`);
      }

      const text = streaming ? await this.readStreamed(response) : await this.readWhole(response);

      log.info(
        {
          event: 'chat_completion_done',
          streaming,
          total_len: text.length,
          duration_ms: Date.now() - startedAt,
          ...logContext,
        },
        'chat completion done',
      );
      return text;
    } finally {
      linked.dispose();
    }
  }

  private async readStreamed(response: Response): Promise<string> {
    let fullText = '';

    await readSseStream(response, ({ data }) => {
      if (data === '[DONE]') {
        return false;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(data);
      } catch {
        return true;
      }

      const chunk = StreamChunkSchema.safeParse(payload);
      if (!chunk.success) {
        return true;
      }
      const content = chunk.data.choices[0]?.delta?.content;
      if (content) {
        fullText += content;
      }
      return true;
    });

    return fullText.trim();
  }

  private async readWhole(response: Response): Promise<string> {
    const parsed = CompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('chat completion response missing choices');
    }
    return (parsed.data.choices[0]?.message.content ?? '').trim();
  }
}
