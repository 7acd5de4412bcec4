export type ChatRole = 'system' | 'user' | 'assistant';

export interface ContentPart {
  type: string;
  text?: string | undefined;
}

export interface ChatMessage {
  /** A missing role reads as a user turn. */
  role?: ChatRole | (string & {}) | null | undefined;
  content?: string | ContentPart[] | null | undefined;
}

export interface CompletionRequest {
  model?: string | undefined;
  messages?: ChatMessage[] | undefined;
  prompt?: string | undefined;
  max_tokens?: number | undefined;
  temperature?: number | undefined;
  stream?: boolean | undefined;
  stream_options?: { include_usage?: boolean | undefined } | undefined;
}

export type CompletionShape = 'chat' | 'text';

export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletion {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: { role: 'assistant'; content: string };
    finish_reason: 'stop';
  }>;
  usage: Usage;
}

export interface TextCompletion {
  id: string;
  object: 'text_completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    text: string;
    finish_reason: 'stop';
  }>;
  usage: Usage;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: { role?: 'assistant'; content?: string };
    finish_reason: 'stop' | null;
  }>;
  usage?: Usage;
}

export interface TextCompletionChunk {
  id: string;
  object: 'text_completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    text: string;
    finish_reason: 'stop' | null;
  }>;
  usage?: Usage;
}

export interface ModelList {
  object: 'list';
  data: Array<{ id: string; object: 'model'; created: number; owned_by: string }>;
}

export type ErrorType = 'invalid_request_error' | 'model_error' | 'server_error' | 'not_found';

export interface ErrorEnvelope {
  error: {
    message: string;
    type: ErrorType;
  };
}
