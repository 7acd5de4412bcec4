import { z } from 'zod';

const contentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const chatMessageSchema = z
  .object({
    role: z.string().nullish(),
    content: z.union([z.string(), z.array(contentPartSchema)]).nullish(),
  })
  .passthrough();

export const completionRequestSchema = z
  .object({
    model: z.string().optional(),
    messages: z.array(chatMessageSchema).optional(),
    prompt: z.string().optional(),
    max_tokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
    stream: z.boolean().optional(),
    stream_options: z
      .object({ include_usage: z.boolean().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type CompletionRequestInput = z.infer<typeof completionRequestSchema>;
